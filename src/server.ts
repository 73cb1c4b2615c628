import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, candidateStore } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("Candidate store", { file: candidateStore.getFilePath() });
    logger.info("LOG_WEBHOOK", {
      enabled: env.logWebhookEnabled,
      level: env.logWebhookLevel,
    });
    if (!env.adminSecret) {
      logger.warn("ADMIN_SECRET is not set, admin API will answer 503");
    }
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
