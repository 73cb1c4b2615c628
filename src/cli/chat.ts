import { createInterface } from "node:readline/promises";
import { loadEnv } from "../config/env";
import { buildCandidateStore, buildLogger, buildQuestionGenerator } from "../config/runtime";
import { ConversationEngine } from "../interviews/conversation.engine";

// Logs go to stderr so they never interleave with the conversation on stdout.
async function main(): Promise<void> {
  const env = loadEnv();
  const logger = buildLogger(env, (line) => {
    process.stderr.write(line);
  });
  const engine = new ConversationEngine(
    buildQuestionGenerator(env),
    buildCandidateStore(env, logger),
    logger,
  );
  const terminal = createInterface({ input: process.stdin, output: process.stdout });

  try {
    let turn = engine.processTurn("");
    process.stdout.write(`\nAssistant: ${turn.reply}\n\n`);
    while (!turn.ended) {
      const line = await terminal.question("You: ");
      turn = engine.processTurn(line);
      process.stdout.write(`\nAssistant: ${turn.reply}\n\n`);
    }
  } finally {
    terminal.close();
  }

  const summary = engine.getSummary();
  logger.info("chat.session_finished", {
    session_id: engine.getSessionId(),
    stage: summary.stage,
    questions_answered: summary.questionsAnswered,
    fields_collected: summary.fieldsCollected,
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`Chat session failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
