import { QuestionBankGenerator, loadQuestionBank } from "../interviews/question-bank.generator";
import { QuestionGenerator } from "../interviews/question-generator";
import { CandidateStore } from "../storage/candidate-store.service";
import { EnvConfig } from "./env";
import { createLogger, Logger } from "./logger";

export function buildLogger(env: EnvConfig, write?: (line: string) => void): Logger {
  return createLogger({
    minLevel: env.logLevel,
    write,
    webhook: {
      enabled: env.logWebhookEnabled,
      url: env.logWebhookUrl,
      minLevel: env.logWebhookLevel,
      ratePerMinute: env.logWebhookRatePerMin,
      batchMs: env.logWebhookBatchMs,
    },
  });
}

export function buildCandidateStore(env: EnvConfig, logger: Logger): CandidateStore {
  return new CandidateStore(logger, {
    dataDir: env.dataDir,
    fileName: env.candidatesFile,
  });
}

export function buildQuestionGenerator(env: EnvConfig): QuestionGenerator {
  return new QuestionBankGenerator(loadQuestionBank(env.questionBankPath));
}
