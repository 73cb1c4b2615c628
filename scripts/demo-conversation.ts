import { loadEnv } from "../src/config/env";
import { buildCandidateStore, buildLogger, buildQuestionGenerator } from "../src/config/runtime";
import { ConversationEngine } from "../src/interviews/conversation.engine";
import { anonymizeCandidate } from "../src/privacy/anonymization";
import { toCandidateDocument } from "../src/profiles/candidate-record";

const PROFILE_INPUTS = [
  "",
  "Jane Doe",
  "jane.doe@example.com",
  "+1-555-010-4477",
  "6",
  "Full Stack Developer",
  "Lisbon, Portugal",
  "Python, Django, React, PostgreSQL, Docker",
];

const TECHNICAL_ANSWERS = [
  "The GIL lets one thread run Python bytecode at a time, so I use multiprocessing for CPU-bound work and asyncio for I/O.",
  "I add read replicas with a database router, move heavy reports to a separate store, and shard by tenant when writes grow.",
  "I profile with the React DevTools profiler, memoize expensive children, and keep state close to where it is used.",
  "I add the new column as nullable, backfill in small batches, then switch reads and writes before dropping the old column.",
  "I use slim base images, run as a non-root user, pin versions, and scan images in CI.",
];

function run(): void {
  const env = loadEnv();
  const logger = buildLogger(env, (line) => {
    process.stderr.write(line);
  });
  const engine = new ConversationEngine(
    buildQuestionGenerator(env),
    buildCandidateStore(env, logger),
    logger,
  );

  const inputs = [...PROFILE_INPUTS, ...TECHNICAL_ANSWERS, "Nothing else, goodbye"];
  for (const [index, input] of inputs.entries()) {
    process.stdout.write(`\n--- Step ${index + 1} ---\n`);
    process.stdout.write(index === 0 ? "(conversation starts)\n" : `User: ${input}\n`);
    const turn = engine.processTurn(input);
    process.stdout.write(`Assistant: ${turn.reply}\n`);
    if (turn.ended) {
      break;
    }
  }

  const summary = engine.getSummary();
  process.stdout.write("\n=== Session summary ===\n");
  process.stdout.write(
    `${JSON.stringify(
      {
        stage: summary.stage,
        questionsAsked: summary.questionsAsked,
        questionsAnswered: summary.questionsAnswered,
        conversationLength: summary.conversationLength,
        candidate: anonymizeCandidate(toCandidateDocument(summary.candidate)),
      },
      null,
      2,
    )}\n`,
  );
}

run();
