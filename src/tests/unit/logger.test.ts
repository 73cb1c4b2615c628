import assert from "node:assert/strict";
import { once } from "node:events";
import test from "node:test";
import express from "express";
import {
  createLogger,
  logContext,
  redactMeta,
} from "../../config/logger";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function captureLines(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    write(line) {
      lines.push(line);
    },
  };
}

test("log lines are JSON with level, message and meta", () => {
  const output = captureLines();
  const logger = createLogger({ write: output.write });
  logger.info("candidate_store.saved", { candidate_id: "CAND_1" });

  assert.equal(output.lines.length, 1);
  assert.equal(output.lines[0].endsWith("\n"), true);
  const parsed: unknown = JSON.parse(output.lines[0]);
  assert.ok(isRecord(parsed));
  assert.equal(typeof parsed.timestamp, "string");
  assert.deepEqual({ ...parsed, timestamp: "<ts>" }, {
    timestamp: "<ts>",
    level: "info",
    message: "candidate_store.saved",
    meta: { candidate_id: "CAND_1" },
  });
});

test("entries below the minimum level are dropped", () => {
  const output = captureLines();
  const logger = createLogger({ minLevel: "warn", write: output.write });
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");
  logger.error("shown too");
  assert.equal(output.lines.length, 2);
});

test("logContext merges context and fields", () => {
  const calls: Array<{ message: string; meta?: Record<string, unknown> }> = [];
  const logger = {
    debug() {},
    info() {},
    warn(message: string, meta?: Record<string, unknown>) {
      calls.push({ message, meta });
    },
    error() {},
  };
  logContext(logger, "warn", "conversation.record_persist_failed", { session_id: "s-1", ok: false }, {
    attempt: 1,
  });
  assert.deepEqual(calls, [
    {
      message: "conversation.record_persist_failed",
      meta: { session_id: "s-1", ok: false, attempt: 1 },
    },
  ]);
});

test("secret-like keys are redacted and long values truncated", () => {
  const redacted = redactMeta({
    adminSecret: "test-secret",
    api_key: "test-key",
    note: "x".repeat(510),
    stage: "greeting",
  });
  assert.equal(redacted.adminSecret, "[REDACTED]");
  assert.equal(redacted.api_key, "[REDACTED]");
  assert.equal(redacted.note, `${"x".repeat(500)}...`);
  assert.equal(redacted.stage, "greeting");
});

test("the webhook sink ships entries at or above its level", async () => {
  const received: unknown[] = [];
  const receiver = express();
  receiver.use(express.json());
  const delivered = new Promise<void>((resolve) => {
    receiver.post("/logs", (request, response) => {
      received.push(request.body);
      response.status(200).json({ ok: true });
      resolve();
    });
  });
  const server = receiver.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  assert.ok(address !== null && typeof address === "object");
  const { port } = address;

  try {
    const logger = createLogger({
      write: () => {},
      webhook: {
        enabled: true,
        url: `http://127.0.0.1:${port}/logs`,
        minLevel: "warn",
        ratePerMinute: 10,
        batchMs: 250,
      },
    });
    logger.info("not shipped");
    logger.warn("candidate_store.save_failed", { token: "test-token" });
    await delivered;
  } finally {
    server.close();
  }

  assert.equal(received.length, 1);
  const body = received[0];
  assert.ok(isRecord(body));
  const entries = body.entries;
  assert.ok(Array.isArray(entries));
  assert.deepEqual(
    entries.map((entry: unknown) =>
      isRecord(entry) ? [entry.level, entry.message, entry.meta] : null,
    ),
    [["warn", "candidate_store.save_failed", { token: "[REDACTED]" }]],
  );
});
