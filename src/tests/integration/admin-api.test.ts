import assert from "node:assert/strict";
import { once } from "node:events";
import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { EnvConfig } from "../../config/env";
import { Logger } from "../../config/logger";
import { createEmptyCandidateRecord } from "../../profiles/candidate-record";
import { CandidateStore } from "../../storage/candidate-store.service";

const ADMIN_SECRET = "test-secret";
const FIRST_SAVE = new Date(2024, 2, 5, 9, 7, 3);
const SECOND_SAVE = new Date(2024, 2, 5, 9, 7, 4);

const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function buildEnv(dataDir: string, adminSecret?: string): EnvConfig {
  return {
    nodeEnv: "test",
    port: 0,
    dataDir,
    candidatesFile: "candidates.json",
    questionBankPath: path.resolve(process.cwd(), "data", "question-bank.json"),
    logLevel: "error",
    logWebhookEnabled: false,
    logWebhookLevel: "warn",
    logWebhookRatePerMin: 20,
    logWebhookBatchMs: 2500,
    adminSecret,
  };
}

function seedStore(dataDir: string): CandidateStore {
  const saveTimes = [FIRST_SAVE, SECOND_SAVE];
  let saveIndex = 0;
  const store = new CandidateStore(noopLogger, {
    dataDir,
    now: () => saveTimes[Math.min(saveIndex, saveTimes.length - 1)],
  });

  const complete = createEmptyCandidateRecord();
  complete.fullName = "John Smith";
  complete.email = "john@x.com";
  complete.phone = "555-123-4567";
  complete.experienceYears = 5;
  complete.desiredPosition = "Engineer";
  complete.location = "NYC";
  complete.techStack = ["python", "sql"];
  complete.technicalAnswers = { question_1: { question: "Q1", answer: "Indexes" } };
  assert.equal(store.save(complete), true);
  saveIndex += 1;

  const partial = createEmptyCandidateRecord();
  partial.fullName = "Ana";
  partial.email = "ab@y.org";
  assert.equal(store.save(partial), true);
  return store;
}

async function withServer(
  adminSecret: string | undefined,
  run: (baseUrl: string) => Promise<void>,
): Promise<void> {
  const dataDir = mkdtempSync(path.join(os.tmpdir(), "admin-api-"));
  const { app } = createApp(buildEnv(dataDir, adminSecret), {
    logger: noopLogger,
    candidateStore: seedStore(dataDir),
  });
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  try {
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    server.close();
    rmSync(dataDir, { recursive: true, force: true });
  }
}

async function getJson(
  url: string,
  secret?: string,
): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    headers: secret ? { "x-admin-secret": secret } : {},
  });
  const body: unknown = await response.json();
  return { status: response.status, body };
}

test("health answers without a secret", async () => {
  await withServer(ADMIN_SECRET, async (baseUrl) => {
    assert.deepEqual(await getJson(`${baseUrl}/health`), { status: 200, body: { ok: true } });
  });
});

test("admin routes reject a missing or wrong secret", async () => {
  await withServer(ADMIN_SECRET, async (baseUrl) => {
    const unauthorized = { status: 401, body: { ok: false, error: "Unauthorized" } };
    assert.deepEqual(await getJson(`${baseUrl}/admin/api/candidates`), unauthorized);
    assert.deepEqual(await getJson(`${baseUrl}/admin/api/candidates`, "wrong-secret"), unauthorized);
  });
});

test("admin routes are unavailable when no secret is configured", async () => {
  await withServer(undefined, async (baseUrl) => {
    assert.deepEqual(await getJson(`${baseUrl}/admin/api/candidates`, ADMIN_SECRET), {
      status: 503,
      body: { ok: false, error: "Admin API is not configured" },
    });
  });
});

test("the candidate list is anonymized and counts complete profiles", async () => {
  await withServer(ADMIN_SECRET, async (baseUrl) => {
    assert.deepEqual(await getJson(`${baseUrl}/admin/api/candidates`, ADMIN_SECRET), {
      status: 200,
      body: {
        ok: true,
        stats: { total: 2, complete: 1, partial: 1 },
        candidates: [
          {
            full_name: "J*** S***",
            email: "jo***@x.com",
            phone: "***-***-4567",
            experience_years: 5,
            desired_position: "Engineer",
            location: "NYC",
            tech_stack: ["python", "sql"],
            technical_answers: { question_1: { question: "Q1", answer: "Indexes" } },
            timestamp: FIRST_SAVE.toISOString(),
            id: "CAND_20240305090703",
          },
          {
            full_name: "A***",
            email: "ab@y.org",
            phone: "",
            experience_years: null,
            desired_position: "",
            location: "",
            tech_stack: [],
            technical_answers: {},
            timestamp: SECOND_SAVE.toISOString(),
            id: "CAND_20240305090704",
          },
        ],
      },
    });
  });
});

test("a single candidate is looked up by id", async () => {
  await withServer(ADMIN_SECRET, async (baseUrl) => {
    const found = await getJson(`${baseUrl}/admin/api/candidates/CAND_20240305090704`, ADMIN_SECRET);
    assert.equal(found.status, 200);
    assert.deepEqual(found.body, {
      ok: true,
      candidate: {
        full_name: "A***",
        email: "ab@y.org",
        phone: "",
        experience_years: null,
        desired_position: "",
        location: "",
        tech_stack: [],
        technical_answers: {},
        timestamp: SECOND_SAVE.toISOString(),
        id: "CAND_20240305090704",
      },
    });

    assert.deepEqual(await getJson(`${baseUrl}/admin/api/candidates/CAND_19990101000000`, ADMIN_SECRET), {
      status: 404,
      body: { ok: false, error: "Candidate not found" },
    });
  });
});
