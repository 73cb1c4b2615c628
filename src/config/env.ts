import dotenv from "dotenv";
import path from "node:path";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  dataDir: string;
  candidatesFile: string;
  questionBankPath: string;
  logLevel: LogLevel;
  logWebhookEnabled: boolean;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
  logWebhookRatePerMin: number;
  logWebhookBatchMs: number;
  adminSecret?: string;
}

function getOptionalTrimmed(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(): EnvConfig {
  const portRaw = process.env.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logWebhookLevelRaw = (process.env.LOG_WEBHOOK_LEVEL ?? "warn").trim().toLowerCase();
  const logWebhookRatePerMinRaw = process.env.LOG_WEBHOOK_RATE_PER_MIN ?? "20";
  const logWebhookBatchMsRaw = process.env.LOG_WEBHOOK_BATCH_MS ?? "2500";
  const logWebhookRatePerMin = Number(logWebhookRatePerMinRaw);
  const logWebhookBatchMs = Number(logWebhookBatchMsRaw);
  const logWebhookUrl = getOptionalTrimmed("LOG_WEBHOOK_URL");

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(logWebhookRatePerMin) || logWebhookRatePerMin < 1) {
    throw new Error(`Invalid LOG_WEBHOOK_RATE_PER_MIN value: ${logWebhookRatePerMinRaw}`);
  }
  if (!Number.isFinite(logWebhookBatchMs) || logWebhookBatchMs < 250) {
    throw new Error(`Invalid LOG_WEBHOOK_BATCH_MS value: ${logWebhookBatchMsRaw}`);
  }

  const dataDir = path.resolve(process.cwd(), getOptionalTrimmed("DATA_DIR") ?? "data");

  return {
    nodeEnv: process.env.NODE_ENV ?? "development",
    port,
    dataDir,
    candidatesFile: getOptionalTrimmed("CANDIDATES_FILE") ?? "candidates.json",
    questionBankPath: path.resolve(
      process.cwd(),
      getOptionalTrimmed("QUESTION_BANK_PATH") ?? path.join("data", "question-bank.json"),
    ),
    logLevel: parseLogLevel("LOG_LEVEL", logLevelRaw),
    logWebhookEnabled: Boolean(logWebhookUrl),
    logWebhookUrl,
    logWebhookLevel: parseLogLevel("LOG_WEBHOOK_LEVEL", logWebhookLevelRaw),
    logWebhookRatePerMin,
    logWebhookBatchMs,
    adminSecret: getOptionalTrimmed("ADMIN_SECRET"),
  };
}

function parseLogLevel(name: string, value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}
