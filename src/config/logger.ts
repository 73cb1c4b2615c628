import fetch from "node-fetch";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface WebhookSinkOptions {
  enabled: boolean;
  url?: string;
  minLevel: LogLevel;
  ratePerMinute: number;
  batchMs: number;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  webhook?: WebhookSinkOptions;
}

export interface LoggerContext {
  session_id?: string;
  stage?: string;
  next_stage?: string;
  action?: string;
  ok?: boolean;
}

interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

function writeToStdout(line: string): void {
  process.stdout.write(line);
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? writeToStdout;
  const sink = buildWebhookLogSink(options?.webhook);

  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!isLevelEnabled(level, minLevel)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const payload: Record<string, unknown> = {
      timestamp,
      level,
      message,
    };
    if (meta) {
      payload.meta = meta;
    }
    write(`${safeJson(payload)}\n`);
    sink?.enqueue({ level, message, meta, timestamp });
  }

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  logger[level](message, { ...context, ...fields });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

class WebhookLogSink {
  private readonly queue: SinkEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private windowStartMs = Date.now();
  private sentInWindow = 0;

  constructor(
    private readonly url: string,
    private readonly minLevel: LogLevel,
    private readonly ratePerMinute: number,
    private readonly batchMs: number,
  ) {}

  enqueue(entry: SinkEntry): void {
    if (!isLevelEnabled(entry.level, this.minLevel)) {
      return;
    }
    this.queue.push(entry);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      void this.flush();
    }, this.batchMs);
    this.flushTimer.unref();
  }

  private async flush(): Promise<void> {
    this.flushTimer = null;
    if (!this.queue.length) {
      return;
    }
    if (!this.tryConsumeRateWindow()) {
      this.scheduleFlush();
      return;
    }

    const batch = this.queue.splice(0, 5);
    try {
      await postBatch(this.url, batch);
    } catch (error) {
      process.stderr.write(`log webhook delivery failed: ${errorMessage(error)}\n`);
    } finally {
      if (this.queue.length) {
        this.scheduleFlush();
      }
    }
  }

  private tryConsumeRateWindow(): boolean {
    const now = Date.now();
    if (now - this.windowStartMs >= 60_000) {
      this.windowStartMs = now;
      this.sentInWindow = 0;
    }
    if (this.sentInWindow >= this.ratePerMinute) {
      return false;
    }
    this.sentInWindow += 1;
    return true;
  }
}

function buildWebhookLogSink(config: WebhookSinkOptions | undefined): WebhookLogSink | undefined {
  if (!config?.enabled) {
    return undefined;
  }
  const url = config.url?.trim();
  if (!url) {
    return undefined;
  }
  return new WebhookLogSink(
    url,
    config.minLevel,
    Math.max(1, Math.floor(config.ratePerMinute)),
    Math.max(250, Math.floor(config.batchMs)),
  );
}

function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}

async function postBatch(url: string, entries: SinkEntry[]): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: safeJson({
      entries: entries.map((entry) => ({
        ...entry,
        meta: entry.meta ? redactMeta(entry.meta) : undefined,
      })),
    }),
  });
  if (!response.ok) {
    throw new Error(`log_webhook_send_failed_http_${response.status}`);
  }
}
