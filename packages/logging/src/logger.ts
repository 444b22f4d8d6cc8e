/**
 * Structured JSON logger with session correlation IDs and secret masking.
 *
 * One JSON object per line. `info` goes to stdout, everything else to stderr.
 */

import type { SessionId, RequestId } from "@clinic-relay/shared-types";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: string;
  readonly sessionId?: SessionId | undefined;
  readonly requestId?: RequestId | undefined;
  readonly [key: string]: unknown;
}

/** Fields that should be masked in log output. */
const SECRET_FIELDS = new Set([
  "token",
  "apikey",
  "api_key",
  "apiKey",
  "authorization",
  "Authorization",
  "auth",
  "secret",
  "password",
  "credential",
  "privateKey",
  "private_key",
]);

const MASK = "********";

/** Recursively mask secret fields in an object. */
function maskSecrets(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSecrets);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.has(key) && typeof value === "string") {
      masked[key] = MASK;
    } else if (typeof value === "object" && value !== null) {
      masked[key] = maskSecrets(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

/** Parse a LOG_LEVEL value, falling back to `info`. */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value === "debug" || value === "info" || value === "warn" || value === "error"
    ? value
    : "info";
}

export class Logger {
  private readonly context: Record<string, unknown>;
  private readonly minLevel: LogLevel;

  constructor(context?: Record<string, unknown>, minLevel: LogLevel = "debug") {
    this.context = context ?? {};
    this.minLevel = minLevel;
  }

  /** Create a child logger with additional context (e.g., sessionId). */
  child(extra: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...extra }, this.minLevel);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...data,
    };

    const output = JSON.stringify(maskSecrets(entry));

    if (level === "info") {
      process.stdout.write(output + "\n");
    } else {
      process.stderr.write(output + "\n");
    }
  }
}

/** Singleton root logger. */
export const rootLogger = new Logger(
  { service: "clinic-relay" },
  parseLogLevel(process.env["LOG_LEVEL"]),
);
