import type { LogLevel } from "./types.ts";

/**
 * Minimal structured logger.
 *
 * Every event is one line: `[ISO timestamp] LEVEL message {meta json}`. Messages below the
 * configured threshold are dropped.
 */
const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export class Logger {
  // Messages below this threshold are dropped.
  #level: LogLevel;

  constructor(level: LogLevel) {
    this.#level = level;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    // Local development detail: prompt lengths, upstream calls.
    this.#log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    // Default operational signal: startup, each question and answer.
    this.#log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    // Recovered, but something is off.
    this.#log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    // Something expected to work failed (upstream call, startup).
    this.#log("error", message, meta);
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVELS[level] < LEVELS[this.#level]) return;
    const timestamp = new Date().toISOString();
    // Meta is one JSON blob so each event stays on one line.
    const payload = meta ? ` ${JSON.stringify(meta)}` : "";
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`;

    // Use the matching console channel so platforms can route stderr separately.
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export function createLogger(level: LogLevel) {
  // Factory so call sites don't depend on the class directly.
  return new Logger(level);
}

// Message text for log meta; thrown non-Errors are stringified.
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
