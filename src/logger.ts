import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import type { LogLevel } from "./types.ts";

// LEVELS maps each log level to a numeric priority
// Higher numbers = more severe, so "warn" (30) outranks "info" (20)
const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// A sink receives every line that passes the level filter.
// The default sink writes to the console; tests pass their own to capture lines.
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  filePath?: string;  // Optional: append every line to this file as well
  sink?: LogSink;     // Replaces the console output
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVELS, value);
}

function consoleSink(level: LogLevel, line: string) {
  if (level === "error") {
    console.error(line);  // stderr
  } else if (level === "warn") {
    console.warn(line);   // stderr
  } else {
    console.log(line);    // stdout
  }
}

export class Logger {
  // Minimum level to log (everything below this is ignored)
  #level: LogLevel;
  #sink: LogSink;
  #filePath?: string;

  constructor(level: LogLevel, options: LoggerOptions = {}) {
    this.#level = level;
    this.#sink = options.sink ?? consoleSink;
    this.#filePath = options.filePath;

    if (this.#filePath) {
      // Make sure "output/ingest.log" can be created even when "output" doesn't exist yet
      const dir = dirname(this.#filePath);
      if (dir && dir !== ".") {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  get level(): LogLevel {
    return this.#level;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.#log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.#log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.#log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.#log("error", message, meta);
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVELS[level] < LEVELS[this.#level]) return;

    // [2026-01-07T10:30:45.123Z] INFO Loaded readings {"count":10}
    const timestamp = new Date().toISOString();
    const payload = meta ? ` ${JSON.stringify(meta)}` : "";
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`;

    this.#sink(level, line);

    if (this.#filePath) {
      // Log files are appended to; every other output file is rewritten per run
      appendFileSync(this.#filePath, `${line}\n`, "utf-8");
    }
  }
}

export function createLogger(level: LogLevel, options?: LoggerOptions) {
  return new Logger(level, options);
}

/**
 * Normalize anything thrown into a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
