import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Logger } from "../src/logger.ts";
import type { Prompter } from "../src/prompt.ts";
import type { LogLevel } from "../src/types.ts";

/**
 * Prompter that replays a fixed list of answers, then reports end of input.
 */
export class ScriptedPrompter implements Prompter {
  #answers: string[];
  readonly questions: string[] = [];
  closed = false;

  constructor(answers: string[]) {
    this.#answers = [...answers];
  }

  async ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return this.#answers.shift();
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Logger whose lines are collected instead of printed.
 * `entries` holds each line without its timestamp: 'WARN Skipped row {"a":1}'.
 */
export function captureLogger(level: LogLevel = "debug"): { logger: Logger; entries: string[] } {
  const entries: string[] = [];
  const logger = new Logger(level, {
    sink: (_level, line) => entries.push(line.replace(/^\[[^\]]+\] /, "")),
  });
  return { logger, entries };
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "coursework-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
