import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";

import { errorMessage, isLogLevel, Logger } from "../src/logger.ts";
import { withTempDir } from "./helpers.ts";

test("Logger drops lines below its level", () => {
  // Arrange
  const lines: string[] = [];
  const logger = new Logger("warn", { sink: (_level, line) => lines.push(line) });

  // Act
  logger.debug("debug line");
  logger.info("info line");
  logger.warn("warn line");
  logger.error("error line", { code: 7 });

  // Assert
  assert.equal(lines.length, 2);
  assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN warn line$/);
  assert.match(lines[1], /^\[[^\]]+\] ERROR error line \{"code":7\}$/);
});

test("Logger appends to its log file, creating the directory", async () => {
  await withTempDir(async (dir) => {
    const filePath = join(dir, "logs", "run.log");

    new Logger("info", { filePath, sink: () => {} }).info("first");
    new Logger("info", { filePath, sink: () => {} }).info("second");

    const lines = (await readFile(filePath, "utf-8")).trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0], / INFO first$/);
    assert.match(lines[1], / INFO second$/);
  });
});

test("isLogLevel only accepts the four levels", () => {
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("toString"), false);
  assert.equal(isLogLevel(undefined), false);
});

test("errorMessage normalizes anything thrown", () => {
  assert.equal(errorMessage(new Error("disk full")), "disk full");
  assert.equal(errorMessage(42), "42");
});
