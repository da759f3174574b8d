import assert from "node:assert/strict";
import { test } from "node:test";

import {
  loadEnergyConfig,
  loadGradebookConfig,
  loadLibraryConfig,
  loadWeatherConfig,
  parseBoolean,
  parseLogLevel,
  parseNumber,
  reportConfigIssues,
} from "../src/config.ts";
import { COURSE_PASS_MARK } from "../src/classifier.ts";
import { captureLogger } from "./helpers.ts";

test("gradebook defaults apply when nothing is set", () => {
  const config = loadGradebookConfig({});

  assert.equal(config.logLevel, "info");
  // The course boundary unless GRADEBOOK_PASS_MARK says otherwise
  assert.equal(config.passMark, COURSE_PASS_MARK);
  assert.equal(config.passMark, 40);
  assert.equal(config.reportPath, undefined);
  assert.equal(config.chartDir, undefined);
  assert.equal(config.logFilePath, undefined);
});

test("an out-of-range pass mark is rejected", () => {
  assert.throws(
    () => loadGradebookConfig({ GRADEBOOK_PASS_MARK: "140" }),
    /^Error: Invalid gradebook configuration: passMark: /,
  );
});

test("energy log file sits in the output directory", () => {
  const config = loadEnergyConfig({ ENERGY_OUTPUT_DIR: "out", ENERGY_CHARTS: "off" });

  assert.equal(config.dataDir, "data");
  assert.equal(config.outputDir, "out");
  assert.equal(config.logFilePath, "out/ingest.log");
  assert.equal(config.charts, false);
});

test("LOG_FILE_PATH overrides the per-tool log file", () => {
  const config = loadLibraryConfig({ LOG_FILE_PATH: "logs/all.log" });
  assert.equal(config.logFilePath, "logs/all.log");
  assert.equal(config.catalogPath, "books_catalog.json");
});

test("library and weather defaults", () => {
  assert.equal(loadLibraryConfig({}).logFilePath, "library.log");

  const weather = loadWeatherConfig({ LOG_LEVEL: "DEBUG" });
  assert.equal(weather.csvPath, "weather.csv");
  assert.equal(weather.outputDir, "output");
  assert.equal(weather.charts, true);
  assert.equal(weather.logLevel, "debug");
});

test("parse helpers fall back on unusable values", () => {
  assert.equal(parseNumber("12", 5), 12);
  assert.equal(parseNumber("abc", 5), 5);
  assert.equal(parseNumber("-3", 5), 5);
  assert.equal(parseNumber(undefined, 5), 5);

  assert.equal(parseBoolean("YES", false), true);
  assert.equal(parseBoolean("0", true), false);
  assert.equal(parseBoolean("maybe", true), true);

  assert.equal(parseLogLevel("warn"), "warn");
  assert.equal(parseLogLevel("loud"), "info");
});

test("reportConfigIssues warns about an unknown LOG_LEVEL", () => {
  const { logger, entries } = captureLogger();

  reportConfigIssues({ LOG_LEVEL: "loud" }, logger);
  reportConfigIssues({ LOG_LEVEL: "warn" }, logger);

  assert.deepEqual(entries, ['WARN Unknown LOG_LEVEL; using info {"value":"loud"}']);
});
