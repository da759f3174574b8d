import { config as loadDotenv } from "dotenv";
// ^ Loads variables from a .env file into process.env.
//   Optional: without a .env file the defaults below apply.

import { z } from "zod";

import { COURSE_PASS_MARK } from "./classifier.ts";
import { isLogLevel, type Logger } from "./logger.ts";
import { validateWith } from "./validation.ts";
import type {
  CommonConfig,
  EnergyConfig,
  GradebookConfig,
  LibraryConfig,
  LogLevel,
  WeatherConfig,
} from "./types.ts";

// Environment snapshot the loaders read from. Defaults to process.env,
// tests hand in a plain object instead.
export type Env = Record<string, string | undefined>;

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const pathSchema = z.string().trim().min(1);

const commonSchema = z.object({
  logLevel: logLevelSchema,
  logFilePath: pathSchema.optional(),
});

const gradebookSchema = commonSchema.extend({
  reportPath: pathSchema.optional(),
  chartDir: pathSchema.optional(),
  passMark: z.number().int().min(0).max(100),
});

const energySchema = commonSchema.extend({
  dataDir: pathSchema,
  outputDir: pathSchema,
  charts: z.boolean(),
});

const librarySchema = commonSchema.extend({
  catalogPath: pathSchema,
});

const weatherSchema = commonSchema.extend({
  csvPath: pathSchema,
  outputDir: pathSchema,
  charts: z.boolean(),
});

/**
 * Load .env into process.env. A missing .env file is fine; anything else
 * (permissions, unreadable file) is rethrown.
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : undefined);
  if (result.error && !isMissingFileError(result.error)) {
    throw result.error;
  }
}

function isMissingFileError(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

/**
 * Safe parsing helper for numeric env vars.
 * Rejects NaN and negative numbers and falls back instead.
 */
export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) return fallback;

  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
}

/**
 * "true"/"1"/"yes"/"on" and their opposites; anything else uses the fallback.
 */
export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return fallback;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

function optionalPath(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// zod reports every broken field at once; turn that into one readable error
function validated<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  const result = validateWith(schema, raw);
  if (!result.ok) {
    throw new Error(`Invalid ${label} configuration: ${result.errors.join("; ")}`);
  }
  return result.value;
}

function commonConfig(env: Env, defaultLogFile?: string): CommonConfig {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFilePath: optionalPath(env.LOG_FILE_PATH) ?? defaultLogFile,
  };
}

export function loadGradebookConfig(env: Env = process.env): GradebookConfig {
  return validated(gradebookSchema, {
    ...commonConfig(env),
    reportPath: optionalPath(env.GRADEBOOK_REPORT_PATH),
    chartDir: optionalPath(env.GRADEBOOK_CHART_DIR),
    passMark: parseNumber(env.GRADEBOOK_PASS_MARK, COURSE_PASS_MARK),
  }, "gradebook");
}

export function loadEnergyConfig(env: Env = process.env): EnergyConfig {
  const outputDir = optionalPath(env.ENERGY_OUTPUT_DIR) ?? "output";
  return validated(energySchema, {
    // The ingest log sits next to the generated outputs
    ...commonConfig(env, `${outputDir}/ingest.log`),
    dataDir: optionalPath(env.ENERGY_DATA_DIR) ?? "data",
    outputDir,
    charts: parseBoolean(env.ENERGY_CHARTS, true),
  }, "energy");
}

export function loadLibraryConfig(env: Env = process.env): LibraryConfig {
  return validated(librarySchema, {
    ...commonConfig(env, optionalPath(env.LIBRARY_LOG_PATH) ?? "library.log"),
    catalogPath: optionalPath(env.LIBRARY_CATALOG_PATH) ?? "books_catalog.json",
  }, "library");
}

export function loadWeatherConfig(env: Env = process.env): WeatherConfig {
  return validated(weatherSchema, {
    ...commonConfig(env),
    csvPath: optionalPath(env.WEATHER_CSV_PATH) ?? "weather.csv",
    outputDir: optionalPath(env.WEATHER_OUTPUT_DIR) ?? "output",
    charts: parseBoolean(env.WEATHER_CHARTS, true),
  }, "weather");
}

/**
 * Warn about settings that were present but unusable and silently replaced by defaults.
 */
export function reportConfigIssues(env: Env, logger: Logger): void {
  const rawLevel = env.LOG_LEVEL?.trim();
  if (rawLevel && !isLogLevel(rawLevel.toLowerCase())) {
    logger.warn("Unknown LOG_LEVEL; using info", { value: rawLevel });
  }
}
