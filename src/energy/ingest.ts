import { readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import { z } from "zod";

import { parseCsv, splitHeader, type CsvRow } from "../csv.ts";
import { parseTimestamp } from "../dates.ts";
import { isNotFoundError, readTextFile } from "../files.ts";
import { errorMessage, type Logger } from "../logger.ts";
import type { LoadResult } from "../types.ts";
import { validateWith } from "../validation.ts";
import { BuildingManager } from "./building.ts";
import type { IngestResult } from "./types.ts";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const readingRowSchema = z.object({
  timestamp: z
    .string()
    .trim()
    .min(1, "is missing")
    .transform((value, ctx) => {
      const date = parseTimestamp(value);
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date-time` });
        return z.NEVER;
      }
      return date;
    }),
  kwh: z
    .string()
    .trim()
    .transform((value, ctx) => {
      if (!value || !DECIMAL.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: value ? "must be a number" : "is missing" });
        return z.NEVER;
      }
      return Number(value);
    })
    .pipe(z.number().finite("must be finite").nonnegative("must be non-negative")),
});

export interface ReadingRow {
  timestamp: Date;
  kwh: number;
}

/**
 * Building name from a file path: "data/Library.csv" -> "Library".
 */
export function buildingNameFromPath(path: string): string {
  return basename(path, extname(path));
}

/**
 * Validate the data rows of one energy CSV. The header row must already be split off.
 * Returns undefined when the header lacks a timestamp or kwh column.
 */
export function parseReadingRows(
  header: readonly string[],
  body: readonly CsvRow[],
  source: string,
): LoadResult<ReadingRow> | undefined {
  const timestampIndex = header.indexOf("timestamp");
  const kwhIndex = header.indexOf("kwh");
  if (timestampIndex === -1 || kwhIndex === -1) return undefined;

  const records: ReadingRow[] = [];
  const errors: string[] = [];

  for (const row of body) {
    const result = validateWith(readingRowSchema, {
      timestamp: row.cells[timestampIndex] ?? "",
      kwh: row.cells[kwhIndex] ?? "",
    });

    if (result.ok) {
      records.push(result.value);
    } else {
      result.errors.forEach((error) => errors.push(`${source}:${row.line}: ${error}`));
    }
  }

  return { records, errors };
}

/**
 * Read the given CSV files into buildings. A missing or unusable file is reported
 * and skipped; the remaining files are still processed.
 */
export async function ingestFiles(paths: readonly string[], logger: Logger): Promise<IngestResult> {
  const manager = new BuildingManager();
  const rowErrors: string[] = [];
  const fileErrors: string[] = [];
  let filesRead = 0;

  for (const path of paths) {
    const buildingName = buildingNameFromPath(path);
    logger.info("Reading meter file", { path, building: buildingName });

    const read = await readTextFile(path);
    if (read.status === "not_found") {
      fileErrors.push(`File not found: ${path}`);
      continue;
    }
    if (read.status === "failed") {
      fileErrors.push(`Failed to read ${path}: ${read.error}`);
      continue;
    }

    const { header, body } = splitHeader(parseCsv(read.text));
    if (header.length === 0) {
      // Empty file: nothing to load, not an error
      logger.warn("Meter file is empty", { path });
      continue;
    }

    const parsed = parseReadingRows(header, body, path);
    if (!parsed) {
      fileErrors.push(`File ${path} missing required columns (timestamp, kwh)`);
      continue;
    }

    const building = manager.getOrCreate(buildingName);
    parsed.records.forEach((row) => building.addReading(row.timestamp, row.kwh));
    rowErrors.push(...parsed.errors);
    filesRead += 1;

    logger.info("Loaded readings", {
      building: buildingName,
      valid: parsed.records.length,
      skipped: parsed.errors.length,
      totalKwh: building.totalConsumption(),
    });
  }

  return { readings: manager.combinedReadings(), rowErrors, fileErrors, filesRead };
}

/**
 * Ingest every *.csv in a directory, in file-name order.
 * A missing or unreadable directory, or one without CSV files, yields an empty result.
 */
export async function ingestDirectory(dataDir: string, logger: Logger): Promise<IngestResult> {
  let entries: string[];
  try {
    entries = await readdir(dataDir);
  } catch (error) {
    const reason = isNotFoundError(error)
      ? `Data directory ${dataDir} not found`
      : `Failed to read data directory ${dataDir}: ${errorMessage(error)}`;
    return { readings: [], rowErrors: [], fileErrors: [reason], filesRead: 0 };
  }

  const csvFiles = entries
    .filter((entry) => extname(entry).toLowerCase() === ".csv")
    .sort()
    .map((entry) => join(dataDir, entry));

  if (csvFiles.length === 0) {
    logger.warn("No CSV files found", { dataDir });
    return { readings: [], rowErrors: [], fileErrors: [], filesRead: 0 };
  }

  return ingestFiles(csvFiles, logger);
}
