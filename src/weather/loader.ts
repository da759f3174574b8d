import { z } from "zod";

import { parseCsv, splitHeader, type CsvRow } from "../csv.ts";
import { parseTimestamp } from "../dates.ts";
import { readTextFile } from "../files.ts";
import type { LoadResult } from "../types.ts";
import { validateWith } from "../validation.ts";
import type { RawWeatherRecord, WeatherLoadResult } from "./types.ts";

type WeatherColumn = "date" | "temperature" | "humidity" | "rainfall";

// Accepted header names per column, compared after trimming and lower-casing
export const HEADER_ALIASES: Record<WeatherColumn, readonly string[]> = {
  date: ["date"],
  temperature: ["temperature", "temp", "temperature_c"],
  humidity: ["humidity"],
  rainfall: ["rainfall", "rain", "rainfall_mm"],
};

const COLUMNS: readonly WeatherColumn[] = ["date", "temperature", "humidity", "rainfall"];

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Anything that isn't a plain number becomes null and is filled in later
const measurementSchema = z
  .string()
  .trim()
  .transform((value) => (DECIMAL.test(value) ? Number(value) : null));

const weatherRowSchema = z.object({
  date: z
    .string()
    .trim()
    .min(1, "is missing")
    .transform((value, ctx) => {
      const date = parseTimestamp(value);
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date` });
        return z.NEVER;
      }
      return date;
    }),
  temperature: measurementSchema,
  humidity: measurementSchema,
  rainfall: measurementSchema,
});

export type ColumnIndexes = Record<WeatherColumn, number>;

/**
 * Locate each column in a lower-cased header.
 * Returns the names of the columns that could not be found instead when any are missing.
 */
export function resolveColumns(header: readonly string[]): { ok: true; indexes: ColumnIndexes } | { ok: false; missing: string[] } {
  const missing: string[] = [];
  const indexes: ColumnIndexes = { date: -1, temperature: -1, humidity: -1, rainfall: -1 };

  for (const column of COLUMNS) {
    const index = header.findIndex((name) => HEADER_ALIASES[column].includes(name));
    if (index === -1) {
      missing.push(column);
    } else {
      indexes[column] = index;
    }
  }

  return missing.length > 0 ? { ok: false, missing } : { ok: true, indexes };
}

export function parseWeatherRows(
  indexes: ColumnIndexes,
  body: readonly CsvRow[],
  source: string,
): LoadResult<RawWeatherRecord> {
  const records: RawWeatherRecord[] = [];
  const errors: string[] = [];

  for (const row of body) {
    const result = validateWith(weatherRowSchema, {
      date: row.cells[indexes.date] ?? "",
      temperature: row.cells[indexes.temperature] ?? "",
      humidity: row.cells[indexes.humidity] ?? "",
      rainfall: row.cells[indexes.rainfall] ?? "",
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
 * Read a weather CSV with a header row. Rows without a usable date are dropped;
 * unusable measurements are kept as null.
 */
export async function loadWeatherCsv(path: string): Promise<WeatherLoadResult> {
  const read = await readTextFile(path);
  if (read.status === "not_found") {
    return { status: "not_found", path };
  }
  if (read.status === "failed") {
    return { status: "unreadable", path, error: read.error };
  }

  const { header, body } = splitHeader(parseCsv(read.text));
  if (header.length === 0) {
    return { status: "ok", path, records: [], errors: [] };
  }

  const columns = resolveColumns(header);
  if (!columns.ok) {
    return { status: "missing_columns", path, missing: columns.missing };
  }

  return { status: "ok", path, ...parseWeatherRows(columns.indexes, body, path) };
}
