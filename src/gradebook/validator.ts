import { z } from "zod";

import type { CsvRow } from "../csv.ts";
import type { LoadResult, ValidationResult } from "../types.ts";
import { validateWith } from "../validation.ts";
import type { GradeRecord } from "./types.ts";

// Marks arrive as text (CSV cell or typed answer) and must be a whole number 0-100
const marksSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "must be a whole number")
  .transform(Number)
  .pipe(z.number().min(0, "must be between 0 and 100").max(100, "must be between 0 and 100"));

const gradeRecordSchema = z.object({
  name: z.string().trim().min(1, "must be a non-empty string"),
  marks: marksSchema,
});

/**
 * Validate one name/marks pair and return a typed GradeRecord or the reasons it was rejected.
 */
export function validateGradeRecord(name: string, marks: string): ValidationResult<GradeRecord> {
  return validateWith(gradeRecordSchema, { name, marks });
}

/**
 * Turn header-less `name,marks` rows into records.
 * Rows with the wrong number of cells or bad values are skipped, one message each.
 */
export function parseGradeRows(rows: readonly CsvRow[], source: string): LoadResult<GradeRecord> {
  const records: GradeRecord[] = [];
  const errors: string[] = [];

  for (const row of rows) {
    if (row.cells.length !== 2) {
      errors.push(`${source}:${row.line}: expected 2 columns (name,marks), found ${row.cells.length}`);
      continue;
    }

    const [name, marks] = row.cells;
    const result = validateGradeRecord(name, marks);
    if (result.ok) {
      records.push(result.value);
    } else {
      // Prefix each error with the location for clarity
      result.errors.forEach((error) => errors.push(`${source}:${row.line}: ${error}`));
    }
  }

  return { records, errors };
}
