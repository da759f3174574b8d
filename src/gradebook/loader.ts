import { parseCsv } from "../csv.ts";
import { readTextFile } from "../files.ts";
import type { LoadResult } from "../types.ts";
import type { GradeRecord } from "./types.ts";
import { parseGradeRows } from "./validator.ts";

export type GradeFileResult =
  | { found: false; readError?: string }  // readError is set when the path exists but can't be read
  | ({ found: true } & LoadResult<GradeRecord>);

/**
 * Read a header-less `name,marks` CSV.
 * Malformed rows are skipped and reported in `errors`; a missing or unreadable file is reported via `found`.
 */
export async function loadGradesCsv(path: string): Promise<GradeFileResult> {
  const read = await readTextFile(path);
  if (read.status === "not_found") return { found: false };
  if (read.status === "failed") return { found: false, readError: read.error };

  const { records, errors } = parseGradeRows(parseCsv(read.text), path);
  return { found: true, records, errors };
}
