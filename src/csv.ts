import * as XLSX from "xlsx";

/**
 * One non-blank line of delimited text.
 * `line` is 1-based so it can go straight into "data.csv:3: ..." messages.
 */
export interface CsvRow {
  line: number;
  cells: string[];
}

// Cells arrive as strings (raw parsing), holes (missing cells) as undefined
function normalizeCells(row: readonly unknown[]): string[] {
  const cells = Array.from(row, (cell) => (cell === undefined || cell === null ? "" : String(cell).trim()));

  // A wider row elsewhere in the file pads every row; drop that padding again
  while (cells.length > 0 && cells[cells.length - 1] === "") {
    cells.pop();
  }
  return cells;
}

/**
 * Parse delimited text into rows of trimmed string cells.
 * Values are never type-converted here; validators decide what a cell means.
 * Blank lines are skipped but still count towards line numbers.
 */
export function parseCsv(text: string): CsvRow[] {
  // Empty file means empty result, not an error
  if (!text.trim()) return [];

  // raw: true keeps "007" and "2025-01-01" as the strings they were typed as
  const workbook = XLSX.read(text, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return [];

  // header: 1 -> arrays instead of objects; blankrows keeps indexes aligned with lines
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, blankrows: true });

  const result: CsvRow[] = [];
  rows.forEach((row, index) => {
    const cells = normalizeCells(row);
    if (cells.length === 0) return;
    result.push({ line: index + 1, cells });
  });
  return result;
}

/**
 * Split parsed rows into a header (lower-cased names) and data rows.
 */
export function splitHeader(rows: readonly CsvRow[]): { header: string[]; body: CsvRow[] } {
  const [first, ...body] = rows;
  if (!first) return { header: [], body: [] };
  return {
    header: first.cells.map((cell) => cell.toLowerCase()),
    body,
  };
}

/**
 * Serialize rows to CSV text. Cells are written as given; callers format numbers.
 */
export function toCsv(rows: ReadonlyArray<ReadonlyArray<string>>): string {
  if (rows.length === 0) return "";
  const sheet = XLSX.utils.aoa_to_sheet(rows.map((row) => [...row]));
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}
