export type Align = "left" | "right";

export interface Column {
  header: string;
  align?: Align;  // left by default; numbers read better right-aligned
}

const GAP = "  ";

function padCell(text: string, width: number, align: Align): string {
  return align === "right" ? text.padStart(width) : text.padEnd(width);
}

/**
 * Render rows as an aligned plain-text table:
 *
 *   Name   Marks  Grade
 *   -------------------
 *   Alice     85  B
 *   -------------------
 *
 * Missing cells render empty; trailing spaces are trimmed from every line.
 */
export function renderTable(columns: readonly Column[], rows: ReadonlyArray<ReadonlyArray<string>>): string {
  // Each column is as wide as its widest cell (header included)
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => (row[index] ?? "").length))
  );

  const renderLine = (cells: ReadonlyArray<string>) =>
    columns
      .map((column, index) => padCell(cells[index] ?? "", widths[index], column.align ?? "left"))
      .join(GAP)
      .trimEnd();

  const totalWidth = widths.reduce((acc, width) => acc + width, 0) + GAP.length * Math.max(columns.length - 1, 0);
  const rule = "-".repeat(totalWidth);

  const lines = [
    renderLine(columns.map((column) => column.header)),
    rule,
    ...rows.map(renderLine),
    rule,
  ];
  return lines.join("\n");
}

/**
 * Fixed-decimal formatting used across reports: 76.2 -> "76.20".
 */
export function formatNumber(value: number, decimals = 2): string {
  return value.toFixed(decimals);
}
