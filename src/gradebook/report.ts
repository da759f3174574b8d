import { barChart, histogram, stackCharts, type Chart } from "../chart.ts";
import { LETTER_GRADES } from "../classifier.ts";
import { formatNumber, renderTable } from "../table.ts";
import type { GradebookAnalysis } from "./types.ts";

// 78 -> "78", 78.5 -> "78.50"
function formatScore(value: number): string {
  return Number.isInteger(value) ? String(value) : formatNumber(value);
}

function nameList(names: readonly string[]): string {
  return names.length > 0 ? names.join(", ") : "(none)";
}

export function renderStatistics(analysis: GradebookAnalysis): string {
  const { stats } = analysis;
  if (!stats) return "---- Statistics Summary ----\nNo records to analyze.";

  return [
    "---- Statistics Summary ----",
    `Students     : ${stats.count}`,
    `Average Score: ${formatNumber(stats.mean)}`,
    `Median Score : ${formatScore(stats.median)}`,
    `Highest Score: ${formatScore(stats.max)}`,
    `Lowest Score : ${formatScore(stats.min)}`,
  ].join("\n");
}

export function renderDistribution(analysis: GradebookAnalysis): string {
  return [
    "---- Grade Distribution ----",
    ...LETTER_GRADES.map((grade) => `${grade}: ${analysis.distribution[grade]}`),
  ].join("\n");
}

export function renderPassFail(analysis: GradebookAnalysis): string {
  return [
    `Passed Students (>= ${analysis.passMark}): ${nameList(analysis.passed)}`,
    `Failed Students (< ${analysis.passMark}): ${nameList(analysis.failed)}`,
  ].join("\n");
}

export function renderResultsTable(analysis: GradebookAnalysis): string {
  return renderTable(
    [
      { header: "Name" },
      { header: "Marks", align: "right" },
      { header: "Grade" },
      { header: "Result" },
    ],
    analysis.records.map((record) => [
      record.name,
      String(record.marks),
      record.grade,
      record.passed ? "Pass" : "Fail",
    ]),
  );
}

/**
 * The full plain-text report, printed after every load and optionally saved to a file.
 */
export function renderGradebookReport(analysis: GradebookAnalysis): string {
  return [
    renderStatistics(analysis),
    renderDistribution(analysis),
    renderPassFail(analysis),
    renderResultsTable(analysis),
  ].join("\n\n");
}

/**
 * Grade distribution bars above a histogram of the raw marks.
 */
export function buildGradeCharts(analysis: GradebookAnalysis): Chart {
  const distribution = barChart({
    title: "Grade Distribution",
    xLabel: "Grade",
    yLabel: "Students",
    bars: LETTER_GRADES.map((grade) => ({ label: grade, value: analysis.distribution[grade] })),
  });

  const marks = histogram({
    title: "Marks Distribution",
    xLabel: "Marks",
    yLabel: "Count",
    values: analysis.records.map((record) => record.marks),
    bins: 10,
    range: [0, 100],
  });

  return stackCharts("GradeBook Analyzer", [distribution, marks]);
}
