import { join } from "node:path";

import { savePng } from "../chart.ts";
import { writeTextFile } from "../files.ts";
import { errorMessage, type Logger } from "../logger.ts";
import { askInteger, askNonEmpty, type Printer, type Prompter } from "../prompt.ts";
import type { GradebookConfig } from "../types.ts";
import { analyzeGrades } from "./analyzer.ts";
import { loadGradesCsv } from "./loader.ts";
import { buildGradeCharts, renderGradebookReport } from "./report.ts";
import type { GradeRecord } from "./types.ts";
import { validateGradeRecord } from "./validator.ts";

export interface GradebookDeps {
  prompter: Prompter;
  print: Printer;
  logger: Logger;
  config: GradebookConfig;
}

const BANNER = [
  "====================================",
  "     Welcome to GradeBook Analyzer",
  "====================================",
];

const MENU = ["Menu:", "1. Manual Input", "2. Load from CSV", "3. Exit"];

// Largest roster accepted by manual input
const MAX_STUDENTS = 500;

/**
 * Ask for a roster one student at a time. Every answer is reprompted until valid.
 * Returns undefined if input ends part-way.
 */
export async function manualInput(deps: GradebookDeps): Promise<GradeRecord[] | undefined> {
  const { prompter, print } = deps;

  const count = await askInteger(prompter, "Enter number of students: ", print, { min: 1, max: MAX_STUDENTS });
  if (count === undefined) return undefined;

  const records: GradeRecord[] = [];
  for (let index = 0; index < count; index += 1) {
    const name = await askNonEmpty(prompter, "Enter student name: ", print);
    if (name === undefined) return undefined;

    // Typed marks go through the same validator as CSV cells
    while (true) {
      const marks = await prompter.ask("Enter marks: ");
      if (marks === undefined) return undefined;

      const result = validateGradeRecord(name, marks);
      if (result.ok) {
        records.push(result.value);
        break;
      }
      print(`Invalid marks (${result.errors.join("; ")}). Enter a whole number between 0 and 100.`);
    }
  }

  return records;
}

/**
 * Ask for a CSV path and load it. Missing or unreadable files and bad rows are reported, never fatal.
 */
export async function csvInput(deps: GradebookDeps): Promise<GradeRecord[] | undefined> {
  const { prompter, print, logger } = deps;

  const path = await askNonEmpty(prompter, "Enter CSV filename (example: data.csv): ", print);
  if (path === undefined) return undefined;

  const result = await loadGradesCsv(path);
  if (!result.found) {
    if (result.readError === undefined) {
      logger.error("Grade file not found", { path });
    } else {
      logger.error("Failed to read grade file", { path, error: result.readError });
    }
    print("Error: Could not read CSV file.");
    return [];
  }

  if (result.errors.length > 0) {
    // Skip bad rows with a warning and keep the good ones
    logger.warn("Grade file validation issues", { path, count: result.errors.length });
    result.errors.forEach((error) => logger.warn("Skipped row", { error }));
    print(`Skipped ${result.errors.length} malformed row(s).`);
  }

  logger.info("Loaded grade records", { path, count: result.records.length });
  if (result.records.length > 0) print("CSV loaded successfully!");
  return result.records;
}

/**
 * Print the analysis and write the optional report/chart outputs.
 */
export async function presentAnalysis(records: readonly GradeRecord[], deps: GradebookDeps): Promise<void> {
  const { print, logger, config } = deps;
  const analysis = analyzeGrades(records, config.passMark);
  const report = renderGradebookReport(analysis);

  print("");
  print(report);
  print("");

  if (config.reportPath) {
    try {
      await writeTextFile(config.reportPath, `${report}\n`);
      logger.info("Report saved", { path: config.reportPath });
      print(`Report saved to ${config.reportPath}`);
    } catch (error) {
      logger.error("Failed to save report", { path: config.reportPath, error: errorMessage(error) });
      print("Could not save the report file.");
    }
  }

  if (config.chartDir) {
    const chartPath = join(config.chartDir, "grade_charts.png");
    try {
      await savePng(buildGradeCharts(analysis), chartPath);
      logger.info("Chart saved", { path: chartPath });
      print(`Chart saved to ${chartPath}`);
    } catch (error) {
      logger.error("Failed to save chart", { path: chartPath, error: errorMessage(error) });
      print("Could not save the chart.");
    }
  }
}

/**
 * Main menu loop. Returns when the user picks Exit or input ends.
 */
export async function runGradebookMenu(deps: GradebookDeps): Promise<void> {
  const { prompter, print } = deps;

  print("");
  BANNER.forEach((line) => print(line));
  print("");

  while (true) {
    MENU.forEach((line) => print(line));
    const choice = await prompter.ask("Enter your choice: ");
    if (choice === undefined) {
      print("Input closed. Exiting GradeBook Analyzer.");
      return;
    }

    let records: GradeRecord[] | undefined;
    switch (choice.trim()) {
      case "1":
        records = await manualInput(deps);
        break;
      case "2":
        records = await csvInput(deps);
        if (records && records.length === 0) {
          print("No data loaded. Try again.");
          print("");
          continue;
        }
        break;
      case "3":
        print("Thank you for using GradeBook Analyzer!");
        return;
      default:
        print("Invalid choice! Try again.");
        print("");
        continue;
    }

    if (records === undefined) {
      print("Input closed. Exiting GradeBook Analyzer.");
      return;
    }

    await presentAnalysis(records, deps);
    print("Run analysis again?");
    print("");
  }
}
