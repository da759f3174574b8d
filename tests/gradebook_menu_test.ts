import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";

import { runGradebookMenu, type GradebookDeps } from "../src/gradebook/menu.ts";
import type { GradebookConfig } from "../src/types.ts";
import { captureLogger, ScriptedPrompter, withTempDir } from "./helpers.ts";

function setup(answers: string[], config: Partial<GradebookConfig> = {}) {
  const printed: string[] = [];
  const { logger, entries } = captureLogger();
  const prompter = new ScriptedPrompter(answers);
  const deps: GradebookDeps = {
    prompter,
    print: (line) => printed.push(line),
    logger,
    config: { logLevel: "debug", passMark: 40, ...config },
  };
  return { deps, printed, entries, prompter };
}

test("manual input reprompts bad marks and prints the analysis", async () => {
  // Arrange: two students, the second one first typed with bad marks
  const { deps, printed } = setup(["1", "2", "Ann", "92", "Bob", "abc", "35", "3"]);

  // Act
  await runGradebookMenu(deps);

  // Assert
  assert.ok(printed.includes("Invalid marks (marks: must be a whole number). Enter a whole number between 0 and 100."));
  assert.ok(printed.some((line) => line.includes("Average Score: 63.50")));
  assert.ok(printed.some((line) => line.includes("Failed Students (< 40): Bob")));
  assert.ok(printed.includes("Run analysis again?"));
  assert.equal(printed[printed.length - 1], "Thank you for using GradeBook Analyzer!");
});

test("the student count must be a whole number in range", async () => {
  const { deps, printed, prompter } = setup(["1", "zero", "0", "1", "Ann", "50", "3"]);

  await runGradebookMenu(deps);

  assert.equal(printed.filter((line) => line === "Please enter a whole number between 1 and 500.").length, 2);
  assert.equal(prompter.questions.filter((question) => question === "Enter number of students: ").length, 3);
});

test("empty names are reprompted", async () => {
  const { deps, printed } = setup(["1", "1", "  ", "Ann", "50", "3"]);

  await runGradebookMenu(deps);

  assert.ok(printed.includes("Input cannot be empty. Please try again."));
  assert.ok(printed.some((line) => line.includes("Passed Students (>= 40): Ann")));
});

test("a missing CSV file reports no data and shows the menu again", async () => {
  await withTempDir(async (dir) => {
    const { deps, printed, entries } = setup(["2", join(dir, "nope.csv"), "3"]);

    await runGradebookMenu(deps);

    assert.ok(printed.includes("Error: Could not read CSV file."));
    assert.ok(printed.includes("No data loaded. Try again."));
    assert.ok(entries.some((entry) => entry.startsWith("ERROR Grade file not found")));
  });
});

test("a directory given as the CSV file is reported and the menu shows again", async () => {
  await withTempDir(async (dir) => {
    const { deps, printed, entries } = setup(["2", dir, "3"]);

    await runGradebookMenu(deps);

    assert.ok(printed.includes("Error: Could not read CSV file."));
    assert.ok(printed.includes("No data loaded. Try again."));
    assert.ok(entries.some((entry) => entry.startsWith("ERROR Failed to read grade file")));
    assert.equal(printed[printed.length - 1], "Thank you for using GradeBook Analyzer!");
  });
});

test("CSV input skips malformed rows and saves the report", async () => {
  await withTempDir(async (dir) => {
    // Arrange
    const csvPath = join(dir, "grades.csv");
    const reportPath = join(dir, "out", "report.txt");
    await writeFile(csvPath, "Ann,92\nBob\nCy,40\n", "utf-8");
    const { deps, printed } = setup(["2", csvPath, "3"], { reportPath });

    // Act
    await runGradebookMenu(deps);

    // Assert
    assert.ok(printed.includes("Skipped 1 malformed row(s)."));
    assert.ok(printed.includes("CSV loaded successfully!"));
    assert.ok(printed.includes(`Report saved to ${reportPath}`));

    const report = await readFile(reportPath, "utf-8");
    assert.ok(report.startsWith("---- Statistics Summary ----\nStudents     : 2\n"));
    assert.ok(report.endsWith("-\n"));
  });
});

test("invalid choices are reported", async () => {
  const { deps, printed } = setup(["9", "3"]);

  await runGradebookMenu(deps);

  assert.ok(printed.includes("Invalid choice! Try again."));
});

test("end of input exits cleanly", async () => {
  const { deps, printed } = setup([]);

  await runGradebookMenu(deps);

  assert.equal(printed[printed.length - 1], "Input closed. Exiting GradeBook Analyzer.");
});

test("end of input during manual entry exits cleanly", async () => {
  const { deps, printed } = setup(["1", "2", "Ann"]);

  await runGradebookMenu(deps);

  assert.equal(printed[printed.length - 1], "Input closed. Exiting GradeBook Analyzer.");
});
