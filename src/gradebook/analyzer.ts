import {
  assignGrade,
  COURSE_PASS_MARK,
  gradeDistribution,
  hasPassed,
  partitionByPass,
} from "../classifier.ts";
import { summarize } from "../stats.ts";
import type { GradebookAnalysis, GradedRecord, GradeRecord } from "./types.ts";

/**
 * Attach grade and pass/fail to every record. Input records are not modified.
 */
export function gradeRecords(records: readonly GradeRecord[], passMark = COURSE_PASS_MARK): GradedRecord[] {
  return records.map((record) => ({
    ...record,
    grade: assignGrade(record.marks),
    passed: hasPassed(record.marks, passMark),
  }));
}

/**
 * Analyze a roster: statistics, grade distribution and pass/fail lists.
 * This is the main function that transforms raw marks into the printed report.
 */
export function analyzeGrades(records: readonly GradeRecord[], passMark = COURSE_PASS_MARK): GradebookAnalysis {
  // STEP 1: Classify every record
  const graded = gradeRecords(records, passMark);

  // STEP 2: Count, mean, median, min, max over the marks
  const stats = summarize(graded.map((record) => record.marks));

  // STEP 3: How many students landed in each band
  const distribution = gradeDistribution(graded.map((record) => record.grade));

  // STEP 4: Pass/fail lists of names (every student in exactly one)
  const { passed, failed } = partitionByPass(graded, (record) => record.marks, passMark);

  return {
    records: graded,
    stats,
    distribution,
    passed: passed.map((record) => record.name),
    failed: failed.map((record) => record.name),
    passMark,
  };
}
