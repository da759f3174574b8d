// Letter grades are a "string literal union": nothing else can be assigned
export type LetterGrade = "A" | "B" | "C" | "D" | "F";

// Display order for distributions and reports
export const LETTER_GRADES: readonly LetterGrade[] = ["A", "B", "C", "D", "F"];

// Lower bound of each band. Checked top-down, so the bands never overlap:
// 90+ is A, 80-89 is B, 70-79 is C, 60-69 is D, anything below is F
const GRADE_THRESHOLDS: ReadonlyArray<[LetterGrade, number]> = [
  ["A", 90],
  ["B", 80],
  ["C", 70],
  ["D", 60],
];

// The course's fixed pass boundary. GRADEBOOK_PASS_MARK can move it for another
// course; reports always print the boundary they used.
export const COURSE_PASS_MARK = 40;

/**
 * Map a score to its letter grade. Total: every number lands in exactly one band.
 */
export function assignGrade(score: number): LetterGrade {
  for (const [grade, threshold] of GRADE_THRESHOLDS) {
    if (score >= threshold) return grade;
  }
  return "F";
}

export function hasPassed(score: number, passMark = COURSE_PASS_MARK): boolean {
  return score >= passMark;
}

/**
 * Split records into passed and failed. Every record lands in exactly one list
 * and input order is kept in both.
 */
export function partitionByPass<T>(
  records: readonly T[],
  score: (record: T) => number,
  passMark = COURSE_PASS_MARK,
): { passed: T[]; failed: T[] } {
  const passed: T[] = [];
  const failed: T[] = [];

  for (const record of records) {
    if (hasPassed(score(record), passMark)) {
      passed.push(record);
    } else {
      failed.push(record);
    }
  }

  return { passed, failed };
}

/**
 * Count grades per band. All five bands are present, zero counts included.
 */
export function gradeDistribution(grades: Iterable<LetterGrade>): Record<LetterGrade, number> {
  const distribution: Record<LetterGrade, number> = { A: 0, B: 0, C: 0, D: 0, F: 0 };
  for (const grade of grades) {
    distribution[grade] += 1;
  }
  return distribution;
}
