import type { LetterGrade } from "../classifier.ts";
import type { SummaryStats } from "../types.ts";

// One student's line from the roster. Duplicate names are allowed;
// a record's only identity is its position in the list.
export interface GradeRecord {
  name: string;   // Trimmed, never empty
  marks: number;  // Whole number 0-100
}

// GradeRecord plus everything the Classifier derives from the marks
export interface GradedRecord extends GradeRecord {
  grade: LetterGrade;
  passed: boolean;
}

// What analyzeGrades() produces for a whole roster
export interface GradebookAnalysis {
  records: GradedRecord[];                       // Input order
  stats: SummaryStats | undefined;               // undefined for an empty roster
  distribution: Record<LetterGrade, number>;     // All five bands, zero counts included
  passed: string[];                              // Names, input order
  failed: string[];
  passMark: number;
}
