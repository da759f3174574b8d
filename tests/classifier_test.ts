import assert from "node:assert/strict";
import { test } from "node:test";

import { assignGrade, COURSE_PASS_MARK, gradeDistribution, hasPassed, partitionByPass } from "../src/classifier.ts";

test("assignGrade uses closed, non-overlapping bands", () => {
  assert.equal(assignGrade(100), "A");
  assert.equal(assignGrade(90), "A");
  assert.equal(assignGrade(89), "B");
  assert.equal(assignGrade(80), "B");
  assert.equal(assignGrade(79), "C");
  assert.equal(assignGrade(70), "C");
  assert.equal(assignGrade(69), "D");
  assert.equal(assignGrade(60), "D");
  assert.equal(assignGrade(59), "F");
  assert.equal(assignGrade(0), "F");
});

test("assignGrade is total over fractional scores", () => {
  assert.equal(assignGrade(89.99), "B");
  assert.equal(assignGrade(-3), "F");
});

test("hasPassed passes at exactly 40", () => {
  assert.equal(COURSE_PASS_MARK, 40);
  assert.equal(hasPassed(40), true);
  assert.equal(hasPassed(39), false);
  assert.equal(hasPassed(49, 50), false);
});

test("partitionByPass puts every record in exactly one list, order kept", () => {
  // Arrange
  const records = [
    { name: "Ann", marks: 92 },
    { name: "Bob", marks: 35 },
    { name: "Cy", marks: 40 },
    { name: "Di", marks: 39 },
  ];

  // Act
  const { passed, failed } = partitionByPass(records, (record) => record.marks);

  // Assert: exhaustive and disjoint
  assert.deepEqual(passed.map((record) => record.name), ["Ann", "Cy"]);
  assert.deepEqual(failed.map((record) => record.name), ["Bob", "Di"]);
  assert.equal(passed.length + failed.length, records.length);
});

test("gradeDistribution always lists all five bands", () => {
  assert.deepEqual(gradeDistribution(["A", "A", "F"]), { A: 2, B: 0, C: 0, D: 0, F: 1 });
  assert.deepEqual(gradeDistribution([]), { A: 0, B: 0, C: 0, D: 0, F: 0 });
});
