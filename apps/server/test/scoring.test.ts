import test from "node:test";
import assert from "node:assert/strict";
import { aggregateScore, confidenceForScore, deriveStatus, roundTo } from "../src/services/scoring.js";

test("confidenceForScore is a step function with fixed breakpoints", () => {
  assert.deepEqual(
    [100, 99, 98, 90, 89, 80, 79, 0].map(confidenceForScore),
    [0.99, 0.99, 0.85, 0.85, 0.7, 0.7, 0.5, 0.5]
  );
});

test("deriveStatus requires a passing score and zero violations", () => {
  assert.equal(deriveStatus(100, 0), "approvable");
  assert.equal(deriveStatus(99, 0), "approvable");
  assert.equal(deriveStatus(98, 0), "rejection_likely");
  assert.equal(deriveStatus(100, 1), "rejection_likely");
});

test("aggregateScore sums section penalties and clamps at zero", () => {
  const breakdown = aggregateScore([
    { violations: [], penalty: 60 },
    { violations: [], penalty: 50 }
  ]);
  assert.equal(breakdown.totalPenalty, 110);
  assert.equal(breakdown.score, 0);
  assert.equal(breakdown.confidenceScore, 0.5);
});

test("roundTo rounds to the requested decimals", () => {
  assert.equal(roundTo(66.6666, 2), 66.67);
  assert.equal(roundTo(84.96, 1), 85);
});

test("roundTo sends exact halves to the even neighbour", () => {
  assert.equal(roundTo(341 / 4, 1), 85.2);
  assert.equal(roundTo(87.5, 0), 88);
  assert.equal(roundTo(86.5, 0), 86);
  assert.equal(roundTo(87.5, 1), 87.5);
});
