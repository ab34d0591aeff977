import type { ComplianceStatus, SectionOutcome } from "../types/compliance.js";

export const MAX_SCORE = 100;
export const APPROVABLE_SCORE = 99;

const CONFIDENCE_BANDS: ReadonlyArray<{ minScore: number; confidence: number }> = [
  { minScore: 99, confidence: 0.99 },
  { minScore: 90, confidence: 0.85 },
  { minScore: 80, confidence: 0.7 }
];
const FLOOR_CONFIDENCE = 0.5;

export interface ScoreBreakdown {
  totalPenalty: number;
  score: number;
  status: ComplianceStatus;
  confidenceScore: number;
}

export function aggregateScore(outcomes: SectionOutcome[]): ScoreBreakdown {
  const totalPenalty = outcomes.reduce((sum, outcome) => sum + outcome.penalty, 0);
  const violationCount = outcomes.reduce((sum, outcome) => sum + outcome.violations.length, 0);
  const score = Math.max(0, MAX_SCORE - totalPenalty);
  return {
    totalPenalty,
    score,
    status: deriveStatus(score, violationCount),
    confidenceScore: confidenceForScore(score)
  };
}

/**
 * Approvable needs both a passing score and no violations at all; a low-penalty
 * violation alone is enough to reject.
 */
export function deriveStatus(score: number, violationCount: number): ComplianceStatus {
  return score >= APPROVABLE_SCORE && violationCount === 0 ? "approvable" : "rejection_likely";
}

export function confidenceForScore(score: number): number {
  return CONFIDENCE_BANDS.find((band) => score >= band.minScore)?.confidence ?? FLOOR_CONFIDENCE;
}

/** Rounds to `decimals` places; exact halves go to the even neighbour. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const remainder = scaled - floor;
  if (remainder > 0.5) return (floor + 1) / factor;
  if (remainder < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}
