import type { CategorizedRecommendations } from "../types/compliance.js";
import { RECOMMENDATION_RULES } from "./rules/a2pRuleCatalog.js";

/**
 * Remediation advice for a list of violation messages. Messages with no known
 * remedy contribute nothing. The result holds each recommendation once; callers
 * must not rely on its order.
 */
export function generateRecommendations(violations: string[]): string[] {
  const recommendations = new Set<string>();
  for (const violation of violations) {
    const lowered = violation.toLowerCase();
    const rule = RECOMMENDATION_RULES.find((entry) => lowered.includes(entry.match));
    if (rule) recommendations.add(rule.recommendation);
  }
  return Array.from(recommendations);
}

export function categorizeRecommendations(recommendations: string[]): CategorizedRecommendations {
  const categorized: CategorizedRecommendations = {
    criticalFixes: [],
    suggestedImprovements: [],
    bestPractices: []
  };

  for (const recommendation of recommendations) {
    const lowered = recommendation.toLowerCase();
    if (lowered.includes("required") || lowered.includes("must")) {
      categorized.criticalFixes.push(recommendation);
    } else if (lowered.includes("should") || lowered.includes("recommend")) {
      categorized.suggestedImprovements.push(recommendation);
    } else {
      categorized.bestPractices.push(recommendation);
    }
  }
  return categorized;
}
