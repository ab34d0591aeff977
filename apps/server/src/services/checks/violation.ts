import type { TextMatch, Violation } from "../../types/compliance.js";
import type { A2pRuleMeta } from "../rules/a2pRuleCatalog.js";
import { formatRuleMessage } from "../rules/a2pRuleCatalog.js";
import type { MatchOptions } from "../textMatcher.js";
import { findMatches } from "../textMatcher.js";

/** Occurrences a rule is charged for: every one under `each`, the first under `once`. */
export function chargedMatches(rule: A2pRuleMeta, text: string, options: MatchOptions = {}): TextMatch[] {
  if (!rule.pattern) return [];
  return chargedItems(rule, findMatches(text, rule.pattern, options));
}

export function chargedItems<T>(rule: A2pRuleMeta, items: T[]): T[] {
  return rule.matchMode === "each" ? items : items.slice(0, 1);
}

export function violationFor(
  rule: A2pRuleMeta,
  options: { values?: Record<string, string | number>; match?: TextMatch | null } = {}
): Violation {
  return {
    ruleId: rule.ruleId,
    section: rule.section,
    code: rule.code,
    message: formatRuleMessage(rule, options.values),
    penalty: rule.penalty,
    ...(options.match ? { match: options.match } : {})
  };
}

export function totalPenalty(violations: Violation[]): number {
  return violations.reduce((sum, violation) => sum + violation.penalty, 0);
}
