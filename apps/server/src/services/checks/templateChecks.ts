import type { CampaignSubmission, SectionOutcome, Violation } from "../../types/compliance.js";
import { SECONDARY_CONTEXT_RADIUS } from "../textMatcher.js";
import { rulesInGroup } from "../rules/a2pRuleCatalog.js";
import { chargedMatches, totalPenalty, violationFor } from "./violation.js";

/**
 * Message template review (C). Every occurrence in every message is penalised.
 * `{{brandname}}` is the one placeholder carriers accept and has no rule.
 */
export function checkTemplates(submission: CampaignSubmission): SectionOutcome {
  const violations: Violation[] = [];
  const rules = [...rulesInGroup("placeholder"), ...rulesInGroup("threatening_language")];

  (submission.sampleMessages ?? []).forEach((message, position) => {
    const index = position + 1;
    for (const rule of rules) {
      const matches = chargedMatches(rule, message, {
        radius: SECONDARY_CONTEXT_RADIUS,
        source: `message ${index}`
      });
      for (const match of matches) {
        violations.push(violationFor(rule, { values: { index }, match }));
      }
    }
  });

  return { violations, penalty: totalPenalty(violations) };
}
