import type { CampaignSubmission, SectionOutcome, Violation } from "../../types/compliance.js";
import { containsMatch } from "../textMatcher.js";
import { CHECK_FIRST_N_MESSAGES, getRule, rulesInGroup } from "../rules/a2pRuleCatalog.js";
import { chargedItems, chargedMatches, totalPenalty, violationFor } from "./violation.js";

export function checkOptIn(submission: CampaignSubmission): SectionOutcome {
  const violations: Violation[] = [];
  const description = submission.optInDescription ?? "";

  for (const rule of rulesInGroup("consent_method")) {
    for (const match of chargedMatches(rule, description, { source: "opt_in_description" })) {
      violations.push(violationFor(rule, { match }));
    }
  }

  // No sample messages means there is nothing to inspect, not a missing opt-out.
  const stopRule = getRule("opt_in.missing_stop");
  const stopPattern = stopRule.pattern ?? "stop";
  const lacking = (submission.sampleMessages ?? [])
    .slice(0, CHECK_FIRST_N_MESSAGES)
    .filter((message) => !containsMatch(message, stopPattern));
  violations.push(...chargedItems(stopRule, lacking).map(() => violationFor(stopRule)));

  return { violations, penalty: totalPenalty(violations) };
}
