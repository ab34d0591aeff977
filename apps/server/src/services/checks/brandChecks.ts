import type { CampaignSubmission, SectionOutcome, Violation } from "../../types/compliance.js";
import { rulesInGroup } from "../rules/a2pRuleCatalog.js";
import { chargedMatches, totalPenalty, violationFor } from "./violation.js";

/**
 * Brand identity and category review (A).
 * Website and use-case rules are charged per their catalog `matchMode`.
 */
export function checkBrand(submission: CampaignSubmission): SectionOutcome {
  const violations: Violation[] = [];
  const websiteContent = submission.websiteContent ?? "";

  for (const rule of [...rulesInGroup("third_party_collection"), ...rulesInGroup("prohibited_content")]) {
    for (const match of chargedMatches(rule, websiteContent, { source: "website_content" })) {
      violations.push(violationFor(rule, { match }));
    }
  }

  const useCase = submission.useCase ?? "";
  for (const rule of rulesInGroup("use_case")) {
    for (const match of chargedMatches(rule, useCase, { source: "use_case" })) {
      violations.push(violationFor(rule, { match }));
    }
  }

  return { violations, penalty: totalPenalty(violations) };
}
