import type { CampaignSubmission, SectionOutcome, Violation } from "../../types/compliance.js";
import { getRule } from "../rules/a2pRuleCatalog.js";
import { totalPenalty, violationFor } from "./violation.js";

export function checkLegal(submission: CampaignSubmission): SectionOutcome {
  const violations: Violation[] = [];
  if (isBlank(submission.privacyUrl)) violations.push(violationFor(getRule("legal.privacy_missing")));
  if (isBlank(submission.termsUrl)) violations.push(violationFor(getRule("legal.terms_missing")));
  return { violations, penalty: totalPenalty(violations) };
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}
