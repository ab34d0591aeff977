import type { CampaignSubmission, SectionOutcome } from "../../types/compliance.js";

/**
 * FDCPA / TCPA / CTIA disclosure checks (I). No rules are active yet; the stage
 * stays in the pipeline so new disclosure rules slot in without reordering.
 */
export function checkRegulatory(_submission: CampaignSubmission): SectionOutcome {
  return { violations: [], penalty: 0 };
}
