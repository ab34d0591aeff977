import type {
  BatchComplianceResult,
  CampaignSubmission,
  ComplianceResult,
  ComplianceSection,
  ComplianceSummary,
  EvaluationObserver,
  FinalRecommendation,
  MessageBatchResult,
  SectionChecker,
  SectionOutcome
} from "../types/compliance.js";
import { SECTION_ORDER } from "../types/compliance.js";
import { SECTION_CHECKERS } from "./checks/index.js";
import { generateRecommendations } from "./recommendationService.js";
import { RULES_VERSION } from "./rules/a2pRuleCatalog.js";
import { aggregateScore, APPROVABLE_SCORE, roundTo } from "./scoring.js";

export interface ComplianceEngineOptions {
  observer?: EvaluationObserver;
  checkers?: ReadonlyArray<{ section: ComplianceSection; check: SectionChecker }>;
}

const UNKNOWN_COMMUNICATION_ID = "unknown";
const MESSAGE_BATCH_APPROVAL_SCORE = 80;

/**
 * Runs every section checker over a submission and folds the outcomes into a
 * single result. Evaluation is synchronous and touches no I/O.
 */
export class ComplianceEngine {
  readonly rulesVersion = RULES_VERSION;
  private readonly observer?: EvaluationObserver;
  private readonly checkers: ReadonlyArray<{ section: ComplianceSection; check: SectionChecker }>;

  constructor(options: ComplianceEngineOptions = {}) {
    this.observer = options.observer;
    this.checkers = [...(options.checkers ?? SECTION_CHECKERS)].sort(
      (a, b) => SECTION_ORDER.indexOf(a.section) - SECTION_ORDER.indexOf(b.section)
    );
  }

  evaluate(submission: CampaignSubmission): ComplianceResult {
    const outcomes: SectionOutcome[] = this.checkers.map(({ section, check }) => {
      const outcome = check(submission);
      this.observer?.sectionEvaluated?.(section, outcome);
      return outcome;
    });

    const findings = outcomes.flatMap((outcome) => outcome.violations);
    const violations = findings.map((finding) => finding.message);
    const { score, status, confidenceScore } = aggregateScore(outcomes);

    const result: ComplianceResult = {
      status,
      violations,
      findings,
      recommendations: generateRecommendations(violations),
      confidenceScore,
      score,
      compliant: status === "approvable",
      rulesVersion: this.rulesVersion
    };
    this.observer?.evaluationCompleted?.(result);
    return result;
  }

  evaluateMany(submissions: CampaignSubmission[]): BatchComplianceResult[] {
    return submissions.map((submission) => ({
      ...this.evaluate(submission),
      communicationId: submission.id ?? UNKNOWN_COMMUNICATION_ID
    }));
  }

  summarize(results: ComplianceResult[]): ComplianceSummary {
    const total = results.length;
    const approvable = results.filter((result) => result.compliant).length;
    const scoreSum = results.reduce((sum, result) => sum + result.score, 0);

    const commonViolations: Record<string, number> = {};
    for (const result of results) {
      for (const violation of result.violations) {
        const [prefix] = violation.split(":");
        commonViolations[prefix] = (commonViolations[prefix] ?? 0) + 1;
      }
    }

    return {
      totalCommunications: total,
      approvableCount: approvable,
      rejectionLikelyCount: total - approvable,
      approvalRate: total > 0 ? roundTo((approvable / total) * 100, 2) : 0,
      averageScore: total > 0 ? roundTo(scoreSum / total, 1) : 0,
      commonViolations
    };
  }

  /**
   * Evaluates each message on its own against a shared brand context, the way a
   * carrier reviews individual sample messages.
   */
  validateMessageBatch(messages: string[], context: CampaignSubmission = {}): MessageBatchResult {
    const batchResults = messages.map((message, position) => ({
      ...this.evaluate({ ...context, sampleMessages: [message] }),
      messageId: `msg_${position + 1}`,
      messageIndex: position + 1
    }));

    const total = batchResults.length;
    const compliant = batchResults.filter((result) => result.compliant).length;
    const averageScore = total > 0 ? batchResults.reduce((sum, result) => sum + result.score, 0) / total : 0;

    return {
      batchResults,
      summary: {
        totalMessages: total,
        compliantMessages: compliant,
        complianceRate: total > 0 ? roundTo((compliant / total) * 100, 2) : 0,
        averageScore: roundTo(averageScore, 1),
        recommendation: averageScore >= MESSAGE_BATCH_APPROVAL_SCORE ? "approved" : "needs_review"
      },
      context
    };
  }
}

export function finalRecommendation(result: Pick<ComplianceResult, "status" | "score">): FinalRecommendation {
  if (result.status === "approvable" && result.score >= APPROVABLE_SCORE) {
    return {
      action: "SUBMIT",
      confidence: "HIGH",
      message: "Campaign meets all compliance requirements and is ready for submission."
    };
  }
  if (result.score >= 90) {
    return {
      action: "REVIEW_AND_FIX",
      confidence: "MEDIUM",
      message: "Campaign has minor issues that should be addressed before submission."
    };
  }
  return {
    action: "DO_NOT_SUBMIT",
    confidence: "HIGH",
    message: "Campaign has critical compliance issues and will likely be rejected."
  };
}
