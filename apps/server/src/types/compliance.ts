export type ComplianceStatus = "approvable" | "rejection_likely";

export type ComplianceSection = "brand" | "opt_in" | "template" | "url" | "legal" | "regulatory";

/** Canonical checker order; violation lists are always reported in this order. */
export const SECTION_ORDER: readonly ComplianceSection[] = ["brand", "opt_in", "template", "url", "legal", "regulatory"];

export interface CampaignSubmission {
  id?: string;
  brandName?: string;
  brandWebsite?: string;
  websiteContent?: string;
  legalEntityName?: string;
  vertical?: string;
  useCase?: string;
  campaignDescription?: string;
  optInDescription?: string;
  sampleMessages?: string[];
  supportEmail?: string;
  supportPhone?: string;
  privacyUrl?: string;
  termsUrl?: string;
  urls?: string[];
  streetAddress?: string;
  companyEin?: string;
}

export interface TextMatch {
  text: string;
  offset: number;
  context: string;
  source?: string;
}

export interface Violation {
  ruleId: string;
  section: ComplianceSection;
  code: string;
  message: string;
  penalty: number;
  match?: TextMatch;
}

export interface SectionOutcome {
  violations: Violation[];
  penalty: number;
}

export type SectionChecker = (submission: CampaignSubmission) => SectionOutcome;

export interface ComplianceResult {
  status: ComplianceStatus;
  violations: string[];
  findings: Violation[];
  recommendations: string[];
  confidenceScore: number;
  score: number;
  compliant: boolean;
  rulesVersion: string;
}

export interface BatchComplianceResult extends ComplianceResult {
  communicationId: string;
}

export interface ComplianceSummary {
  totalCommunications: number;
  approvableCount: number;
  rejectionLikelyCount: number;
  approvalRate: number;
  averageScore: number;
  commonViolations: Record<string, number>;
}

export interface MessageBatchSummary {
  totalMessages: number;
  compliantMessages: number;
  complianceRate: number;
  averageScore: number;
  recommendation: "approved" | "needs_review";
}

export interface MessageBatchResult {
  batchResults: Array<ComplianceResult & { messageId: string; messageIndex: number }>;
  summary: MessageBatchSummary;
  context: CampaignSubmission;
}

export type FinalAction = "SUBMIT" | "REVIEW_AND_FIX" | "DO_NOT_SUBMIT";

export interface FinalRecommendation {
  action: FinalAction;
  confidence: "HIGH" | "MEDIUM";
  message: string;
}

export interface CategorizedRecommendations {
  criticalFixes: string[];
  suggestedImprovements: string[];
  bestPractices: string[];
}

/**
 * Structured hook for callers that want to trace an evaluation.
 * The engine only calls it; it never writes output itself.
 */
export interface EvaluationObserver {
  sectionEvaluated?(section: ComplianceSection, outcome: SectionOutcome): void;
  evaluationCompleted?(result: ComplianceResult): void;
}
