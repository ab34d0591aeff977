import type { CampaignSubmission, ComplianceResult, FinalRecommendation } from "../types/compliance.js";
import type { WebsiteAnalysis } from "../types/website.js";

export interface ReportInput {
  submission: CampaignSubmission;
  result: ComplianceResult;
  recommendation: FinalRecommendation;
  websiteAnalysis?: WebsiteAnalysis;
}

const RULE = "=".repeat(50);

export function generateReport({ submission, result, recommendation, websiteAnalysis }: ReportInput): string {
  const lines: string[] = [
    "A2P COMPLIANCE REPORT",
    RULE,
    "",
    "BRAND INFORMATION:",
    `• Brand Name: ${submission.brandName ?? "N/A"}`,
    `• Website: ${submission.brandWebsite ?? "N/A"}`,
    `• Use Case: ${submission.useCase ?? "N/A"}`,
    "",
    "COMPLIANCE ASSESSMENT:",
    `• Status: ${result.status.toUpperCase()}`,
    `• Score: ${result.score}/100`,
    `• Confidence: ${result.confidenceScore}`,
    "",
    `FINAL RECOMMENDATION: ${recommendation.action}`,
    recommendation.message,
    ""
  ];

  if (result.violations.length > 0) {
    lines.push("VIOLATIONS FOUND:", ...result.violations.map((violation) => `• ${violation}`), "");
  }
  if (result.recommendations.length > 0) {
    lines.push("RECOMMENDED ACTIONS:", ...result.recommendations.map((entry) => `• ${entry}`), "");
  }
  if (websiteAnalysis) {
    lines.push(`WEBSITE RISK LEVEL: ${websiteAnalysis.riskLevel}`);
    if (websiteAnalysis.complianceIssues.length > 0) {
      lines.push("WEBSITE ISSUES:", ...websiteAnalysis.complianceIssues.map((issue) => `• ${issue}`));
    }
  }

  return lines.join("\n");
}
