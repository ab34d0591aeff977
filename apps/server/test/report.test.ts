import test from "node:test";
import assert from "node:assert/strict";
import { ComplianceEngine, finalRecommendation } from "../src/services/complianceEngine.js";
import { generateReport } from "../src/services/reportService.js";

test("report lists assessment, violations and recommended actions", () => {
  const submission = { brandName: "Example", brandWebsite: "https://example.com", useCase: "account notifications" };
  const result = new ComplianceEngine().evaluate({ ...submission, privacyUrl: "https://example.com/p" });
  const lines = generateReport({ submission, result, recommendation: finalRecommendation(result) }).split("\n");

  assert.equal(lines[0], "A2P COMPLIANCE REPORT");
  assert.ok(lines.includes("• Brand Name: Example"));
  assert.ok(lines.includes("• Status: REJECTION_LIKELY"));
  assert.ok(lines.includes("• Score: 85/100"));
  assert.ok(lines.includes("• Confidence: 0.7"));
  assert.ok(lines.includes("FINAL RECOMMENDATION: DO_NOT_SUBMIT"));
  assert.ok(lines.includes("• E1: Terms & Conditions URL missing"));
  assert.ok(lines.includes("• Provide valid Terms & Conditions URL"));
});

test("report adds website risk when an analysis is supplied", () => {
  const result = new ComplianceEngine().evaluate({ privacyUrl: "p", termsUrl: "t" });
  const report = generateReport({
    submission: {},
    result,
    recommendation: finalRecommendation(result),
    websiteAnalysis: {
      complianceIssues: ["Address not found on website or policy pages"],
      violationLocations: [],
      riskLevel: "LOW",
      debtMatchesFound: 0,
      marketingMatchesFound: 0,
      totalViolations: 0
    }
  });
  const lines = report.split("\n");

  assert.ok(lines.includes("• Brand Name: N/A"));
  assert.ok(lines.includes("FINAL RECOMMENDATION: SUBMIT"));
  assert.equal(lines.includes("VIOLATIONS FOUND:"), false);
  assert.ok(lines.includes("WEBSITE RISK LEVEL: LOW"));
  assert.equal(lines[lines.length - 1], "• Address not found on website or policy pages");
});
