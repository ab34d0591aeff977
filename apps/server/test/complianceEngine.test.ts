import test from "node:test";
import assert from "node:assert/strict";
import { SECTION_CHECKERS } from "../src/services/checks/index.js";
import { ComplianceEngine, finalRecommendation } from "../src/services/complianceEngine.js";
import type { CampaignSubmission, ComplianceSection, SectionOutcome } from "../src/types/compliance.js";

const legalLinks: CampaignSubmission = {
  privacyUrl: "https://example.com/privacy",
  termsUrl: "https://example.com/terms"
};

test("clean submission scores 100 and is approvable", () => {
  const result = new ComplianceEngine().evaluate({
    ...legalLinks,
    brandName: "Example Health",
    brandWebsite: "https://www.example.com",
    supportEmail: "help@example.com",
    sampleMessages: ["Example Health: your appointment is tomorrow. Reply STOP to opt out."],
    urls: ["https://www.example.com"]
  });

  assert.equal(result.score, 100);
  assert.equal(result.status, "approvable");
  assert.equal(result.compliant, true);
  assert.deepEqual(result.violations, []);
  assert.deepEqual(result.recommendations, []);
  assert.equal(result.confidenceScore, 0.99);
  assert.equal(result.rulesVersion, "v1.0");
});

test("third-party collection copy costs thirty points", () => {
  const result = new ComplianceEngine().evaluate({
    ...legalLinks,
    websiteContent: "we collect debts on behalf of regional lenders"
  });

  const brand = result.findings.filter((finding) => finding.section === "brand");
  assert.equal(brand.length, 1);
  assert.equal(brand[0]?.penalty, 30);
  assert.equal(result.score, 70);
  assert.equal(result.status, "rejection_likely");
  assert.equal(result.confidenceScore, 0.5);
  assert.deepEqual(result.recommendations, ["Remove all references to third-party debt collection from website"]);
});

test("a STOP instruction in the first message avoids the opt-in violation", () => {
  const result = new ComplianceEngine().evaluate({ ...legalLinks, sampleMessages: ["Reply STOP to end"] });
  assert.equal(result.violations.some((violation) => violation.includes("STOP")), false);
  assert.equal(result.score, 100);
});

test("company placeholder fires once while brandname is ignored", () => {
  const result = new ComplianceEngine().evaluate({
    ...legalLinks,
    sampleMessages: ["{{brandname}} and {{company}}: reply STOP to opt out"]
  });
  assert.deepEqual(result.violations, ["C2: Prohibited placeholder {{company}} in message 1"]);
  assert.equal(result.findings[0]?.penalty, 15);
  assert.equal(result.score, 85);
  assert.equal(result.confidenceScore, 0.7);
});

test("email and website domain mismatch is the minor penalty, not the parse failure", () => {
  const result = new ComplianceEngine().evaluate({
    ...legalLinks,
    supportEmail: "a@x.com",
    brandWebsite: "https://y.com"
  });
  assert.deepEqual(result.violations, ["D2: Support email domain (x.com) does not match website domain (y.com)"]);
  assert.equal(result.score, 95);
  assert.equal(result.status, "rejection_likely");
  assert.equal(result.confidenceScore, 0.85);
});

test("a violation keeps the status at rejection_likely even when the score still passes", () => {
  const lowPenalty = (): SectionOutcome => ({
    violations: [
      { ruleId: "regulatory.test", section: "regulatory", code: "I1", message: "I1: Disclosure wording unclear", penalty: 1 }
    ],
    penalty: 1
  });
  const engine = new ComplianceEngine({
    checkers: [...SECTION_CHECKERS.filter((entry) => entry.section !== "regulatory"), { section: "regulatory", check: lowPenalty }]
  });

  const result = engine.evaluate(legalLinks);
  assert.equal(result.score, 99);
  assert.equal(result.confidenceScore, 0.99);
  assert.equal(result.status, "rejection_likely");
  assert.equal(result.compliant, false);
});

test("score never drops below zero", () => {
  const result = new ComplianceEngine().evaluate({
    websiteContent:
      "third party debt collector, we collect debts on behalf of, debt collection agency, skip tracing, payday loan, crypto, credit repair"
  });
  assert.equal(result.score, 0);
  assert.equal(result.confidenceScore, 0.5);
});

test("violations follow section order whatever order checkers are supplied in", () => {
  const submission: CampaignSubmission = {
    useCase: "marketing",
    sampleMessages: ["Visit {{url}}"],
    urls: ["https://bit.ly/x"]
  };
  const expected = new ComplianceEngine().evaluate(submission).findings.map((finding) => finding.code);
  assert.deepEqual(expected, ["A2", "B1", "C2", "D1", "E1", "E1"]);

  const reversed = new ComplianceEngine({ checkers: [...SECTION_CHECKERS].reverse() });
  assert.deepEqual(
    reversed.evaluate(submission).findings.map((finding) => finding.code),
    expected
  );
});

test("observer sees every section and the final result", () => {
  const sections: ComplianceSection[] = [];
  let completed = 0;
  const engine = new ComplianceEngine({
    observer: {
      sectionEvaluated: (section) => sections.push(section),
      evaluationCompleted: () => {
        completed += 1;
      }
    }
  });

  engine.evaluate({});
  assert.deepEqual(sections, ["brand", "opt_in", "template", "url", "legal", "regulatory"]);
  assert.equal(completed, 1);
});

test("result serializes to plain JSON", () => {
  const result = new ComplianceEngine().evaluate({ websiteContent: "payday loan" });
  assert.deepEqual(JSON.parse(JSON.stringify(result)), result);
});

test("evaluateMany tags results with ids and summarize aggregates them", () => {
  const engine = new ComplianceEngine();
  const results = engine.evaluateMany([{ id: "camp-1", ...legalLinks }, {}]);

  assert.deepEqual(
    results.map((result) => [result.communicationId, result.score]),
    [
      ["camp-1", 100],
      ["unknown", 70]
    ]
  );

  assert.deepEqual(engine.summarize(results), {
    totalCommunications: 2,
    approvableCount: 1,
    rejectionLikelyCount: 1,
    approvalRate: 50,
    averageScore: 85,
    commonViolations: { E1: 2 }
  });
});

test("summarize rounds the approval rate and average score", () => {
  const engine = new ComplianceEngine();
  const results = engine.evaluateMany([legalLinks, legalLinks, { ...legalLinks, websiteContent: "crypto" }]);
  const summary = engine.summarize(results);
  assert.equal(summary.approvalRate, 66.67);
  assert.equal(summary.averageScore, 90);
  assert.deepEqual(summary.commonViolations, { A1: 1 });
});

test("summarize rounds an exact half average to the even digit", () => {
  const engine = new ComplianceEngine();
  const base = engine.evaluate(legalLinks);
  const results = [85, 85, 85, 86].map((score) => ({ ...base, score }));
  assert.equal(engine.summarize(results).averageScore, 85.2);
});

test("summarize of an empty batch is all zeros", () => {
  assert.deepEqual(new ComplianceEngine().summarize([]), {
    totalCommunications: 0,
    approvableCount: 0,
    rejectionLikelyCount: 0,
    approvalRate: 0,
    averageScore: 0,
    commonViolations: {}
  });
});

test("missing terms link maps to its recommendation", () => {
  const result = new ComplianceEngine().evaluate({
    privacyUrl: "https://example.com/privacy",
    sampleMessages: ["Reply STOP"]
  });
  assert.deepEqual(result.violations, ["E1: Terms & Conditions URL missing"]);
  assert.deepEqual(result.recommendations, ["Provide valid Terms & Conditions URL"]);
});

test("validateMessageBatch evaluates each message against the shared context", () => {
  const batch = new ComplianceEngine().validateMessageBatch(
    ["Reply STOP to opt out", "Final notice: pay now"],
    legalLinks
  );

  assert.deepEqual(
    batch.batchResults.map((result) => [result.messageId, result.messageIndex, result.score]),
    [
      ["msg_1", 1, 100],
      ["msg_2", 2, 75]
    ]
  );
  assert.deepEqual(batch.summary, {
    totalMessages: 2,
    compliantMessages: 1,
    complianceRate: 50,
    averageScore: 87.5,
    recommendation: "approved"
  });
});

test("finalRecommendation bands by status and score", () => {
  assert.equal(finalRecommendation({ status: "approvable", score: 100 }).action, "SUBMIT");
  assert.equal(finalRecommendation({ status: "rejection_likely", score: 99 }).action, "REVIEW_AND_FIX");
  assert.equal(finalRecommendation({ status: "rejection_likely", score: 90 }).confidence, "MEDIUM");
  assert.equal(finalRecommendation({ status: "rejection_likely", score: 89 }).action, "DO_NOT_SUBMIT");
});
