import test from "node:test";
import assert from "node:assert/strict";
import {
  CHECK_FIRST_N_MESSAGES,
  formatRuleMessage,
  getRule,
  listRules,
  RULES_VERSION,
  rulesInGroup
} from "../src/services/rules/a2pRuleCatalog.js";

test("catalog is versioned and enumerable without running checkers", () => {
  assert.equal(RULES_VERSION, "v1.0");
  assert.equal(listRules().length, 27);
  assert.equal(rulesInGroup("third_party_collection").length, 4);
  assert.equal(rulesInGroup("prohibited_content").length, 7);
  assert.equal(rulesInGroup("placeholder").length, 3);
  assert.equal(rulesInGroup("threatening_language").length, 4);
});

test("every rule carries a positive penalty and a code-prefixed label", () => {
  for (const rule of listRules()) {
    assert.ok(rule.penalty > 0, rule.ruleId);
    assert.ok(rule.label.startsWith(`${rule.code}: `), rule.ruleId);
    assert.ok(rule.citationRef.length > 0, rule.ruleId);
  }
});

test("smallest penalty is the domain parse failure, cheaper than a mismatch", () => {
  const minimum = Math.min(...listRules().map((rule) => rule.penalty));
  assert.equal(minimum, 3);
  assert.ok(getRule("url.email_domain_unverifiable").penalty < getRule("url.email_domain_mismatch").penalty);
});

test("brandname placeholder has no rule", () => {
  const tokens = rulesInGroup("placeholder").map((rule) => rule.term);
  assert.deepEqual(tokens, ["{{url}}", "{{company}}", "{{agentname}}"]);
});

test("formatRuleMessage fills term and positional slots", () => {
  assert.equal(
    formatRuleMessage(getRule("template.placeholder.company"), { index: 2 }),
    "C2: Prohibited placeholder {{company}} in message 2"
  );
  assert.equal(
    formatRuleMessage(getRule("url.email_domain_mismatch"), { emailDomain: "x.com", websiteDomain: "y.com" }),
    "D2: Support email domain (x.com) does not match website domain (y.com)"
  );
});

test("only the first sample message is checked for opt-out language", () => {
  assert.equal(CHECK_FIRST_N_MESSAGES, 1);
});
