import type { ComplianceSection } from "../../types/compliance.js";

export const RULES_VERSION = "v1.0";

/** How many leading sample messages must carry opt-out language. */
export const CHECK_FIRST_N_MESSAGES = 1;

export type RuleGroup =
  | "third_party_collection"
  | "prohibited_content"
  | "use_case"
  | "consent_method"
  | "opt_out_language"
  | "placeholder"
  | "threatening_language"
  | "url_shortener"
  | "email_domain"
  | "legal_link";

export interface A2pRuleMeta {
  ruleId: string;
  section: ComplianceSection;
  group: RuleGroup;
  code: string;
  penalty: number;
  /** Regex source, matched case-insensitively. Absent for structural rules. */
  pattern?: string;
  /** The phrase or token a violation reports, when it differs from the pattern. */
  term?: string;
  /** Message template; `{name}` slots are filled by `formatRuleMessage`. */
  label: string;
  /** Whether every occurrence is charged or only the first. */
  matchMode: "once" | "each";
  citationRef: string;
}

type RuleTable = Record<string, Omit<A2pRuleMeta, "ruleId">>;

const TCPA = "TCPA 47 U.S.C. § 227";
const FDCPA = "FDCPA 15 U.S.C. § 1692";
const CTIA = "CTIA Messaging Principles and Best Practices";
const TEN_DLC = "A2P 10DLC carrier policy";

const thirdParty = (pattern: string): Omit<A2pRuleMeta, "ruleId"> => ({
  section: "brand",
  group: "third_party_collection",
  code: "A1",
  penalty: 30,
  pattern,
  label: "A1: Website references third-party debt collection (CRITICAL)",
  matchMode: "once",
  citationRef: FDCPA
});

const prohibited = (pattern: string, term: string): Omit<A2pRuleMeta, "ruleId"> => ({
  section: "brand",
  group: "prohibited_content",
  code: "A1",
  penalty: 30,
  pattern,
  term,
  label: "A1: Website contains prohibited content: {term}",
  matchMode: "once",
  citationRef: TEN_DLC
});

const placeholder = (token: string): Omit<A2pRuleMeta, "ruleId"> => ({
  section: "template",
  group: "placeholder",
  code: "C2",
  penalty: 15,
  pattern: token.replace(/[{}]/g, "\\$&"),
  term: token,
  label: "C2: Prohibited placeholder {term} in message {index}",
  matchMode: "each",
  citationRef: CTIA
});

const threatening = (phrase: string): Omit<A2pRuleMeta, "ruleId"> => ({
  section: "template",
  group: "threatening_language",
  code: "C3",
  penalty: 10,
  pattern: phrase,
  term: phrase,
  label: "C3: Threatening language '{term}' in message {index}",
  matchMode: "each",
  citationRef: FDCPA
});

const RULES = Object.freeze({
  "brand.third_party.collector": thirdParty("third[-\\s]?party debt collector"),
  "brand.third_party.on_behalf_of": thirdParty("we collect debts on behalf of"),
  "brand.third_party.collection_agency": thirdParty("collection agency"),
  "brand.third_party.debt_collection_agency": thirdParty("debt collection agency"),
  "brand.prohibited.skip_tracing": prohibited("skip[-\\s]?tracing", "skip-tracing services"),
  "brand.prohibited.payday_loan": prohibited("payday loan", "payday loan content"),
  "brand.prohibited.personal_loan": prohibited("personal loan solicitation", "personal loan solicitation"),
  "brand.prohibited.lead_generation": prohibited("lead generation", "lead generation services"),
  "brand.prohibited.data_brokerage": prohibited("data brokerage", "data brokerage services"),
  "brand.prohibited.crypto": prohibited("crypto", "cryptocurrency content"),
  "brand.prohibited.credit_repair": prohibited("credit repair", "credit repair services"),
  "brand.use_case.marketing": {
    section: "brand",
    group: "use_case",
    code: "A2",
    penalty: 25,
    pattern: "marketing|lead generation|loan offers",
    label: "A2: Use case indicates prohibited marketing/lead generation",
    matchMode: "once",
    citationRef: TEN_DLC
  },
  "opt_in.existing_business_relationship": {
    section: "opt_in",
    group: "consent_method",
    code: "B1",
    penalty: 25,
    pattern: "existing business relationship",
    label: "B1: 'Existing business relationship' is not sufficient for SMS consent",
    matchMode: "once",
    citationRef: TCPA
  },
  "opt_in.number_collected_on_call": {
    section: "opt_in",
    group: "consent_method",
    code: "B1",
    penalty: 25,
    pattern: "customers provide number when calling",
    label: "B1: Phone number collection during calls is non-compliant",
    matchMode: "once",
    citationRef: TCPA
  },
  "opt_in.missing_stop": {
    section: "opt_in",
    group: "opt_out_language",
    code: "B1",
    penalty: 15,
    pattern: "stop",
    label: "B1: Missing STOP instructions in initial message",
    matchMode: "once",
    citationRef: CTIA
  },
  "template.placeholder.url": placeholder("{{url}}"),
  "template.placeholder.company": placeholder("{{company}}"),
  "template.placeholder.agentname": placeholder("{{agentname}}"),
  "template.threatening.urgent": threatening("urgent"),
  "template.threatening.final_notice": threatening("final notice"),
  "template.threatening.last_attempt": threatening("last attempt"),
  "template.threatening.respond_immediately": threatening("respond immediately"),
  "url.shortener": {
    section: "url",
    group: "url_shortener",
    code: "D1",
    penalty: 20,
    label: "D1: URL shorteners are not allowed",
    matchMode: "each",
    citationRef: TEN_DLC
  },
  "url.email_domain_mismatch": {
    section: "url",
    group: "email_domain",
    code: "D2",
    penalty: 5,
    label: "D2: Support email domain ({emailDomain}) does not match website domain ({websiteDomain})",
    matchMode: "once",
    citationRef: TEN_DLC
  },
  "url.email_domain_unverifiable": {
    section: "url",
    group: "email_domain",
    code: "D3",
    penalty: 3,
    label: "D3: Unable to validate email domain match",
    matchMode: "once",
    citationRef: TEN_DLC
  },
  "legal.privacy_missing": {
    section: "legal",
    group: "legal_link",
    code: "E1",
    penalty: 15,
    label: "E1: Privacy Policy URL missing",
    matchMode: "once",
    citationRef: CTIA
  },
  "legal.terms_missing": {
    section: "legal",
    group: "legal_link",
    code: "E1",
    penalty: 15,
    label: "E1: Terms & Conditions URL missing",
    matchMode: "once",
    citationRef: CTIA
  }
} satisfies RuleTable);

export type RuleId = keyof typeof RULES;

export const URL_SHORTENER_DOMAINS: readonly string[] = ["bit.ly", "tinyurl.com", "tinyurl", "t.co"];

export function getRule(ruleId: RuleId): A2pRuleMeta {
  return { ruleId, ...RULES[ruleId] };
}

export function listRules(): A2pRuleMeta[] {
  return Object.entries(RULES).map(([ruleId, meta]) => ({ ruleId, ...meta }));
}

export function rulesInGroup(group: RuleGroup): A2pRuleMeta[] {
  return listRules().filter((rule) => rule.group === group);
}

export function formatRuleMessage(rule: A2pRuleMeta, values: Record<string, string | number> = {}): string {
  const slots: Record<string, string | number> = rule.term === undefined ? values : { term: rule.term, ...values };
  return rule.label.replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = slots[name];
    return value === undefined ? whole : String(value);
  });
}

export interface RecommendationRule {
  match: string;
  recommendation: string;
}

/** Checked in order; the first substring found in a violation message wins. */
export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    match: "third-party debt collection",
    recommendation: "Remove all references to third-party debt collection from website"
  },
  { match: "stop instructions", recommendation: "Include 'Reply STOP to opt out' in initial message" },
  { match: "privacy policy", recommendation: "Provide valid Privacy Policy URL" },
  { match: "terms", recommendation: "Provide valid Terms & Conditions URL" }
];

export interface WebsitePattern {
  pattern: string;
  description: string;
}

export const WEBSITE_AUTO_FAIL_PATTERNS: readonly WebsitePattern[] = [
  { pattern: "third[-\\s]?party debt collector", description: "third-party debt collector" },
  { pattern: "we collect debts on behalf of", description: "third-party debt collection" },
  { pattern: "skip[-\\s]?tracing", description: "skip-tracing services" },
  { pattern: "payday loan", description: "payday loan content" },
  { pattern: "lead generation", description: "lead generation services" },
  { pattern: "data brokerage", description: "data brokerage services" },
  { pattern: "debt collection agency", description: "debt collection agency" },
  { pattern: "collection services", description: "collection services" },
  { pattern: "crypto", description: "cryptocurrency content" },
  { pattern: "credit repair", description: "credit repair services" }
];

export const DEBT_PATTERNS: readonly string[] = ["\\bdebt\\b", "\\bcollection\\b", "\\bowe\\b", "\\bpayment\\b"];
export const MARKETING_PATTERNS: readonly string[] = ["\\bmarketing\\b", "\\badvertising\\b", "\\bpromotion\\b", "\\bcampaign\\b"];

/** Debt and marketing matches closer than this many characters are flagged together. */
export const PROXIMITY_WINDOW = 200;
