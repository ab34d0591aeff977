import type { ProximityMatch, ScrapedPage, ViolationLocation, WebsiteAnalysis } from "../types/website.js";
import {
  DEBT_PATTERNS,
  MARKETING_PATTERNS,
  PROXIMITY_WINDOW,
  WEBSITE_AUTO_FAIL_PATTERNS
} from "./rules/a2pRuleCatalog.js";
import { DEFAULT_CONTEXT_RADIUS, findMatches, locateSection, SECONDARY_CONTEXT_RADIUS } from "./textMatcher.js";

const UNKNOWN_PAGE_TITLE = "Unknown";

/**
 * Scans scraped website copy for auto-fail content and for marketing language
 * sitting next to debt language. Each finding records where it was seen.
 */
export function analyzeWebsiteCompliance(page: ScrapedPage): WebsiteAnalysis {
  const content = page.textContent;
  const pageTitle = page.title ?? UNKNOWN_PAGE_TITLE;
  const issues: string[] = [];
  const locations: ViolationLocation[] = [];

  for (const { pattern, description } of WEBSITE_AUTO_FAIL_PATTERNS) {
    const matches = findMatches(content, pattern, { radius: DEFAULT_CONTEXT_RADIUS });
    if (matches.length === 0) continue;

    const section = locateSection(pattern, page.sections);
    for (const match of matches) {
      locations.push({
        violationType: "auto_fail_trigger",
        description,
        matchedText: match.text,
        context: match.context,
        section,
        url: page.url,
        pageTitle,
        characterPosition: match.offset
      });
    }
    issues.push(`Auto-fail trigger detected: ${description} - '${matches[0]?.text ?? pattern}'`);
  }

  const debtMatches = collectMatches(content, DEBT_PATTERNS);
  const marketingMatches = collectMatches(content, MARKETING_PATTERNS);

  for (const debtMatch of debtMatches) {
    const marketingMatch = marketingMatches.find(
      (candidate) => Math.abs(debtMatch.position - candidate.position) < PROXIMITY_WINDOW
    );
    if (!marketingMatch) continue;
    locations.push({
      violationType: "debt_marketing_proximity",
      description: "Marketing language detected near debt content",
      debtMatch,
      marketingMatch,
      url: page.url,
      pageTitle
    });
    issues.push(`Marketing + debt content: '${marketingMatch.matchedText}' near '${debtMatch.matchedText}'`);
  }

  return {
    complianceIssues: issues,
    violationLocations: locations,
    riskLevel: locations.length > 0 ? "HIGH" : "LOW",
    debtMatchesFound: debtMatches.length,
    marketingMatchesFound: marketingMatches.length,
    totalViolations: locations.length
  };
}

function collectMatches(content: string, patterns: readonly string[]): ProximityMatch[] {
  return patterns.flatMap((pattern) =>
    findMatches(content, pattern, { radius: SECONDARY_CONTEXT_RADIUS }).map((match) => ({
      matchedText: match.text,
      context: match.context,
      position: match.offset
    }))
  );
}

const STREET_WORDS = [
  "street",
  "st",
  "avenue",
  "ave",
  "road",
  "rd",
  "drive",
  "dr",
  "lane",
  "ln",
  "boulevard",
  "blvd",
  "parkway",
  "pkwy",
  "suite",
  "ste"
];

/**
 * Pieces of a postal address worth looking for on a page: the street number,
 * the ZIP code and up to two distinctive words.
 */
export function addressTokens(address: string): string[] {
  const tokens: string[] = [];
  const streetNumber = address.match(/\b\d+\b/);
  if (streetNumber) tokens.push(streetNumber[0]);
  const zip = address.match(/\b\d{5}(-\d{4})?\b/);
  if (zip) tokens.push(zip[0]);

  const words = address
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/[^a-z]/g, ""))
    .filter((word) => word.length > 2 && !STREET_WORDS.includes(word));
  tokens.push(...words.slice(0, 2));
  return tokens;
}

/** True when at least two address tokens appear anywhere across the given texts. */
export function verifyAddressInContent(address: string | undefined, sources: Array<string | undefined>): boolean {
  if (!address) return false;
  const combined = sources.filter((source): source is string => Boolean(source)).join(" ").toLowerCase();
  const found = addressTokens(address).filter((token) => combined.includes(token.toLowerCase()));
  return found.length >= 2;
}
