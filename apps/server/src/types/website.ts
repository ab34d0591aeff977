/**
 * A page as handed over by the scraping layer. Text is plain, markup already stripped.
 */
export interface ScrapedPage {
  url: string;
  title?: string;
  textContent: string;
  sections: Record<string, string>;
  privacyUrl?: string;
  termsUrl?: string;
  error?: string;
}

export interface ProximityMatch {
  matchedText: string;
  context: string;
  position: number;
}

export type ViolationLocation =
  | {
      violationType: "auto_fail_trigger";
      description: string;
      matchedText: string;
      context: string;
      section: string;
      url: string;
      pageTitle: string;
      characterPosition: number;
    }
  | {
      violationType: "debt_marketing_proximity";
      description: string;
      debtMatch: ProximityMatch;
      marketingMatch: ProximityMatch;
      url: string;
      pageTitle: string;
    };

export interface WebsiteAnalysis {
  complianceIssues: string[];
  violationLocations: ViolationLocation[];
  riskLevel: "HIGH" | "LOW";
  debtMatchesFound: number;
  marketingMatchesFound: number;
  totalViolations: number;
  addressVerified?: boolean;
}
