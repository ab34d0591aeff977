import type { CampaignSubmission, SectionOutcome, Violation } from "../../types/compliance.js";
import { getRule, URL_SHORTENER_DOMAINS } from "../rules/a2pRuleCatalog.js";
import { chargedItems, totalPenalty, violationFor } from "./violation.js";

/**
 * URL and domain validation (D). A domain that cannot be parsed costs less than
 * a confirmed mismatch, and neither stops the evaluation.
 */
export function checkUrls(submission: CampaignSubmission): SectionOutcome {
  const violations: Violation[] = [];

  const shortenerRule = getRule("url.shortener");
  const shortened = (submission.urls ?? []).filter(isShortenedUrl);
  for (const url of chargedItems(shortenerRule, shortened)) {
    violations.push(
      violationFor(shortenerRule, {
        match: { text: url, offset: 0, context: url, source: "urls" }
      })
    );
  }

  const supportEmail = submission.supportEmail ?? "";
  const brandWebsite = submission.brandWebsite ?? "";
  if (supportEmail && brandWebsite) {
    try {
      const emailDomain = emailDomainOf(supportEmail);
      const websiteDomain = stripWww(hostnameOf(brandWebsite));
      if (emailDomain !== websiteDomain) {
        violations.push(violationFor(getRule("url.email_domain_mismatch"), { values: { emailDomain, websiteDomain } }));
      }
    } catch {
      violations.push(violationFor(getRule("url.email_domain_unverifiable")));
    }
  }

  return { violations, penalty: totalPenalty(violations) };
}

export function emailDomainOf(email: string): string {
  const parts = email.trim().split("@");
  const domain = parts[1]?.trim().toLowerCase();
  if (parts.length < 2 || !domain) {
    throw new Error("email_domain_unparseable");
  }
  return domain;
}

/** Hostname of a URL, accepting bare domains such as `example.com`. */
export function hostnameOf(url: string): string {
  const trimmed = url.trim();
  try {
    return new URL(trimmed).hostname.toLowerCase();
  } catch (error) {
    if (trimmed.includes("://")) throw error;
    return new URL(`https://${trimmed}`).hostname.toLowerCase();
  }
}

export function stripWww(domain: string): string {
  return domain.startsWith("www.") ? domain.slice(4) : domain;
}

export function isShortenedUrl(url: string): boolean {
  let host: string;
  try {
    host = hostnameOf(url);
  } catch {
    const lowered = url.toLowerCase();
    return URL_SHORTENER_DOMAINS.some((domain) => lowered.includes(domain));
  }
  return URL_SHORTENER_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}
