import { Router } from "express";
import type pino from "pino";
import { z } from "zod";
import { clientIpFromRequest } from "../middleware/clientIp.js";
import type { ComplianceEngine } from "../services/complianceEngine.js";
import { finalRecommendation } from "../services/complianceEngine.js";
import { generateReport } from "../services/reportService.js";
import type { SubmissionHistoryService, SubmissionStats } from "../services/submissionHistoryService.js";
import { sessionIdForClient } from "../services/submissionHistoryService.js";
import { validateSubmissionFields } from "../services/submissionValidation.js";
import { analyzeWebsiteCompliance, verifyAddressInContent } from "../services/websiteAnalysisService.js";
import type { CampaignSubmission } from "../types/compliance.js";
import type { AnalyzeSubmissionInput } from "../types/schemas.js";
import { analyzeSubmissionSchema, scrapedPageSchema } from "../types/schemas.js";
import type { WebsiteAnalysis } from "../types/website.js";

const validateDataSchema = z.object({
  companyEin: z.string().optional(),
  streetAddress: z.string().optional(),
  supportEmail: z.string().optional(),
  supportPhone: z.string().optional(),
  brandWebsite: z.string().optional()
});

const verifyAddressSchema = z.object({
  streetAddress: z.string().default(""),
  websiteContent: z.string().optional(),
  privacyContent: z.string().optional(),
  termsContent: z.string().optional()
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional()
});

export interface SubmissionRouterDeps {
  engine: ComplianceEngine;
  history: SubmissionHistoryService;
  logger: pino.Logger;
  historyLimit: number;
}

export function createSubmissionRouter({ engine, history, logger, historyLimit }: SubmissionRouterDeps) {
  const router = Router();

  router.post("/api/analyze-submission", async (req, res, next) => {
    const clientIp = clientIpFromRequest(req);
    const sessionId = sessionIdForClient(clientIp);
    const parsed = analyzeSubmissionSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten(), sessionId });

    const input = parsed.data;
    // A page that could not be fetched is not evidence either way; it must not become a score.
    if (input.websiteData?.error) {
      logger.warn({ sessionId, url: input.websiteData.url, detail: input.websiteData.error }, "Website scraping failed");
      return res.status(502).json({ error: "website_scrape_failed", detail: input.websiteData.error, sessionId });
    }

    try {
      logger.info({ sessionId, brandName: input.brandName, brandWebsite: input.brandWebsite }, "Submission analysis started");
      const websiteAnalysis = analyzeScrapedPages(input);
      const submissionPackage = buildSubmissionPackage(input);
      const result = engine.evaluate(submissionPackage);

      const submissionId = await history.record(clientIp, submissionPackage, result);
      const userStats = await statsOrNull(history, clientIp, logger);
      const recommendation = finalRecommendation(result);

      return res.json({
        submissionPackage,
        complianceResult: { ...result, ...(websiteAnalysis ? { complianceAnalysis: websiteAnalysis } : {}) },
        recommendation,
        submissionId,
        userStats,
        sessionId,
        report: generateReport({ submission: submissionPackage, result, recommendation, websiteAnalysis })
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/api/analyze-website", (req, res) => {
    const parsed = scrapedPageSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    if (parsed.data.error) {
      return res.status(502).json({ error: "website_scrape_failed", detail: parsed.data.error });
    }
    return res.json(analyzeWebsiteCompliance(parsed.data));
  });

  router.post("/api/validate-data", (req, res) => {
    const parsed = validateDataSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    return res.json(validateSubmissionFields(parsed.data));
  });

  router.post("/api/verify-address", (req, res) => {
    const parsed = verifyAddressSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const { streetAddress, websiteContent, privacyContent, termsContent } = parsed.data;
    return res.json({
      addressFoundOnWebsite: verifyAddressInContent(streetAddress, [websiteContent, privacyContent, termsContent])
    });
  });

  router.get("/api/user/history", async (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const submissions = await history.history(clientIpFromRequest(req), parsed.data.limit ?? historyLimit);
      return res.json({ submissions });
    } catch (error) {
      logger.warn({ err: error }, "Failed to load submission history");
      return res.status(503).json({ error: "history_unavailable" });
    }
  });

  router.get("/api/user/stats", async (req, res) => {
    try {
      return res.json(await history.stats(clientIpFromRequest(req)));
    } catch (error) {
      logger.warn({ err: error }, "Failed to load submission stats");
      return res.status(503).json({ error: "history_unavailable" });
    }
  });

  return router;
}

function analyzeScrapedPages(input: AnalyzeSubmissionInput): WebsiteAnalysis | undefined {
  if (!input.websiteData) return undefined;
  const analysis = analyzeWebsiteCompliance(input.websiteData);
  if (!input.streetAddress) return analysis;

  const addressVerified = verifyAddressInContent(input.streetAddress, [
    input.websiteData.textContent,
    input.policyPages.privacy?.textContent,
    input.policyPages.terms?.textContent
  ]);
  return {
    ...analysis,
    addressVerified,
    complianceIssues: addressVerified
      ? analysis.complianceIssues
      : [...analysis.complianceIssues, "Address not found on website or policy pages"]
  };
}

/**
 * Folds scraped data into the submission the engine sees. Links discovered on the
 * site take precedence over the ones typed into the form.
 */
function buildSubmissionPackage(input: AnalyzeSubmissionInput): CampaignSubmission {
  const { websiteData, policyPages: _policyPages, additionalUrls, ...fields } = input;
  const urls = [fields.brandWebsite, ...additionalUrls, ...(fields.urls ?? [])].filter(
    (url): url is string => typeof url === "string" && url.length > 0
  );
  return {
    ...fields,
    websiteContent: websiteData?.textContent ?? fields.websiteContent,
    privacyUrl: websiteData?.privacyUrl ?? fields.privacyUrl,
    termsUrl: websiteData?.termsUrl ?? fields.termsUrl,
    urls: Array.from(new Set(urls))
  };
}

async function statsOrNull(
  history: SubmissionHistoryService,
  clientIp: string,
  logger: pino.Logger
): Promise<SubmissionStats | null> {
  try {
    return await history.stats(clientIp);
  } catch (error) {
    logger.warn({ err: error }, "Failed to load submission stats");
    return null;
  }
}
