import { Router } from "express";
import { z } from "zod";
import type { ComplianceEngine } from "../services/complianceEngine.js";
import { finalRecommendation } from "../services/complianceEngine.js";
import { categorizeRecommendations } from "../services/recommendationService.js";
import { campaignSubmissionSchema } from "../types/schemas.js";

const batchSchema = (maxItems: number) =>
  z.object({
    submissions: z.array(campaignSubmissionSchema).max(maxItems)
  });

const messageBatchSchema = (maxItems: number) =>
  z.object({
    messages: z.array(z.string()).max(maxItems),
    context: campaignSubmissionSchema.default({})
  });

export function createComplianceRouter(engine: ComplianceEngine, options: { batchMaxItems: number }) {
  const router = Router();
  const batchBody = batchSchema(options.batchMaxItems);
  const messageBatchBody = messageBatchSchema(options.batchMaxItems);

  router.post("/api/compliance/check", (req, res) => {
    const parsed = campaignSubmissionSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const result = engine.evaluate(parsed.data);
    return res.json({ ...result, recommendation: finalRecommendation(result) });
  });

  router.post("/api/compliance/batch", (req, res) => {
    const parsed = batchBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const results = engine.evaluateMany(parsed.data.submissions);
    return res.json({ results, summary: engine.summarize(results) });
  });

  router.post("/api/compliance/batch-messages", (req, res) => {
    const parsed = messageBatchBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    return res.json(engine.validateMessageBatch(parsed.data.messages, parsed.data.context));
  });

  router.post("/api/compliance/recommendations", (req, res) => {
    const parsed = campaignSubmissionSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const result = engine.evaluate(parsed.data);
    return res.json({
      complianceScore: result.score,
      status: result.status,
      recommendations: categorizeRecommendations(result.recommendations),
      violations: result.violations
    });
  });

  return router;
}
