import { Router } from "express";
import { RULES_VERSION } from "../services/rules/a2pRuleCatalog.js";

export const healthRouter = Router();

healthRouter.get("/health", (_req, res) => {
  res.json({ status: "healthy", service: "a2p-compliance-agent" });
});

healthRouter.get("/api/health", (_req, res) => {
  res.json({ status: "healthy", service: "a2p-compliance-pipeline", rulesVersion: RULES_VERSION });
});
