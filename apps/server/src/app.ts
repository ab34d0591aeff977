import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import type pino from "pino";
import { attachRequestId } from "./middleware/requestId.js";
import { createComplianceRouter } from "./routes/compliance.js";
import { healthRouter } from "./routes/health.js";
import { createSubmissionRouter } from "./routes/submissions.js";
import type { ComplianceEngine } from "./services/complianceEngine.js";
import type { SubmissionHistoryService } from "./services/submissionHistoryService.js";

const CORS_NOT_ALLOWED = "cors_not_allowed";

export interface AppDeps {
  engine: ComplianceEngine;
  history: SubmissionHistoryService;
  logger: pino.Logger;
  allowedOrigins: string[];
  historyLimit: number;
  batchMaxItems: number;
}

export function createApp(deps: AppDeps) {
  const app = express();
  const allowedOrigins = new Set(deps.allowedOrigins);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error(CORS_NOT_ALLOWED));
      }
    })
  );
  app.use(attachRequestId);
  app.use(express.json({ limit: "2mb" }));

  app.use(healthRouter);
  app.use(createComplianceRouter(deps.engine, { batchMaxItems: deps.batchMaxItems }));
  app.use(
    createSubmissionRouter({
      engine: deps.engine,
      history: deps.history,
      logger: deps.logger,
      historyLimit: deps.historyLimit
    })
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "not_found", path: req.path });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError && "status" in error && error.status === 400) {
      res.status(400).json({ error: "invalid_json" });
      return;
    }
    if (error instanceof Error && error.message === CORS_NOT_ALLOWED) {
      res.status(403).json({ error: CORS_NOT_ALLOWED });
      return;
    }
    deps.logger.error({ err: error, path: req.path, requestId: req.header("x-request-id") }, "Request failed");
    res.status(500).json({ error: "evaluation_failed" });
  });

  return app;
}
