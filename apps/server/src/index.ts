import pino from "pino";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { ComplianceEngine } from "./services/complianceEngine.js";
import { createLoggingObserver } from "./services/evaluationObserver.js";
import { SubmissionHistoryService } from "./services/submissionHistoryService.js";
import { InMemorySubmissionStore, PgSubmissionStore } from "./services/submissionStore.js";

const logger = pino({ level: env.LOG_LEVEL });

const repository = env.DATABASE_URL ? new PgSubmissionStore(env.DATABASE_URL) : new InMemorySubmissionStore();
if (!env.DATABASE_URL) {
  logger.warn("DATABASE_URL not set; submission history is kept in memory only");
}

const engine = new ComplianceEngine({ observer: createLoggingObserver(logger.child({ component: "engine" })) });
const history = new SubmissionHistoryService(repository, logger.child({ component: "history" }));

const app = createApp({
  engine,
  history,
  logger,
  allowedOrigins: [env.CORS_ORIGIN, "http://localhost:3000", "http://localhost:5173"],
  historyLimit: env.HISTORY_LIMIT,
  batchMaxItems: env.BATCH_MAX_ITEMS
});

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, rulesVersion: engine.rulesVersion }, "A2P compliance API listening");
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "Shutting down");
  server.close((serverError) => {
    if (serverError) logger.error({ err: serverError }, "HTTP server close failed");
    history
      .close()
      .then(() => process.exit(serverError ? 1 : 0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Submission store close failed");
        process.exit(1);
      });
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);
