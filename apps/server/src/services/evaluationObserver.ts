import type pino from "pino";
import type { EvaluationObserver } from "../types/compliance.js";

/** Routes engine trace events to a pino logger. */
export function createLoggingObserver(logger: pino.Logger): EvaluationObserver {
  return {
    sectionEvaluated(section, outcome) {
      logger.debug(
        { section, penalty: outcome.penalty, violations: outcome.violations.map((violation) => violation.ruleId) },
        "Compliance section evaluated"
      );
    },
    evaluationCompleted(result) {
      logger.info(
        { status: result.status, score: result.score, violationCount: result.violations.length, rulesVersion: result.rulesVersion },
        "Compliance evaluation completed"
      );
    }
  };
}
