import { createHash, randomUUID } from "node:crypto";
import type pino from "pino";
import type { CampaignSubmission, ComplianceResult } from "../types/compliance.js";
import { roundTo } from "./scoring.js";
import type { StoredSubmission, SubmissionRepository } from "./submissionStore.js";

export interface SubmissionStats {
  totalSubmissions: number;
  compliantSubmissions: number;
  complianceRate: number;
  averageScore: number;
  lastSubmission: string | null;
}

/** History counts a submission as compliant from this score up, independent of status. */
const HISTORY_COMPLIANT_SCORE = 80;
const STATS_WINDOW = 50;

export function sessionIdForClient(clientIp: string): string {
  return createHash("sha256").update(clientIp).digest("hex").slice(0, 16);
}

export class SubmissionHistoryService {
  constructor(
    private readonly repository: SubmissionRepository,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Persists an evaluated submission. A storage failure is logged and reported
   * as `null`; it never alters the compliance result.
   */
  async record(clientIp: string, submission: CampaignSubmission, result: ComplianceResult): Promise<string | null> {
    const sessionId = sessionIdForClient(clientIp);
    const record: StoredSubmission = {
      submissionId: `${sessionId}_${randomUUID()}`,
      sessionId,
      createdAt: this.now().toISOString(),
      brandName: submission.brandName ?? "",
      brandWebsite: submission.brandWebsite ?? "",
      useCase: submission.useCase ?? "",
      complianceScore: result.score,
      complianceStatus: result.status,
      violationsCount: result.violations.length,
      violations: result.violations,
      recommendationsCount: result.recommendations.length
    };

    try {
      await this.repository.insert(record, submission, result);
      return record.submissionId;
    } catch (error) {
      this.logger.warn({ err: error, sessionId }, "Failed to store submission");
      return null;
    }
  }

  async history(clientIp: string, limit: number): Promise<StoredSubmission[]> {
    return this.repository.listBySession(sessionIdForClient(clientIp), limit);
  }

  async close(): Promise<void> {
    await this.repository.close?.();
  }

  async stats(clientIp: string): Promise<SubmissionStats> {
    const submissions = await this.history(clientIp, STATS_WINDOW);
    const total = submissions.length;
    if (total === 0) {
      return { totalSubmissions: 0, compliantSubmissions: 0, complianceRate: 0, averageScore: 0, lastSubmission: null };
    }

    const compliant = submissions.filter((entry) => entry.complianceScore >= HISTORY_COMPLIANT_SCORE).length;
    const scoreSum = submissions.reduce((sum, entry) => sum + entry.complianceScore, 0);
    return {
      totalSubmissions: total,
      compliantSubmissions: compliant,
      complianceRate: roundTo((compliant / total) * 100, 2),
      averageScore: roundTo(scoreSum / total, 1),
      lastSubmission: submissions[0]?.createdAt ?? null
    };
  }
}
