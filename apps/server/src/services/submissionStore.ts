import { Pool } from "pg";
import type { CampaignSubmission, ComplianceResult, ComplianceStatus } from "../types/compliance.js";

export interface StoredSubmission {
  submissionId: string;
  sessionId: string;
  createdAt: string;
  brandName: string;
  brandWebsite: string;
  useCase: string;
  complianceScore: number;
  complianceStatus: ComplianceStatus;
  violationsCount: number;
  violations: string[];
  recommendationsCount: number;
}

export interface SubmissionRepository {
  insert(record: StoredSubmission, submission: CampaignSubmission, result: ComplianceResult): Promise<void>;
  listBySession(sessionId: string, limit: number): Promise<StoredSubmission[]>;
  close?(): Promise<void>;
}

export class PgSubmissionStore implements SubmissionRepository {
  private readonly pool: Pool;
  private schemaEnsured = false;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000
    });
  }

  async insert(record: StoredSubmission, submission: CampaignSubmission, result: ComplianceResult): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `
      INSERT INTO campaign_submissions (
        submission_id,
        session_id,
        brand_name,
        brand_website,
        use_case,
        compliance_score,
        compliance_status,
        violations,
        recommendations_count,
        submission_data,
        compliance_result,
        created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10::jsonb, $11::jsonb, $12::timestamptz)
      `,
      [
        record.submissionId,
        record.sessionId,
        record.brandName,
        record.brandWebsite,
        record.useCase,
        record.complianceScore,
        record.complianceStatus,
        JSON.stringify(record.violations),
        record.recommendationsCount,
        JSON.stringify(submission),
        JSON.stringify(result),
        record.createdAt
      ]
    );
  }

  async listBySession(sessionId: string, limit: number): Promise<StoredSubmission[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<{
      submission_id: string;
      session_id: string;
      brand_name: string;
      brand_website: string;
      use_case: string;
      compliance_score: number;
      compliance_status: ComplianceStatus;
      violations: string[];
      recommendations_count: number;
      created_at: Date;
    }>(
      `
      SELECT
        submission_id,
        session_id,
        brand_name,
        brand_website,
        use_case,
        compliance_score,
        compliance_status,
        violations,
        recommendations_count,
        created_at
      FROM campaign_submissions
      WHERE session_id = $1
      ORDER BY created_at DESC
      LIMIT $2
      `,
      [sessionId, limit]
    );

    return rows.map((row) => ({
      submissionId: row.submission_id,
      sessionId: row.session_id,
      createdAt: row.created_at.toISOString(),
      brandName: row.brand_name,
      brandWebsite: row.brand_website,
      useCase: row.use_case,
      complianceScore: row.compliance_score,
      complianceStatus: row.compliance_status,
      violationsCount: row.violations.length,
      violations: row.violations,
      recommendationsCount: row.recommendations_count
    }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) return;
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS campaign_submissions (
        submission_id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        brand_name TEXT NOT NULL DEFAULT '',
        brand_website TEXT NOT NULL DEFAULT '',
        use_case TEXT NOT NULL DEFAULT '',
        compliance_score INTEGER NOT NULL,
        compliance_status TEXT NOT NULL,
        violations JSONB NOT NULL DEFAULT '[]'::jsonb,
        recommendations_count INTEGER NOT NULL DEFAULT 0,
        submission_data JSONB NOT NULL,
        compliance_result JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      CREATE INDEX IF NOT EXISTS idx_campaign_submissions_session_created_at
        ON campaign_submissions(session_id, created_at DESC);
    `);
    this.schemaEnsured = true;
  }
}

/**
 * Process-local store used when no database is configured, and in tests.
 */
export class InMemorySubmissionStore implements SubmissionRepository {
  private readonly records: StoredSubmission[] = [];

  async insert(record: StoredSubmission): Promise<void> {
    this.records.push(record);
  }

  async listBySession(sessionId: string, limit: number): Promise<StoredSubmission[]> {
    return this.records
      .filter((record) => record.sessionId === sessionId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit);
  }
}
