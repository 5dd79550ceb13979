import type { Pool } from "pg";
import type { JobAuditEntry, JobAuditRepository, JobAuditStats } from "../../ports/JobAuditRepository";
import { postgresSchema, schemaLockKeys } from "./postgres.schema";
import { withTransaction } from "./PgPoolFactory";

type StatsRow = {
  total_jobs: string | number;
  completed_jobs: string | number;
  failed_jobs: string | number;
};

export class PgJobAuditRepository implements JobAuditRepository {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await client.query("SELECT pg_advisory_xact_lock($1)", [schemaLockKeys.jobAudit]);
      for (const statement of postgresSchema.jobAudit) {
        await client.query(statement);
      }
    });
  }

  async append(entry: JobAuditEntry): Promise<void> {
    await this.pool.query(
      "INSERT INTO processing_jobs (job_id, input_data, output_data, status, created_at, completed_at) " +
        "VALUES ($1, $2, $3, $4, $5, $6)",
      [
        entry.jobId,
        JSON.stringify({ data: entry.input }),
        JSON.stringify(entry.output),
        entry.status,
        entry.createdAt,
        new Date()
      ]
    );
  }

  async stats(): Promise<JobAuditStats> {
    // COUNT(*) is bigint, which pg hands back as a string.
    const res = await this.pool.query<StatsRow>(
      "SELECT COUNT(*) AS total_jobs, " +
        "COUNT(CASE WHEN status = 'completed' THEN 1 END) AS completed_jobs, " +
        "COUNT(CASE WHEN status = 'failed' THEN 1 END) AS failed_jobs " +
        "FROM processing_jobs"
    );
    const row = res.rows[0];
    return {
      totalJobs: Number(row?.total_jobs ?? 0),
      completedJobs: Number(row?.completed_jobs ?? 0),
      failedJobs: Number(row?.failed_jobs ?? 0)
    };
  }
}
