import type { JobPayload, ProcessedResult } from "../core/jobs/Job";

export type JobAuditEntry = {
  jobId: string;
  input: JobPayload;
  output: ProcessedResult;
  status: "completed";
  createdAt: Date;
};

export type JobAuditStats = {
  totalJobs: number;
  completedJobs: number;
  failedJobs: number;
};

/**
 * Append-only log of processed jobs.
 */
export interface JobAuditRepository {
  ensureSchema(): Promise<void>;
  append(entry: JobAuditEntry): Promise<void>;
  stats(): Promise<JobAuditStats>;
}
