import type { JobPayload, JobRecord, ProcessedResult } from "../core/jobs/Job";

/**
 * Key-value store holding one record per job. Implementations must refuse
 * transitions that would move a job backwards.
 */
export interface JobStore {
  create(job: { id: string; input: JobPayload; createdAt: Date }): Promise<void>;
  markProcessing(id: string, startedAt: Date): Promise<void>;
  markCompleted(id: string, result: ProcessedResult, completedAt: Date): Promise<void>;
  markFailed(id: string, error: string, failedAt: Date): Promise<void>;
  expire(id: string, ttlSeconds: number): Promise<void>;
  get(id: string): Promise<JobRecord | undefined>;
}
