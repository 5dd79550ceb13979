import { randomUUID } from "crypto";
import { toJobView, type JobPayload, type JobView } from "../../core/jobs/Job";
import { transformPayload } from "../../core/jobs/transformPayload";
import type { JobAuditRepository } from "../../ports/JobAuditRepository";
import type { JobStore } from "../../ports/JobStore";
import { createWorkerPool, WorkerPoolFullError, type WorkerPool, type WorkerSlot } from "../../shared/concurrency/workerPool";
import type { JobRunnerConfigInput } from "./jobRunner.config";
import { resolveJobRunnerConfig } from "./jobRunner.config";

export class JobQueueFullError extends Error {
  readonly code = "job_queue_full";

  constructor(message = "job queue is full") {
    super(message);
    this.name = "JobQueueFullError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type JobStatsView = {
  total_jobs: number;
  completed_jobs: number;
  failed_jobs: number;
  timestamp: string;
};

export type JobRunnerDeps = {
  store: JobStore;
  audit: JobAuditRepository;
  // Built from config.concurrency / config.queueCapacity when omitted.
  pool?: WorkerPool;
  config?: JobRunnerConfigInput;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  generateId?: () => string;
};

export type JobRunner = {
  submit: (payload: JobPayload) => Promise<string>;
  execute: (jobId: string, payload: JobPayload) => Promise<void>;
  getStatus: (jobId: string) => Promise<JobView | undefined>;
  stats: () => Promise<JobStatsView>;
  drain: () => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Accepts opaque payloads, tracks them in the job store and runs the fixed
 * transform on the bounded worker pool.
 */
export const createJobRunner = (deps: JobRunnerDeps): JobRunner => {
  const { store, audit } = deps;
  const config = resolveJobRunnerConfig(deps.config);
  const pool =
    deps.pool ??
    createWorkerPool({
      concurrency: config.concurrency,
      capacity: config.queueCapacity,
      onTaskError: (err) => {
        console.error(JSON.stringify({ event: "job.worker_error", message: toErrorMessage(err) }));
      }
    });
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const generateId = deps.generateId ?? randomUUID;

  const expireQuietly = async (jobId: string) => {
    try {
      await store.expire(jobId, config.jobTtlSeconds);
    } catch (err) {
      console.error(JSON.stringify({ event: "job.expire_failed", jobId, message: toErrorMessage(err) }));
    }
  };

  const fail = async (jobId: string, reason: unknown) => {
    const message = toErrorMessage(reason);
    console.error(JSON.stringify({ event: "job.failed", jobId, message }));
    try {
      await store.markFailed(jobId, message, now());
    } catch (err) {
      console.error(JSON.stringify({ event: "job.mark_failed_failed", jobId, message: toErrorMessage(err) }));
      return;
    }
    await expireQuietly(jobId);
  };

  const execute = async (jobId: string, payload: JobPayload): Promise<void> => {
    try {
      console.log(JSON.stringify({ event: "job.started", jobId }));
      await store.markProcessing(jobId, now());

      // Simulated work.
      await sleep(config.processingDelayMs);
      const result = transformPayload(payload, now());

      try {
        await audit.append({ jobId, input: payload, output: result, status: "completed", createdAt: now() });
      } catch (err) {
        console.error(JSON.stringify({ event: "job.audit_failed", jobId, message: toErrorMessage(err) }));
      }

      await store.markCompleted(jobId, result, now());
    } catch (err) {
      await fail(jobId, err);
      return;
    }

    await expireQuietly(jobId);
    console.log(JSON.stringify({ event: "job.completed", jobId }));
  };

  const submit = async (payload: JobPayload): Promise<string> => {
    let slot: WorkerSlot;
    try {
      // Held across the store write so concurrent submits cannot overshoot capacity.
      slot = pool.reserve();
    } catch (err) {
      if (err instanceof WorkerPoolFullError) throw new JobQueueFullError();
      throw err;
    }

    const jobId = generateId();
    try {
      await store.create({ id: jobId, input: payload, createdAt: now() });
    } catch (err) {
      slot.release();
      throw err;
    }

    slot.submit(() => execute(jobId, payload));
    console.log(JSON.stringify({ event: "job.queued", jobId, ...pool.size() }));
    return jobId;
  };

  const getStatus = async (jobId: string): Promise<JobView | undefined> => {
    const job = await store.get(jobId);
    return job ? toJobView(job) : undefined;
  };

  const stats = async (): Promise<JobStatsView> => {
    const counts = await audit.stats();
    return {
      total_jobs: counts.totalJobs,
      completed_jobs: counts.completedJobs,
      failed_jobs: counts.failedJobs,
      timestamp: now().toISOString()
    };
  };

  return { submit, execute, getStatus, stats, drain: () => pool.drain() };
};
