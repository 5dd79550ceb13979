export type JobStatus = "queued" | "processing" | "completed" | "failed";

export type JobPayload = unknown;

export type ProcessedResult = {
  original_data: JobPayload;
  processed_at: string;
  word_count: number;
  char_count: number;
  uppercase: JobPayload;
};

export type JobRecord = {
  id: string;
  status: JobStatus;
  input: JobPayload;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  failedAt?: string;
  result?: ProcessedResult;
  error?: string;
};

/**
 * Shape returned by the job lookup endpoint.
 */
export type JobView = {
  job_id: string;
  status: JobStatus;
  created_at: string;
  result?: ProcessedResult;
  error?: string;
};

const allowedTransitions: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["processing", "failed"],
  processing: ["completed", "failed"],
  completed: [],
  failed: []
};

export const jobStatuses: readonly JobStatus[] = ["queued", "processing", "completed", "failed"];

export const isJobStatus = (value: unknown): value is JobStatus => jobStatuses.some((status) => status === value);

export const previousStatusesOf = (to: JobStatus): JobStatus[] =>
  jobStatuses.filter((from) => allowedTransitions[from].includes(to));

export class InvalidJobTransitionError extends Error {
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidJobTransitionError";
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toJobView = (job: JobRecord): JobView => {
  const view: JobView = {
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt
  };
  if (job.result !== undefined) view.result = job.result;
  if (job.error !== undefined) view.error = job.error;
  return view;
};

export class JobNotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
