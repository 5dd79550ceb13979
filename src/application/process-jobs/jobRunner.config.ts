export type JobRunnerConfig = {
  concurrency: number;
  queueCapacity: number;
  processingDelayMs: number;
  jobTtlSeconds: number;
};

export type JobRunnerConfigInput = Partial<JobRunnerConfig>;

export const defaultJobRunnerConfig: JobRunnerConfig = {
  concurrency: 4,
  queueCapacity: 100,
  processingDelayMs: 3000,
  jobTtlSeconds: 86400
};

export const jobRunnerCaps = {
  concurrency: { min: 1, max: 64 },
  queueCapacity: { min: 1, max: 10000 },
  processingDelayMs: { min: 0, max: 60000 },
  jobTtlSeconds: { min: 60, max: 604800 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateJobRunnerConfig = (config: JobRunnerConfig): JobRunnerConfig => {
  assertIntegerInRange("concurrency", config.concurrency, jobRunnerCaps.concurrency.min, jobRunnerCaps.concurrency.max);
  assertIntegerInRange(
    "queueCapacity",
    config.queueCapacity,
    jobRunnerCaps.queueCapacity.min,
    jobRunnerCaps.queueCapacity.max
  );
  assertIntegerInRange(
    "processingDelayMs",
    config.processingDelayMs,
    jobRunnerCaps.processingDelayMs.min,
    jobRunnerCaps.processingDelayMs.max
  );
  assertIntegerInRange("jobTtlSeconds", config.jobTtlSeconds, jobRunnerCaps.jobTtlSeconds.min, jobRunnerCaps.jobTtlSeconds.max);
  if (config.queueCapacity < config.concurrency) {
    throw new Error(`queueCapacity=${config.queueCapacity} must be >= concurrency=${config.concurrency}`);
  }
  return config;
};

export const resolveJobRunnerConfig = (input: JobRunnerConfigInput = {}): JobRunnerConfig =>
  validateJobRunnerConfig({
    ...defaultJobRunnerConfig,
    ...input
  });
