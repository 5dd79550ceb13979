import {
  defaultJobRunnerConfig,
  type JobRunnerConfig,
  validateJobRunnerConfig
} from "../../application/process-jobs/jobRunner.config";

export const runtimeCaps = {
  dbPoolMax: { min: 1, max: 100 }
} as const;

export type RuntimeConfig = {
  jobRunnerConfig: JobRunnerConfig;
  dbPoolMax: number;
  housingSeedFile?: string;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const jobRunnerConfig = validateJobRunnerConfig({
    concurrency: parseOptionalIntInRange(env, "JOB_CONCURRENCY", { min: 1, max: 64 }) ?? defaultJobRunnerConfig.concurrency,
    queueCapacity:
      parseOptionalIntInRange(env, "JOB_QUEUE_CAPACITY", { min: 1, max: 10000 }) ?? defaultJobRunnerConfig.queueCapacity,
    processingDelayMs:
      parseOptionalIntInRange(env, "JOB_PROCESSING_DELAY_MS", { min: 0, max: 60000 }) ??
      defaultJobRunnerConfig.processingDelayMs,
    jobTtlSeconds:
      parseOptionalIntInRange(env, "JOB_TTL_SECONDS", { min: 60, max: 604800 }) ?? defaultJobRunnerConfig.jobTtlSeconds
  });

  const dbPoolMax =
    parseOptionalIntInRange(env, "DB_POOL_MAX", {
      min: runtimeCaps.dbPoolMax.min,
      max: runtimeCaps.dbPoolMax.max
    }) ?? 10;

  const housingSeedFile = env.HOUSING_SEED_FILE?.trim() ? env.HOUSING_SEED_FILE.trim() : undefined;

  return { jobRunnerConfig, dbPoolMax, housingSeedFile };
};
