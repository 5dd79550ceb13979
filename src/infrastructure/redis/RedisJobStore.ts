import type Redis from "ioredis";
import {
  InvalidJobTransitionError,
  isJobStatus,
  JobNotFoundError,
  previousStatusesOf,
  type JobPayload,
  type JobRecord,
  type JobStatus,
  type ProcessedResult
} from "../../core/jobs/Job";
import type { JobStore } from "../../ports/JobStore";

export const jobKey = (id: string): string => `job:${id}`;

// Writes the initial hash only if the key does not exist yet.
const createScript = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
for i = 1, #ARGV, 2 do redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1]) end
return 1
`;

// ARGV[1] is a comma-separated list of statuses the job may move from;
// the remaining arguments are field/value pairs.
const transitionScript = `
local current = redis.call('HGET', KEYS[1], 'status')
if not current then return {-1} end
if not string.find(',' .. ARGV[1] .. ',', ',' .. current .. ',', 1, true) then return {0, current} end
for i = 2, #ARGV, 2 do redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1]) end
return {1}
`;

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isProcessedResult = (value: unknown): value is ProcessedResult =>
  isRecord(value) &&
  typeof value.processed_at === "string" &&
  typeof value.word_count === "number" &&
  typeof value.char_count === "number" &&
  "original_data" in value &&
  "uppercase" in value;

const parseJson = (id: string, field: string, raw: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new Error(`Job ${id} has a malformed ${field} field`);
  }
};

/**
 * Maps a job hash back to a JobRecord. Throws on hashes this service did not write.
 */
export const parseJobHash = (id: string, hash: Record<string, string>): JobRecord => {
  const status = hash.status;
  if (!isJobStatus(status)) {
    throw new Error(`Job ${id} has an unknown status: ${String(status)}`);
  }

  const record: JobRecord = {
    id,
    status,
    input: hash.input_data != null ? parseJson(id, "input_data", hash.input_data) : null,
    createdAt: hash.created_at ?? ""
  };

  if (hash.started_at != null) record.startedAt = hash.started_at;
  if (hash.completed_at != null) record.completedAt = hash.completed_at;
  if (hash.failed_at != null) record.failedAt = hash.failed_at;
  if (hash.error != null) record.error = hash.error;
  if (hash.result != null) {
    const result = parseJson(id, "result", hash.result);
    if (!isProcessedResult(result)) {
      throw new Error(`Job ${id} has a malformed result field`);
    }
    record.result = result;
  }

  return record;
};

/**
 * One Redis hash per job under `job:{id}`. Status changes go through a Lua
 * script so the check-and-set is atomic per key.
 */
export class RedisJobStore implements JobStore {
  constructor(private readonly redis: Redis) {}

  async create(job: { id: string; input: JobPayload; createdAt: Date }): Promise<void> {
    const created = await this.redis.eval(
      createScript,
      1,
      jobKey(job.id),
      "status",
      "queued",
      "created_at",
      job.createdAt.toISOString(),
      "input_data",
      JSON.stringify(job.input)
    );
    if (created !== 1) {
      throw new Error(`Job ${job.id} already exists`);
    }
  }

  async markProcessing(id: string, startedAt: Date): Promise<void> {
    await this.transition(id, "processing", { started_at: startedAt.toISOString() });
  }

  async markCompleted(id: string, result: ProcessedResult, completedAt: Date): Promise<void> {
    await this.transition(id, "completed", {
      completed_at: completedAt.toISOString(),
      result: JSON.stringify(result)
    });
  }

  async markFailed(id: string, error: string, failedAt: Date): Promise<void> {
    await this.transition(id, "failed", { error, failed_at: failedAt.toISOString() });
  }

  async expire(id: string, ttlSeconds: number): Promise<void> {
    await this.redis.expire(jobKey(id), ttlSeconds);
  }

  async get(id: string): Promise<JobRecord | undefined> {
    const hash = await this.redis.hgetall(jobKey(id));
    if (Object.keys(hash).length === 0) return undefined;
    return parseJobHash(id, hash);
  }

  private async transition(id: string, to: JobStatus, fields: Record<string, string>): Promise<void> {
    const args = [previousStatusesOf(to).join(","), "status", to];
    for (const [field, value] of Object.entries(fields)) {
      args.push(field, value);
    }

    const reply = await this.redis.eval(transitionScript, 1, jobKey(id), ...args);
    if (!Array.isArray(reply)) {
      throw new Error(`Unexpected reply from job transition script: ${String(reply)}`);
    }

    const outcome: unknown = reply[0];
    const current: unknown = reply[1];
    if (outcome === 1) return;
    if (outcome === -1) throw new JobNotFoundError(id);
    if (isJobStatus(current)) throw new InvalidJobTransitionError(id, current, to);
    throw new Error(`Job ${id} has an unknown status: ${String(current)}`);
  }
}
