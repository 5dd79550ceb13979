import type { Server } from "http";
import type Redis from "ioredis";
import type { Pool } from "pg";
import { importHousing, type ImportResult } from "../application/import-housing/importHousing.usecase";
import { createJobRunner } from "../application/process-jobs/jobRunner";
import { createPgPool, pingPostgres } from "../infrastructure/postgres/PgPoolFactory";
import { PgHousingRepository } from "../infrastructure/postgres/PgHousingRepository";
import { PgJobAuditRepository } from "../infrastructure/postgres/PgJobAuditRepository";
import { createRedisClient } from "../infrastructure/redis/RedisClientFactory";
import { RedisJobStore } from "../infrastructure/redis/RedisJobStore";
import { createServer } from "../server";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type ServiceHandle = {
  server: Server;
  close: () => Promise<void>;
};

const listen = (server: Server, port: number): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

const closeServer = (server: Server): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

const closeClients = async (pgPool: Pool, redis?: Redis): Promise<void> => {
  const results = await Promise.allSettled([redis ? redis.quit() : Promise.resolve(), pgPool.end()]);
  for (const result of results) {
    if (result.status === "rejected") {
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(JSON.stringify({ event: "server.close_failed", message }));
    }
  }
};

/**
 * Startup contract: both stores must answer, the schema is always ensured, and
 * housing data is imported only when HOUSING_SEED_FILE is set.
 */
export const startService = async (): Promise<ServiceHandle> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const pgPool = createPgPool(env.DATABASE_URL, runtime.dbPoolMax);
  let redis: Redis | undefined;

  try {
    await pingPostgres(pgPool);
    redis = await createRedisClient(env.REDIS_HOST, env.REDIS_PORT);

    const housing = new PgHousingRepository(pgPool);
    const audit = new PgJobAuditRepository(pgPool);
    await housing.ensureSchema();
    await audit.ensureSchema();

    if (runtime.housingSeedFile) {
      await importHousing({ repo: housing }, { kind: "file", path: runtime.housingSeedFile });
    }

    const jobs = createJobRunner({ store: new RedisJobStore(redis), audit, config: runtime.jobRunnerConfig });
    const server = createServer({ jobs, housing });
    await listen(server, env.PORT);
    console.log(JSON.stringify({ event: "server.started", port: env.PORT, ...runtime.jobRunnerConfig }));

    const openRedis = redis;
    let closing: Promise<void> | undefined;
    const close = () => {
      closing ??= (async () => {
        await closeServer(server);
        await jobs.drain();
        await closeClients(pgPool, openRedis);
        console.log(JSON.stringify({ event: "server.stopped" }));
      })();
      return closing;
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        console.log(JSON.stringify({ event: "server.shutdown", signal }));
        close().then(
          () => process.exit(0),
          (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            console.error(JSON.stringify({ event: "server.close_failed", message }));
            process.exit(1);
          }
        );
      });
    }

    return { server, close };
  } catch (err) {
    await closeClients(pgPool, redis);
    throw err;
  }
};

export const runImport = async (path: string): Promise<ImportResult> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const pgPool = createPgPool(env.DATABASE_URL, runtime.dbPoolMax);
  const repo = new PgHousingRepository(pgPool);

  try {
    return await importHousing({ repo }, { kind: "file", path });
  } finally {
    await pgPool.end();
  }
};
