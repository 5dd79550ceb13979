import { Pool, type PoolClient } from "pg";

export const createPgPool = (databaseUrl: string, max = 10): Pool => {
  const pool = new Pool({ connectionString: databaseUrl, max });
  // Idle clients can emit errors (e.g. server restart); without a listener the process crashes.
  pool.on("error", (err) => {
    console.error(JSON.stringify({ event: "db.pool_error", message: err.message }));
  });
  return pool;
};

/**
 * Runs `fn` on one pooled client inside BEGIN/COMMIT. Any error rolls back and
 * is rethrown; the client always goes back to the pool.
 */
export const withTransaction = async <T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  let releaseError: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      // Broken connection: drop it instead of returning it to the pool.
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      console.error(JSON.stringify({ event: "db.rollback_failed", message: releaseError.message }));
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
};

export const pingPostgres = async (pool: Pool): Promise<void> => {
  await pool.query("SELECT 1");
};
