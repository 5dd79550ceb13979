import type { Pool } from "pg";
import { pingPostgres, withTransaction } from "../../src/infrastructure/postgres/PgPoolFactory";

const createFakePool = (failOn: string[] = []) => {
  const client = {
    query: jest.fn(async (text: string) => {
      if (failOn.includes(text)) throw new Error(`${text} failed`);
      return { rows: [] };
    }),
    release: jest.fn()
  };
  const pool = { connect: jest.fn(async () => client), query: jest.fn(async () => ({ rows: [] })) };
  return { client, pool: pool as unknown as Pool, rawPool: pool };
};

describe("withTransaction", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("commits and returns the callback result", async () => {
    const { client, pool } = createFakePool();

    await expect(withTransaction(pool, async () => "done")).resolves.toBe("done");
    expect(client.query.mock.calls.map(([text]) => text)).toEqual(["BEGIN", "COMMIT"]);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it("rolls back and rethrows the callback error", async () => {
    const { client, pool } = createFakePool();

    await expect(
      withTransaction(pool, async () => {
        throw new Error("write failed");
      })
    ).rejects.toThrow("write failed");
    expect(client.query.mock.calls.map(([text]) => text)).toEqual(["BEGIN", "ROLLBACK"]);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it("discards the client when the rollback fails", async () => {
    const { client, pool } = createFakePool(["ROLLBACK"]);

    await expect(
      withTransaction(pool, async () => {
        throw new Error("write failed");
      })
    ).rejects.toThrow("write failed");
    expect(client.release).toHaveBeenCalledWith(new Error("ROLLBACK failed"));
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify({ event: "db.rollback_failed", message: "ROLLBACK failed" }));
  });

  it("pings with a trivial query", async () => {
    const { pool, rawPool } = createFakePool();
    await pingPostgres(pool);
    expect(rawPool.query).toHaveBeenCalledWith("SELECT 1");
  });
});
