import Redis from "ioredis";

/**
 * One shared, multiplexed connection per process. `maxRetriesPerRequest: 0`
 * makes a command fail as soon as the connection is down.
 */
export const createRedisClient = async (host: string, port: number): Promise<Redis> => {
  const client = new Redis({ host, port, lazyConnect: true, maxRetriesPerRequest: 0 });
  client.on("error", (err: Error) => {
    console.error(JSON.stringify({ event: "redis.error", message: err.message }));
  });
  await client.connect();
  return client;
};
