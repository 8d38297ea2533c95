import { Redis, type RedisOptions } from "ioredis";
import { config } from "../config/index.js";
import { logger } from "./logger.js";

let redisInstance: Redis | null = null;

function connectionOptions(): RedisOptions {
  return {
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    db: config.REDIS_DB,
    ...(config.REDIS_USERNAME && { username: config.REDIS_USERNAME }),
    ...(config.REDIS_PASSWORD && { password: config.REDIS_PASSWORD }),
    ...(config.REDIS_TLS && { tls: { rejectUnauthorized: true } }),
    connectTimeout: 10_000,
    commandTimeout: 5_000,
    // Fail meeting operations fast instead of queueing them while down
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, 2000),
  };
}

/**
 * Shared client for meeting storage and the Socket.IO adapter's publisher.
 */
export function getRedisClient(): Redis {
  if (redisInstance) return redisInstance;

  const client = new Redis(connectionOptions());
  const target = { host: config.REDIS_HOST, port: config.REDIS_PORT, db: config.REDIS_DB };

  client.on("error", (err) => {
    logger.error({ err, ...target }, "Redis connection error");
  });
  client.on("ready", () => {
    logger.info(target, "Redis ready");
  });
  client.on("reconnecting", (delay: number) => {
    logger.warn({ ...target, delay }, "Redis reconnecting");
  });

  redisInstance = client;
  return client;
}

/** Quit every client that is still connected */
export async function quitRedisClients(clients: readonly Redis[]): Promise<void> {
  await Promise.all(
    clients
      .filter((client) => client.status === "ready")
      .map((client) => client.quit()),
  );
  redisInstance = null;
}
