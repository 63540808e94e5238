/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import Redis, { type RedisOptions } from "ioredis";
import { createLogger, type Logger } from "@shortpage/logger";

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 1) */
  maxRetries?: number;
  logger?: Logger;
}

/**
 * Create a configured Redis client
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 1,
    logger = createLogger("redis"),
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,
    enableReadyCheck: true,
    enableOfflineQueue: false, // Fail fast when disconnected

    retryStrategy: (times) => Math.min(times * 100, 2000),
  });

  client.on("connect", () => logger.info("Redis connected"));
  client.on("error", (err: Error) => logger.warn({ err }, "Redis connection error"));
  client.on("close", () => logger.debug("Redis connection closed"));

  return client;
}

/**
 * Connection options for BullMQ, which opens its own ioredis connections
 * and requires `maxRetriesPerRequest: null` on them.
 */
export function redisConnectionOptions(url: string): RedisOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.length > 1 ? parseInt(parsed.pathname.slice(1), 10) : 0;

  return {
    host: parsed.hostname || "localhost",
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: isNaN(db) ? 0 : db,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  };
}
