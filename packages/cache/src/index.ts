/**
 * Cache Package Exports
 *
 * The volatile tier of the redirect path. Redis in production, an
 * in-process command set for local runs and tests.
 */

import type { Logger } from "@shortpage/logger";
import { RedisVolatileCache } from "./cache.js";
import { createRedisClient } from "./client.js";
import { MemoryRedis } from "./memory.js";
import type { CacheDriver, VolatileCache } from "./types.js";

export { RedisVolatileCache, urlKey, ogpKey } from "./cache.js";
export { createRedisClient, redisConnectionOptions, type RedisClientOptions } from "./client.js";
export { MemoryRedis } from "./memory.js";
export type { VolatileCache, RedisCommands, VolatileCacheOptions, CacheDriver } from "./types.js";

export interface CreateVolatileCacheOptions {
  driver: CacheDriver;
  redisUrl: string;
  timeoutMs: number;
  ttlSeconds: number;
  logger?: Logger;
}

/**
 * Build the configured cache. The Redis client connects lazily in the
 * background; until it is ready every command degrades to a miss.
 */
export function createVolatileCache(options: CreateVolatileCacheOptions): VolatileCache {
  const client =
    options.driver === "memory"
      ? new MemoryRedis()
      : createRedisClient({ url: options.redisUrl, logger: options.logger });

  return new RedisVolatileCache(client, {
    timeoutMs: options.timeoutMs,
    ttlSeconds: options.ttlSeconds,
    logger: options.logger,
  });
}
