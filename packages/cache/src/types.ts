/**
 * Cache Type Definitions
 */

import type { Logger } from "@shortpage/logger";

/**
 * The two key spaces the redirect path reads:
 *   sp:v1:url:{slug} → destination URL
 *   sp:v1:ogp:{slug} → OGP record ID (0 = none/unknown)
 *
 * Every method degrades instead of throwing: a backend failure reads as
 * a miss and a failed write is dropped.
 */
export interface VolatileCache {
  getURL(slug: string): Promise<string | null>;
  setURL(slug: string, url: string): Promise<void>;
  getOGPID(slug: string): Promise<number>;
  setOGPID(slug: string, ogpId: number): Promise<void>;
  deleteOGPID(slug: string): Promise<void>;
  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}

/**
 * The subset of Redis commands the cache issues. An ioredis client
 * satisfies it, and so does MemoryRedis.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface VolatileCacheOptions {
  /** Per-command budget; a slower command counts as a miss */
  timeoutMs: number;
  /** 0 keeps entries until evicted */
  ttlSeconds: number;
  logger?: Logger;
}

export type CacheDriver = "redis" | "memory";
