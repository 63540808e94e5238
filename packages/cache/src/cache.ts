/**
 * Redis Volatile Cache
 *
 * Key Schema:
 *   sp:v1:url:{slug} - destination URL
 *   sp:v1:ogp:{slug} - OGP record ID as a decimal string
 *
 * Failure Handling:
 * - Every command is raced against `timeoutMs`
 * - Errors and timeouts are logged and read as a miss (GET) or dropped
 *   (SET/DEL); the store stays authoritative
 */

import { applyJitter, withTimeout, CACHE_KEYS } from "@shortpage/shared";
import { createLogger, type Logger } from "@shortpage/logger";
import type { RedisCommands, VolatileCache, VolatileCacheOptions } from "./types.js";

const DEFAULT_OPTIONS: VolatileCacheOptions = {
  timeoutMs: 50,
  ttlSeconds: 0,
};

export function urlKey(slug: string): string {
  return `${CACHE_KEYS.URL_PREFIX}${slug}`;
}

export function ogpKey(slug: string): string {
  return `${CACHE_KEYS.OGP_PREFIX}${slug}`;
}

/**
 * Decode a stored OGP ID. Anything that is not a positive integer
 * means "none".
 */
function parseOGPID(raw: string | null): number {
  if (raw === null) return 0;
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : 0;
}

export class RedisVolatileCache implements VolatileCache {
  private readonly client: RedisCommands;
  private readonly timeoutMs: number;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;

  constructor(client: RedisCommands, options: Partial<VolatileCacheOptions> = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_OPTIONS.ttlSeconds;
    this.logger = options.logger ?? createLogger("cache");
  }

  // =========================================================================
  // URL Mapping
  // =========================================================================

  async getURL(slug: string): Promise<string | null> {
    return this.guard("GET url", slug, () => this.client.get(urlKey(slug)), null);
  }

  async setURL(slug: string, url: string): Promise<void> {
    await this.guard("SET url", slug, () => this.write(urlKey(slug), url), undefined);
  }

  // =========================================================================
  // OGP Mapping
  // =========================================================================

  async getOGPID(slug: string): Promise<number> {
    const raw = await this.guard("GET ogp", slug, () => this.client.get(ogpKey(slug)), null);
    return parseOGPID(raw);
  }

  async setOGPID(slug: string, ogpId: number): Promise<void> {
    await this.guard("SET ogp", slug, () => this.write(ogpKey(slug), String(ogpId)), undefined);
  }

  async deleteOGPID(slug: string): Promise<void> {
    await this.guard("DEL ogp", slug, () => this.client.del(ogpKey(slug)), 0);
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  async ping(): Promise<boolean> {
    try {
      const reply = await withTimeout(this.client.ping(), this.timeoutMs, "redis PING");
      return reply === "PONG";
    } catch (err) {
      this.logger.warn({ err }, "Redis ping failed");
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private write(key: string, value: string): Promise<unknown> {
    if (this.ttlSeconds > 0) {
      return this.client.setex(key, applyJitter(this.ttlSeconds), value);
    }
    return this.client.set(key, value);
  }

  private async guard<T>(
    operation: string,
    slug: string,
    command: () => Promise<T>,
    fallback: T
  ): Promise<T> {
    try {
      return await withTimeout(command(), this.timeoutMs, `redis ${operation}`);
    } catch (err) {
      this.logger.warn({ err, slug, operation }, "Cache command failed, degrading");
      return fallback;
    }
  }
}
