/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 *
 * Design Decision: Fail fast on startup if required vars are missing.
 */

import { optional, optionalEnum, optionalInt, required } from "@shortpage/shared";
import type { CacheDriver } from "@shortpage/cache";
import type { StoreDriver } from "@shortpage/db";
import type { AnalyticsMode } from "@shortpage/analytics";
import type { Logger } from "@shortpage/logger";

export interface RedirectConfig {
  env: string;

  /** HTTP server port */
  port: number;
  /** HTTP server host */
  host: string;

  /** Redis connection URL (cache and analytics queue) */
  redisUrl: string;
  /** Budget per cache command (ms) */
  redisTimeoutMs: number;
  /** 0 keeps cache entries until evicted */
  cacheTtlSeconds: number;
  cacheDriver: CacheDriver;

  /** PostgreSQL connection URL; empty with the memory store */
  databaseUrl: string;
  /** Budget per store query (ms) */
  dbTimeoutMs: number;
  storeDriver: StoreDriver;

  analyticsMode: AnalyticsMode;
}

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if DATABASE_URL is missing with the postgres store
 */
export function loadConfig(): RedirectConfig {
  const storeDriver = optionalEnum<StoreDriver>("STORE_DRIVER", ["postgres", "memory"], "postgres");

  return {
    env: optional("NODE_ENV", "development"),

    // Server
    port: optionalInt("PORT", 3002),
    host: optional("HOST", "0.0.0.0"),

    // Redis
    redisUrl: optional("REDIS_URL", "redis://localhost:6379"),
    redisTimeoutMs: optionalInt("REDIS_TIMEOUT_MS", 50),
    cacheTtlSeconds: optionalInt("CACHE_TTL_SECONDS", 0),
    cacheDriver: optionalEnum<CacheDriver>("CACHE_DRIVER", ["redis", "memory"], "redis"),

    // Database
    databaseUrl: storeDriver === "postgres" ? required("DATABASE_URL") : optional("DATABASE_URL", ""),
    dbTimeoutMs: optionalInt("DB_TIMEOUT_MS", 200),
    storeDriver,

    analyticsMode: optionalEnum<AnalyticsMode>("ANALYTICS_MODE", ["queue", "direct", "off"], "queue"),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: RedirectConfig, logger: Logger): void {
  if (config.redisTimeoutMs > 100) {
    logger.warn(
      { redisTimeoutMs: config.redisTimeoutMs },
      "REDIS_TIMEOUT_MS is high. Consider <=50ms for low latency."
    );
  }

  if (config.dbTimeoutMs > 500) {
    logger.warn(
      { dbTimeoutMs: config.dbTimeoutMs },
      "DB_TIMEOUT_MS is high. Consider <=200ms for low latency."
    );
  }

  if (config.cacheTtlSeconds > 0 && config.cacheTtlSeconds < 60) {
    logger.warn(
      { cacheTtlSeconds: config.cacheTtlSeconds },
      "CACHE_TTL_SECONDS is short. This may cause high DB load."
    );
  }

  if (config.analyticsMode === "queue" && config.cacheDriver === "memory") {
    logger.warn("ANALYTICS_MODE=queue still needs Redis while CACHE_DRIVER=memory");
  }
}
