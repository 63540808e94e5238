/**
 * API Configuration
 *
 * Same variables as the redirect service for the cache and store, plus
 * the JWT settings.
 */

import { optional, optionalEnum, optionalInt, required } from "@shortpage/shared";
import type { CacheDriver } from "@shortpage/cache";
import type { StoreDriver } from "@shortpage/db";
import type { Logger } from "@shortpage/logger";

export interface ApiConfig {
  env: string;
  port: number;
  host: string;

  redisUrl: string;
  redisTimeoutMs: number;
  cacheTtlSeconds: number;
  cacheDriver: CacheDriver;

  databaseUrl: string;
  dbTimeoutMs: number;
  storeDriver: StoreDriver;

  /** HMAC secret for Bearer tokens */
  jwtSecret: string;
  /** Lifetime of tokens minted by `npm run token` */
  jwtExpiresInSeconds: number;

  /** Public origin of the redirect service, used to build short URLs */
  shortUrlBase: string;
}

const LOCAL_ENVS = ["development", "test"];
const LOCAL_JWT_SECRET = "local-development-secret";

export interface JwtSettings {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
}

/**
 * Token settings alone; the token CLI needs nothing else.
 *
 * @throws Error if JWT_SECRET is missing outside development/test
 */
export function loadJwtSettings(env = optional("NODE_ENV", "development")): JwtSettings {
  return {
    jwtSecret: LOCAL_ENVS.includes(env) ? optional("JWT_SECRET", LOCAL_JWT_SECRET) : required("JWT_SECRET"),
    jwtExpiresInSeconds: optionalInt("JWT_EXPIRES_IN_SECONDS", 7 * 24 * 60 * 60),
  };
}

/**
 * @throws Error if JWT_SECRET is missing outside development/test, or
 *   DATABASE_URL is missing with the postgres store
 */
export function loadConfig(): ApiConfig {
  const env = optional("NODE_ENV", "development");
  const storeDriver = optionalEnum<StoreDriver>("STORE_DRIVER", ["postgres", "memory"], "postgres");

  return {
    env,
    port: optionalInt("PORT", 3000),
    host: optional("HOST", "0.0.0.0"),

    redisUrl: optional("REDIS_URL", "redis://localhost:6379"),
    redisTimeoutMs: optionalInt("REDIS_TIMEOUT_MS", 50),
    cacheTtlSeconds: optionalInt("CACHE_TTL_SECONDS", 0),
    cacheDriver: optionalEnum<CacheDriver>("CACHE_DRIVER", ["redis", "memory"], "redis"),

    databaseUrl: storeDriver === "postgres" ? required("DATABASE_URL") : optional("DATABASE_URL", ""),
    dbTimeoutMs: optionalInt("DB_TIMEOUT_MS", 200),
    storeDriver,

    ...loadJwtSettings(env),

    shortUrlBase: optional("SHORT_URL_BASE", "http://localhost:3002").replace(/\/+$/, ""),
  };
}

/**
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: ApiConfig, logger: Logger): void {
  if (config.jwtSecret === LOCAL_JWT_SECRET) {
    logger.warn("JWT_SECRET is not set; using the local development secret");
  }

  if (config.dbTimeoutMs > 1000) {
    logger.warn({ dbTimeoutMs: config.dbTimeoutMs }, "DB_TIMEOUT_MS is high.");
  }
}
