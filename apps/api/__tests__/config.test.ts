import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createLogger } from "@shortpage/logger";
import { loadConfig, loadJwtSettings, validateConfig, type ApiConfig } from "../src/config.js";

const VARS = [
  "PORT",
  "HOST",
  "REDIS_URL",
  "REDIS_TIMEOUT_MS",
  "CACHE_TTL_SECONDS",
  "CACHE_DRIVER",
  "DATABASE_URL",
  "DB_TIMEOUT_MS",
  "STORE_DRIVER",
  "JWT_SECRET",
  "JWT_EXPIRES_IN_SECONDS",
  "SHORT_URL_BASE",
];

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("should apply defaults", () => {
    process.env.DATABASE_URL = "postgres://localhost:5432/shortpage";

    expect(loadConfig()).toEqual({
      env: "test",
      port: 3000,
      host: "0.0.0.0",
      redisUrl: "redis://localhost:6379",
      redisTimeoutMs: 50,
      cacheTtlSeconds: 0,
      cacheDriver: "redis",
      databaseUrl: "postgres://localhost:5432/shortpage",
      dbTimeoutMs: 200,
      storeDriver: "postgres",
      jwtSecret: "local-development-secret",
      jwtExpiresInSeconds: 604800,
      shortUrlBase: "http://localhost:3002",
    });
  });

  it("should strip trailing slashes from SHORT_URL_BASE", () => {
    process.env.STORE_DRIVER = "memory";
    process.env.SHORT_URL_BASE = "https://sp.test//";

    expect(loadConfig().shortUrlBase).toBe("https://sp.test");
  });

  it("should require JWT_SECRET outside development and test", () => {
    expect(() => loadJwtSettings("production")).toThrow("Missing required environment variable: JWT_SECRET");
  });

  it("should fall back to the local secret in development", () => {
    expect(loadJwtSettings("development")).toEqual({
      jwtSecret: "local-development-secret",
      jwtExpiresInSeconds: 604800,
    });
  });

  it("should read the token settings", () => {
    process.env.JWT_SECRET = "test-secret";
    process.env.JWT_EXPIRES_IN_SECONDS = "60";

    expect(loadJwtSettings("production")).toEqual({ jwtSecret: "test-secret", jwtExpiresInSeconds: 60 });
  });
});

describe("validateConfig", () => {
  const base: ApiConfig = {
    env: "test",
    port: 3000,
    host: "0.0.0.0",
    redisUrl: "redis://localhost:6379",
    redisTimeoutMs: 50,
    cacheTtlSeconds: 0,
    cacheDriver: "memory",
    databaseUrl: "",
    dbTimeoutMs: 200,
    storeDriver: "memory",
    jwtSecret: "test-secret",
    jwtExpiresInSeconds: 3600,
    shortUrlBase: "https://sp.test",
  };

  it("should stay quiet for sane settings", () => {
    const logger = createLogger("config-test");
    const warn = jest.spyOn(logger, "warn").mockImplementation(() => undefined);

    validateConfig(base, logger);

    expect(warn).not.toHaveBeenCalled();
  });

  it("should warn about the local secret and a slow store budget", () => {
    const logger = createLogger("config-test");
    const warn = jest.spyOn(logger, "warn").mockImplementation(() => undefined);

    validateConfig({ ...base, jwtSecret: "local-development-secret", dbTimeoutMs: 2000 }, logger);

    expect(warn).toHaveBeenCalledTimes(2);
  });
});
