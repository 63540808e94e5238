/**
 * Redis Volatile Cache Tests
 *
 * Key format, TTL handling and degradation when the backend fails.
 * @see packages/cache/src/cache.ts
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { MemoryRedis, RedisVolatileCache, type RedisCommands } from "../src/index.js";

describe("RedisVolatileCache", () => {
  let redis: MemoryRedis;
  let cache: RedisVolatileCache;

  beforeEach(() => {
    redis = new MemoryRedis();
    cache = new RedisVolatileCache(redis, { timeoutMs: 50, ttlSeconds: 0 });
  });

  describe("Key Format", () => {
    it("should store URLs under the versioned url prefix", async () => {
      await cache.setURL("abc123", "https://example.com");

      expect(redis.keys()).toEqual(["sp:v1:url:abc123"]);
      await expect(redis.get("sp:v1:url:abc123")).resolves.toBe("https://example.com");
    });

    it("should store OGP IDs under the versioned ogp prefix", async () => {
      await cache.setOGPID("abc123", 42);

      expect(redis.keys()).toEqual(["sp:v1:ogp:abc123"]);
      await expect(redis.get("sp:v1:ogp:abc123")).resolves.toBe("42");
    });
  });

  describe("URL Mapping", () => {
    it("should return null on a miss", async () => {
      await expect(cache.getURL("missing")).resolves.toBeNull();
    });

    it("should return the stored URL on a hit", async () => {
      await cache.setURL("abc123", "https://example.com");
      await expect(cache.getURL("abc123")).resolves.toBe("https://example.com");
    });

    it("should overwrite an existing URL", async () => {
      await cache.setURL("abc123", "https://example.com");
      await cache.setURL("abc123", "https://new.example.com");
      await expect(cache.getURL("abc123")).resolves.toBe("https://new.example.com");
    });
  });

  describe("OGP Mapping", () => {
    it("should return 0 when no mapping exists", async () => {
      await expect(cache.getOGPID("abc123")).resolves.toBe(0);
    });

    it("should round-trip an ID", async () => {
      await cache.setOGPID("abc123", 7);
      await expect(cache.getOGPID("abc123")).resolves.toBe(7);
    });

    it("should read garbage as 0", async () => {
      await redis.set("sp:v1:ogp:abc123", "not-a-number");
      await expect(cache.getOGPID("abc123")).resolves.toBe(0);

      await redis.set("sp:v1:ogp:abc123", "-4");
      await expect(cache.getOGPID("abc123")).resolves.toBe(0);
    });

    it("should delete the mapping without touching the URL", async () => {
      await cache.setURL("abc123", "https://example.com");
      await cache.setOGPID("abc123", 7);

      await cache.deleteOGPID("abc123");

      expect(redis.keys()).toEqual(["sp:v1:url:abc123"]);
      await expect(cache.getOGPID("abc123")).resolves.toBe(0);
    });
  });

  describe("TTL", () => {
    it("should write without expiry when ttlSeconds is 0", async () => {
      await cache.setURL("abc123", "https://example.com");
      expect(redis.ttl("sp:v1:url:abc123")).toBe(-1);
    });

    it("should apply a jittered TTL when configured", async () => {
      const ttlCache = new RedisVolatileCache(redis, { timeoutMs: 50, ttlSeconds: 3600 });
      const setex = jest.spyOn(redis, "setex");

      await ttlCache.setURL("abc123", "https://example.com");

      expect(setex).toHaveBeenCalledTimes(1);
      const [key, seconds, value] = setex.mock.calls[0];
      expect(key).toBe("sp:v1:url:abc123");
      expect(value).toBe("https://example.com");
      expect(seconds).toBeGreaterThanOrEqual(3312);
      expect(seconds).toBeLessThanOrEqual(3888);
    });
  });

  describe("Degradation", () => {
    const failing: RedisCommands = {
      get: () => Promise.reject(new Error("ECONNREFUSED")),
      set: () => Promise.reject(new Error("ECONNREFUSED")),
      setex: () => Promise.reject(new Error("ECONNREFUSED")),
      del: () => Promise.reject(new Error("ECONNREFUSED")),
      ping: () => Promise.reject(new Error("ECONNREFUSED")),
      quit: () => Promise.resolve("OK"),
    };

    it("should read a failing backend as a miss", async () => {
      const degraded = new RedisVolatileCache(failing, { timeoutMs: 50 });

      await expect(degraded.getURL("abc123")).resolves.toBeNull();
      await expect(degraded.getOGPID("abc123")).resolves.toBe(0);
    });

    it("should drop writes to a failing backend", async () => {
      const degraded = new RedisVolatileCache(failing, { timeoutMs: 50 });

      await expect(degraded.setURL("abc123", "https://example.com")).resolves.toBeUndefined();
      await expect(degraded.setOGPID("abc123", 1)).resolves.toBeUndefined();
      await expect(degraded.deleteOGPID("abc123")).resolves.toBeUndefined();
    });

    it("should treat a slow backend as a miss", async () => {
      const hanging: RedisCommands = {
        ...failing,
        get: () => new Promise<string | null>(() => undefined),
      };
      const degraded = new RedisVolatileCache(hanging, { timeoutMs: 10 });

      await expect(degraded.getURL("abc123")).resolves.toBeNull();
    });

    it("should report an unreachable backend as unhealthy", async () => {
      const degraded = new RedisVolatileCache(failing, { timeoutMs: 50 });

      await expect(degraded.ping()).resolves.toBe(false);
      await expect(cache.ping()).resolves.toBe(true);
    });
  });
});
