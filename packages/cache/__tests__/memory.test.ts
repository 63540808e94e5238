import { describe, it, expect } from "@jest/globals";
import { MemoryRedis } from "../src/index.js";

describe("MemoryRedis", () => {
  it("should expire setex entries once their TTL passes", async () => {
    let now = 1_000_000;
    const redis = new MemoryRedis(() => now);

    await redis.setex("k", 10, "v");
    expect(redis.ttl("k")).toBe(10);

    now += 9_999;
    await expect(redis.get("k")).resolves.toBe("v");

    now += 1;
    await expect(redis.get("k")).resolves.toBeNull();
    expect(redis.ttl("k")).toBe(-2);
  });

  it("should report how many keys DEL removed", async () => {
    const redis = new MemoryRedis();
    await redis.set("k", "v");

    await expect(redis.del("k")).resolves.toBe(1);
    await expect(redis.del("k")).resolves.toBe(0);
  });

  it("should clear everything on quit", async () => {
    const redis = new MemoryRedis();
    await redis.set("a", "1");
    await redis.set("b", "2");

    await redis.quit();

    expect(redis.keys()).toEqual([]);
  });
});
