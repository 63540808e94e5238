import { describe, it, expect, jest, afterEach } from "@jest/globals";
import { withTimeout, TimeoutError, applyJitter } from "../src/index.js";

describe("withTimeout", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("should resolve with the promise value when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50, "get")).resolves.toBe("ok");
  });

  it("should pass through rejections", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 50, "get")).rejects.toThrow(
      "boom"
    );
  });

  it("should reject with TimeoutError when the budget runs out", async () => {
    jest.useFakeTimers();
    const never = new Promise<string>(() => undefined);

    const pending = withTimeout(never, 50, "redis get");
    jest.advanceTimersByTime(50);

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("redis get timed out after 50ms");
  });
});

describe("applyJitter", () => {
  it("should stay within ±8% of the TTL", () => {
    expect(applyJitter(1000, () => 0)).toBe(920);
    expect(applyJitter(1000, () => 0.5)).toBe(1000);
    expect(applyJitter(1000, () => 1)).toBe(1080);
  });

  it("should never go below one second", () => {
    expect(applyJitter(1, () => 0)).toBe(1);
  });
});
