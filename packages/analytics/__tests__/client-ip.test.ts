import { describe, it, expect } from "@jest/globals";
import { resolveClientIp } from "../src/index.js";

function headers(values: Record<string, string>): (name: string) => string | undefined {
  return (name) => values[name];
}

describe("resolveClientIp", () => {
  it("should prefer CF-Connecting-IP", () => {
    const ip = resolveClientIp(
      headers({ "cf-connecting-ip": "198.51.100.1", "x-forwarded-for": "203.0.113.9" }),
      "10.0.0.1"
    );
    expect(ip).toBe("198.51.100.1");
  });

  it("should take the first X-Forwarded-For hop", () => {
    const ip = resolveClientIp(headers({ "x-forwarded-for": " 203.0.113.9 , 10.0.0.2, 10.0.0.3" }));
    expect(ip).toBe("203.0.113.9");
  });

  it("should fall back to X-Real-IP", () => {
    expect(resolveClientIp(headers({ "x-real-ip": "192.0.2.4" }), "10.0.0.1")).toBe("192.0.2.4");
  });

  it("should fall back to the socket address", () => {
    expect(resolveClientIp(headers({}), "10.0.0.1")).toBe("10.0.0.1");
  });

  it("should return an empty string when nothing is known", () => {
    expect(resolveClientIp(headers({}))).toBe("");
  });
});
