import { describe, it, expect, beforeEach } from "@jest/globals";
import * as metrics from "../src/metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should count outcomes by status and cache source", () => {
    metrics.recordRedirect(307, "cache", 1);
    metrics.recordRedirect(307, "store", 12);
    metrics.recordRedirect(404, "none", 0.5);

    const lines = metrics.getMetrics().split("\n");

    expect(lines).toContain('sp_redirect_total{status="307"} 2');
    expect(lines).toContain('sp_redirect_total{status="404"} 1');
    expect(lines).toContain("sp_cache_hit_total 1");
    expect(lines).toContain("sp_cache_miss_total 1");
  });

  it("should build a cumulative latency histogram", () => {
    metrics.recordLatency(0.5);
    metrics.recordLatency(4);
    metrics.recordLatency(2500);

    const lines = metrics.getMetrics().split("\n");

    expect(lines).toContain('sp_redirect_latency_ms_bucket{le="1"} 1');
    expect(lines).toContain('sp_redirect_latency_ms_bucket{le="5"} 2');
    expect(lines).toContain('sp_redirect_latency_ms_bucket{le="1000"} 2');
    expect(lines).toContain('sp_redirect_latency_ms_bucket{le="+Inf"} 3');
    expect(lines).toContain("sp_redirect_latency_ms_sum 2504.5");
    expect(lines).toContain("sp_redirect_latency_ms_count 3");
  });
});
