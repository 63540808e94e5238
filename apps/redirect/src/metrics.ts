/**
 * Metrics Module
 *
 * Lightweight instrumentation for monitoring redirect performance.
 * Prometheus-compatible output format.
 *
 * Design Decisions:
 * - In-memory counters (no external dependencies)
 * - Histogram approximation using fixed buckets
 */

import type { LookupSource } from "@shortpage/links";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Histogram buckets for latency measurements (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

export type OutcomeStatus = 307 | 200 | 404 | 500;

// =============================================================================
// State
// =============================================================================

const counters = {
  // Responses by status code
  status_307: 0,
  status_200: 0,
  status_404: 0,
  status_500: 0,

  // Cache metrics
  cache_hit: 0,
  cache_miss: 0,
};

const latencyHistogram = {
  buckets: new Array<number>(LATENCY_BUCKETS.length + 1).fill(0),
  sum: 0,
  count: 0,
};

// =============================================================================
// Public API
// =============================================================================

/**
 * Record a latency observation.
 */
export function recordLatency(latencyMs: number): void {
  latencyHistogram.sum += latencyMs;
  latencyHistogram.count++;

  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    if (latencyMs <= LATENCY_BUCKETS[i]) {
      latencyHistogram.buckets[i]++;
      return;
    }
  }
  // +Inf bucket
  latencyHistogram.buckets[LATENCY_BUCKETS.length]++;
}

/**
 * Record one GET /:slug response.
 *
 * @param source - where the URL lookup was answered; "none" when no
 *   cache lookup happened
 */
export function recordRedirect(
  statusCode: OutcomeStatus,
  source: LookupSource,
  latencyMs: number
): void {
  switch (statusCode) {
    case 307:
      counters.status_307++;
      break;
    case 200:
      counters.status_200++;
      break;
    case 404:
      counters.status_404++;
      break;
    case 500:
      counters.status_500++;
      break;
  }

  if (source === "cache") {
    counters.cache_hit++;
  } else if (source === "store") {
    counters.cache_miss++;
  }

  recordLatency(latencyMs);
}

/**
 * Get current metrics in Prometheus text format.
 */
export function getMetrics(): string {
  const lines: string[] = [];

  const addCounter = (name: string, value: number, help: string): void => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} counter`);
    lines.push(`${name} ${value}`);
  };

  lines.push("# HELP sp_redirect_total Slug responses by status");
  lines.push("# TYPE sp_redirect_total counter");
  lines.push(`sp_redirect_total{status="307"} ${counters.status_307}`);
  lines.push(`sp_redirect_total{status="200"} ${counters.status_200}`);
  lines.push(`sp_redirect_total{status="404"} ${counters.status_404}`);
  lines.push(`sp_redirect_total{status="500"} ${counters.status_500}`);

  addCounter("sp_cache_hit_total", counters.cache_hit, "URL lookups answered by the cache");
  addCounter("sp_cache_miss_total", counters.cache_miss, "URL lookups that fell back to the store");

  lines.push("# HELP sp_redirect_latency_ms Slug response latency in milliseconds");
  lines.push("# TYPE sp_redirect_latency_ms histogram");

  let cumulative = 0;
  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    cumulative += latencyHistogram.buckets[i];
    lines.push(`sp_redirect_latency_ms_bucket{le="${LATENCY_BUCKETS[i]}"} ${cumulative}`);
  }
  cumulative += latencyHistogram.buckets[LATENCY_BUCKETS.length];
  lines.push(`sp_redirect_latency_ms_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`sp_redirect_latency_ms_sum ${latencyHistogram.sum}`);
  lines.push(`sp_redirect_latency_ms_count ${latencyHistogram.count}`);

  return lines.join("\n");
}

/**
 * Reset all metrics (for testing).
 */
export function reset(): void {
  counters.status_307 = 0;
  counters.status_200 = 0;
  counters.status_404 = 0;
  counters.status_500 = 0;
  counters.cache_hit = 0;
  counters.cache_miss = 0;
  latencyHistogram.buckets.fill(0);
  latencyHistogram.sum = 0;
  latencyHistogram.count = 0;
}
