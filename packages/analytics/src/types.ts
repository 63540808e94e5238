/**
 * Analytics Type Definitions
 */

import type { PageView } from "@shortpage/shared";

// =============================================================================
// Recording
// =============================================================================

/**
 * Accepts page views from the redirect path.
 *
 * `record` returns immediately; delivery happens in the background and
 * failures are logged, never thrown. Page views are not retried.
 */
export interface PageViewRecorder {
  record(view: PageView): void;
  /** Deliver anything still buffered and release connections */
  close(): Promise<void>;
}

export type AnalyticsMode = "queue" | "direct" | "off";

// =============================================================================
// Queue Payload
// =============================================================================

/**
 * Page view as carried through BullMQ (JSON, so the timestamp is epoch ms).
 */
export interface PageViewJob {
  slug: string;
  realIp: string;
  referer: string;
  mobile: boolean;
  platform: string;
  os: string;
  browserName: string;
  timestamp: number;
}

export const QUEUE_NAMES = {
  PAGE_VIEWS: "page-views",
} as const;

export const JOB_NAMES = {
  PAGE_VIEW: "page-view",
} as const;

// =============================================================================
// Bot Detection
// =============================================================================

export interface BotDetectionResult {
  isBot: boolean;
  reason?: "missing_user_agent" | "user_agent_pattern" | "suspicious_user_agent";
}

// =============================================================================
// Worker
// =============================================================================

export interface WorkerConfig {
  redisUrl: string;
  /** Page views per store batch */
  batchSize: number;
  /** Max ms a partial batch waits before flushing */
  batchTimeout: number;
  /** Parallel job processors */
  concurrency: number;
}

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  redisUrl: "redis://localhost:6379",
  batchSize: 100,
  batchTimeout: 5000,
  concurrency: 10,
};
