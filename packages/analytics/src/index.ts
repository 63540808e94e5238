/**
 * @shortpage/analytics - Page View Analytics
 *
 * Client classification for the redirect path plus two detached page
 * view recorders:
 * - QueuePageViewRecorder: BullMQ producer, consumed by PageViewWorker
 * - StorePageViewRecorder: batched writes straight to the store
 *
 * Usage:
 * ```ts
 * import { classifyUserAgent, QueuePageViewRecorder } from "@shortpage/analytics";
 *
 * const recorder = new QueuePageViewRecorder({ redisUrl });
 * const client = classifyUserAgent(userAgent);
 * if (!client.isBot) recorder.record(view); // returns immediately
 * ```
 */

export { detectBot, isKnownBot } from "./bot-detection.js";
export { classifyUserAgent } from "./user-agent.js";
export { resolveClientIp, type HeaderLookup } from "./client-ip.js";
export { BatchAccumulator, type BatchMetrics } from "./accumulator.js";
export { toPageViewJob, fromPageViewJob } from "./jobs.js";
export { QueuePageViewRecorder, type QueueRecorderOptions } from "./producer.js";
export { StorePageViewRecorder, type StoreRecorderOptions } from "./direct.js";
export { PageViewWorker } from "./worker.js";
export { NoopPageViewRecorder } from "./noop.js";
export * from "./types.js";
