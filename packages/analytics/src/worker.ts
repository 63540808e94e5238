/**
 * Page View Worker
 *
 * Consumes page views from BullMQ and appends them to the store in
 * batches.
 *
 * Architecture:
 * ┌─────────────┐     ┌─────────────┐     ┌─────────────┐
 * │   BullMQ    │────▶│   Worker    │────▶│  PostgreSQL │
 * │   Queue     │     │  (Batch)    │     │  page_views │
 * └─────────────┘     └─────────────┘     └─────────────┘
 *
 * Performance Tuning:
 * - batchSize: Higher = fewer DB calls, more memory
 * - batchTimeout: Lower = fresher data, more DB calls
 * - concurrency: Higher = more parallelism, more DB connections
 */

import { Worker, type Job } from "bullmq";
import type { PageView } from "@shortpage/shared";
import type { PageStore } from "@shortpage/db";
import { redisConnectionOptions } from "@shortpage/cache";
import { createLogger, type Logger } from "@shortpage/logger";
import { BatchAccumulator, type BatchMetrics } from "./accumulator.js";
import { fromPageViewJob } from "./jobs.js";
import { DEFAULT_WORKER_CONFIG, QUEUE_NAMES, type PageViewJob, type WorkerConfig } from "./types.js";

export class PageViewWorker {
  private readonly config: WorkerConfig;
  private readonly accumulator: BatchAccumulator<PageView>;
  private readonly logger: Logger;
  private worker: Worker<PageViewJob> | null = null;

  constructor(
    private readonly store: PageStore,
    config: Partial<WorkerConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_WORKER_CONFIG, ...config };
    this.logger = logger ?? createLogger("analytics-worker");
    this.accumulator = new BatchAccumulator<PageView>(
      this.config.batchSize,
      this.config.batchTimeout,
      (views) => this.insertBatch(views),
      this.logger
    );
  }

  /**
   * Start consuming the queue.
   */
  start(): void {
    if (this.worker) return;

    this.worker = new Worker<PageViewJob>(
      QUEUE_NAMES.PAGE_VIEWS,
      (job: Job<PageViewJob>) => this.handle(job.data),
      {
        connection: redisConnectionOptions(this.config.redisUrl),
        concurrency: this.config.concurrency,
      }
    );

    this.worker.on("failed", (job: Job<PageViewJob> | undefined, err: Error) => {
      this.logger.error({ jobId: job?.id, err }, "Page view job failed");
    });

    this.worker.on("error", (err: Error) => {
      this.logger.error({ err }, "Worker error");
    });

    this.logger.info(
      {
        queueName: QUEUE_NAMES.PAGE_VIEWS,
        batchSize: this.config.batchSize,
        concurrency: this.config.concurrency,
      },
      "Page view worker started"
    );
  }

  /**
   * Process one queued page view.
   */
  async handle(job: PageViewJob): Promise<void> {
    await this.accumulator.add(fromPageViewJob(job));
  }

  /**
   * Stop consuming, wait for in-flight jobs, then flush the last batch.
   */
  async stop(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }

    await this.accumulator.flush();
    this.logger.info({ batch: this.accumulator.getMetrics() }, "Page view worker stopped");
  }

  getMetrics(): { isRunning: boolean; batch: BatchMetrics } {
    return {
      isRunning: this.worker !== null,
      batch: this.accumulator.getMetrics(),
    };
  }

  private async insertBatch(views: PageView[]): Promise<void> {
    const written = await this.store.createPageViews(views);
    this.logger.debug({ written }, "Page views persisted");
  }
}
