/**
 * Page View Queue Producer
 *
 * Pushes page views to BullMQ for the batching worker.
 *
 * Error Handling:
 * - Queue push failures are logged, never thrown
 * - Page views are dropped while the queue is unavailable; redirects
 *   are unaffected
 *
 * @see ./worker.ts for the consumer
 */

import { Queue } from "bullmq";
import type { PageView } from "@shortpage/shared";
import { redisConnectionOptions } from "@shortpage/cache";
import { createLogger, type Logger } from "@shortpage/logger";
import { toPageViewJob } from "./jobs.js";
import { JOB_NAMES, QUEUE_NAMES, type PageViewJob, type PageViewRecorder } from "./types.js";

export interface QueueRecorderOptions {
  redisUrl: string;
  logger?: Logger;
}

export class QueuePageViewRecorder implements PageViewRecorder {
  private readonly queue: Queue<PageViewJob>;
  private readonly logger: Logger;

  constructor(options: QueueRecorderOptions) {
    this.logger = options.logger ?? createLogger("analytics");

    this.queue = new Queue<PageViewJob>(QUEUE_NAMES.PAGE_VIEWS, {
      connection: redisConnectionOptions(options.redisUrl),
      defaultJobOptions: {
        // Fire-and-forget: a page view is never retried
        attempts: 1,
        removeOnComplete: { age: 3600, count: 10000 },
        removeOnFail: { age: 86400 },
      },
    });

    this.queue.on("error", (err: Error) => {
      this.logger.error({ err }, "Page view queue error");
    });
  }

  record(view: PageView): void {
    this.queue
      .add(JOB_NAMES.PAGE_VIEW, toPageViewJob(view))
      .then((job) => {
        this.logger.debug({ jobId: job.id, slug: view.slug }, "Page view queued");
      })
      .catch((err: unknown) => {
        this.logger.error({ err, slug: view.slug }, "Failed to queue page view");
      });
  }

  async close(): Promise<void> {
    await this.queue.close();
    this.logger.info("Page view queue closed");
  }
}
