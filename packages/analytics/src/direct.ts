import type { PageView } from "@shortpage/shared";
import type { PageStore } from "@shortpage/db";
import { createLogger, type Logger } from "@shortpage/logger";
import { BatchAccumulator } from "./accumulator.js";
import type { PageViewRecorder } from "./types.js";

export interface StoreRecorderOptions {
  batchSize?: number;
  batchTimeout?: number;
  logger?: Logger;
}

/**
 * Writes page views straight to the store from the redirect process,
 * in small batches, for deployments without a queue worker.
 */
export class StorePageViewRecorder implements PageViewRecorder {
  private readonly accumulator: BatchAccumulator<PageView>;
  private readonly logger: Logger;

  constructor(store: PageStore, options: StoreRecorderOptions = {}) {
    this.logger = options.logger ?? createLogger("analytics");
    this.accumulator = new BatchAccumulator<PageView>(
      options.batchSize ?? 50,
      options.batchTimeout ?? 1000,
      async (views) => {
        await store.createPageViews(views);
      },
      this.logger
    );
  }

  record(view: PageView): void {
    this.accumulator.add(view).catch((err: unknown) => {
      this.logger.error({ err, slug: view.slug }, "Failed to write page views");
    });
  }

  async close(): Promise<void> {
    await this.accumulator.flush();
  }
}
