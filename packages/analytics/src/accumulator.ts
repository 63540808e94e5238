import { createLogger, type Logger } from "@shortpage/logger";

export interface BatchMetrics {
  pending: number;
  totalReceived: number;
  totalFlushed: number;
  totalDropped: number;
  msSinceLastFlush: number;
}

/**
 * Accumulates items for batch writes.
 *
 * Design:
 * - Items accumulate until batch size or timeout is reached
 * - Flush is triggered by whichever comes first
 * - A failed flush drops its batch (page views are not retried) and
 *   rethrows to whoever triggered it
 */
export class BatchAccumulator<T> {
  private items: T[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly logger: Logger;

  // Metrics
  private totalReceived = 0;
  private totalFlushed = 0;
  private totalDropped = 0;
  private lastFlushTime = Date.now();

  constructor(
    private readonly batchSize: number,
    private readonly batchTimeout: number,
    private readonly onFlush: (items: T[]) => Promise<void>,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("analytics");
  }

  /**
   * Add an item to the batch. Resolves once any flush it triggered has
   * completed.
   */
  async add(item: T): Promise<void> {
    this.items.push(item);
    this.totalReceived++;

    // Start timeout timer if this is the first item
    if (this.items.length === 1) {
      this.startTimer();
    }

    if (this.items.length >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Force flush all accumulated items
   */
  async flush(): Promise<void> {
    this.clearTimer();

    if (this.items.length === 0) return;

    const batch = this.items;
    this.items = [];

    try {
      await this.onFlush(batch);
      this.totalFlushed += batch.length;
      this.lastFlushTime = Date.now();
      this.logger.debug({ count: batch.length, total: this.totalFlushed }, "Batch flushed");
    } catch (error) {
      this.totalDropped += batch.length;
      throw error;
    }
  }

  getMetrics(): BatchMetrics {
    return {
      pending: this.items.length,
      totalReceived: this.totalReceived,
      totalFlushed: this.totalFlushed,
      totalDropped: this.totalDropped,
      msSinceLastFlush: Date.now() - this.lastFlushTime,
    };
  }

  private startTimer(): void {
    this.clearTimer();
    this.flushTimer = setTimeout(() => {
      this.flush().catch((error: unknown) => {
        this.logger.error({ err: error }, "Batch flush failed on timeout");
      });
    }, this.batchTimeout);
    this.flushTimer.unref();
  }

  private clearTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
