/**
 * Page View Worker Entrypoint
 *
 * Standalone process consuming page views from the queue.
 * Run with: npm run start:worker
 *
 * Environment Variables:
 *   REDIS_URL     - Redis connection URL (default: redis://localhost:6379)
 *   DATABASE_URL  - PostgreSQL connection URL (required)
 *   DB_TIMEOUT_MS - Store query budget (default: 2000)
 *   BATCH_SIZE    - Page views per store batch (default: 100)
 *   BATCH_TIMEOUT - Max ms before a partial batch flushes (default: 5000)
 *   CONCURRENCY   - Parallel job processors (default: 10)
 */

import { optional, optionalInt, required } from "@shortpage/shared";
import { createPageStore } from "@shortpage/db";
import { createLogger } from "@shortpage/logger";
import { PageViewWorker } from "./worker.js";

const logger = createLogger("analytics-worker");

async function main(): Promise<void> {
  const config = {
    redisUrl: optional("REDIS_URL", "redis://localhost:6379"),
    batchSize: optionalInt("BATCH_SIZE", 100),
    batchTimeout: optionalInt("BATCH_TIMEOUT", 5000),
    concurrency: optionalInt("CONCURRENCY", 10),
  };

  const store = createPageStore({
    driver: "postgres",
    databaseUrl: required("DATABASE_URL"),
    timeoutMs: optionalInt("DB_TIMEOUT_MS", 2000),
    logger,
  });

  const worker = new PageViewWorker(store, config, logger);
  worker.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");

    try {
      await worker.stop();
      await store.close();
      logger.info("Clean shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  logger.info({ config }, "Page view worker is running. Press Ctrl+C to stop.");
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Page view worker failed to start");
  process.exit(1);
});
