/**
 * HTTP Server Bootstrap
 *
 * Hono on @hono/node-server. Builds the cache, store and page view
 * recorder from configuration and wires them into the redirect engine.
 */

import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import { createVolatileCache, type VolatileCache } from "@shortpage/cache";
import { createPageStore, type PageStore } from "@shortpage/db";
import {
  NoopPageViewRecorder,
  QueuePageViewRecorder,
  StorePageViewRecorder,
  type PageViewRecorder,
} from "@shortpage/analytics";
import { RedirectEngine } from "@shortpage/links";
import { createLogger, type Logger } from "@shortpage/logger";
import { createApp } from "./app.js";
import { loadConfig, validateConfig, type RedirectConfig } from "./config.js";

export interface RedirectDependencies {
  cache: VolatileCache;
  store: PageStore;
  recorder: PageViewRecorder;
  engine: RedirectEngine;
}

function createRecorder(config: RedirectConfig, store: PageStore, logger: Logger): PageViewRecorder {
  switch (config.analyticsMode) {
    case "queue":
      return new QueuePageViewRecorder({ redisUrl: config.redisUrl, logger });
    case "direct":
      return new StorePageViewRecorder(store, { logger });
    case "off":
      return new NoopPageViewRecorder();
  }
}

export function buildDependencies(config: RedirectConfig, logger: Logger): RedirectDependencies {
  const cache = createVolatileCache({
    driver: config.cacheDriver,
    redisUrl: config.redisUrl,
    timeoutMs: config.redisTimeoutMs,
    ttlSeconds: config.cacheTtlSeconds,
    logger,
  });

  const store = createPageStore({
    driver: config.storeDriver,
    databaseUrl: config.databaseUrl,
    timeoutMs: config.dbTimeoutMs,
    logger,
  });

  const recorder = createRecorder(config, store, logger);
  const engine = new RedirectEngine({ cache, store, recorder, logger });

  return { cache, store, recorder, engine };
}

/**
 * Start the redirect server.
 */
export async function main(): Promise<void> {
  const logger = createLogger("redirect");
  const config = loadConfig();
  validateConfig(config, logger);

  const deps = buildDependencies(config, logger);
  const app = createApp({
    ...deps,
    logger,
    remoteAddress: (c) => getConnInfo(c).remote.address,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info(
    {
      port: config.port,
      cacheDriver: config.cacheDriver,
      storeDriver: config.storeDriver,
      analyticsMode: config.analyticsMode,
    },
    `Redirect service running on http://${config.host}:${config.port}`
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down...");

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err?: Error) => (err ? reject(err) : resolve()));
      });
      // Reverse order of construction; the recorder may still flush to the store
      await deps.recorder.close();
      await deps.store.close();
      await deps.cache.disconnect();
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    // Log and continue; a redirect never depends on a detached promise
    logger.error({ err: reason }, "Unhandled rejection");
  });
}
