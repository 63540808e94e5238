/**
 * API Server Bootstrap
 *
 * Builds the cache, store and mutation coordinator from configuration
 * and starts listening.
 */

import { createVolatileCache } from "@shortpage/cache";
import { createPageStore } from "@shortpage/db";
import { MutationCoordinator } from "@shortpage/links";
import { createLogger } from "@shortpage/logger";
import { buildApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";

/** Owner preloaded into the memory store so local tokens resolve */
export const DEV_USER = {
  id: 1,
  email: "dev@localhost",
  name: "Local Developer",
  createdAt: new Date(0),
};

/**
 * Start the API server.
 */
export async function main(): Promise<void> {
  const logger = createLogger("api");
  const config = loadConfig();
  validateConfig(config, logger);

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
    seedUsers: config.storeDriver === "memory" ? [DEV_USER] : undefined,
  });

  const coordinator = new MutationCoordinator({ cache, store, logger });

  const fastify = await buildApp({
    coordinator,
    cache,
    store,
    jwtSecret: config.jwtSecret,
    shortUrlBase: config.shortUrlBase,
    logger,
  });

  // ==========================================================================
  // Graceful Shutdown
  // ==========================================================================

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      await fastify.close();
      logger.info("Fastify server closed");

      await store.close();
      await cache.disconnect();
      logger.info("Connections closed");

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  await fastify.listen({ port: config.port, host: config.host });

  logger.info(
    { cacheDriver: config.cacheDriver, storeDriver: config.storeDriver },
    `Page API running on http://${config.host}:${config.port}`
  );
}
