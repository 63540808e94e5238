/**
 * Health Check Routes
 *
 * Liveness and readiness probes.
 */

import type { FastifyInstance } from "fastify";
import type { VolatileCache } from "@shortpage/cache";
import type { PageStore } from "@shortpage/db";

export interface HealthRoutesOptions {
  cache: Pick<VolatileCache, "ping">;
  store: Pick<PageStore, "ping">;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  // Liveness probe - basic server health
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness probe - mutations need both backends
  fastify.get("/health/ready", async (_request, reply) => {
    const [storeOk, cacheOk] = await Promise.all([options.store.ping(), options.cache.ping()]);

    const checks = {
      database: storeOk ? "ok" : "error",
      cache: cacheOk ? "ok" : "error",
    };
    const allHealthy = storeOk && cacheOk;

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? "ok" : "degraded",
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
