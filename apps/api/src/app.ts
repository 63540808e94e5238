/**
 * API Application
 *
 * Builds the Fastify instance without listening, so tests can drive it
 * with `app.inject()`.
 *
 * Endpoints:
 *   GET       /health        - Liveness probe
 *   GET       /health/ready  - Readiness probe (store + cache)
 *   POST      /pages         - Create page
 *   GET       /pages         - List own pages
 *   GET       /pages/:slug   - Read own page
 *   PUT|PATCH /pages/:slug   - Update own page
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import type { ApiFailure } from "@shortpage/shared";
import type { VolatileCache } from "@shortpage/cache";
import type { PageStore } from "@shortpage/db";
import { LinkError, type MutationCoordinator } from "@shortpage/links";
import { createLogger, type Logger } from "@shortpage/logger";
import { UnauthorizedError, authPlugin } from "./middleware/auth.js";
import { healthRoutes } from "./routes/health.js";
import { BadRequestError, pagesRoutes } from "./routes/pages.js";

export interface ApiDependencies {
  coordinator: MutationCoordinator;
  cache: Pick<VolatileCache, "ping">;
  store: Pick<PageStore, "ping" | "findUserById">;
  jwtSecret: string;
  shortUrlBase: string;
  logger?: Logger;
}

function failure(error: string, code: string): ApiFailure {
  return { success: false, error, code };
}

export async function buildApp(deps: ApiDependencies): Promise<FastifyInstance> {
  const logger = deps.logger ?? createLogger("api");

  // Request logging goes through the shared pino logger instead
  const fastify = Fastify({ logger: false, trustProxy: true });

  // ==========================================================================
  // Lifecycle Hooks
  // ==========================================================================

  fastify.addHook("onResponse", async (request, reply) => {
    logger.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof LinkError) {
      if (error.status >= 500) {
        logger.error({ err: error, url: request.url }, "Store failure");
        return reply.status(error.status).send(failure("Internal server error", error.code));
      }
      return reply.status(error.status).send(failure(error.message, error.code));
    }

    if (error instanceof UnauthorizedError) {
      return reply.status(401).send(failure(error.message, "UNAUTHORIZED"));
    }

    if (error instanceof BadRequestError || error.validation) {
      return reply.status(400).send(failure(error.message, "BAD_REQUEST"));
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, ...
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send(failure(error.message, "BAD_REQUEST"));
    }

    logger.error({ err: error, url: request.url }, "Request error");
    return reply.status(500).send(failure("Internal server error", "INTERNAL"));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(failure(`Route ${request.method} ${request.url} not found`, "NOT_FOUND"));
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  await fastify.register(authPlugin);
  await fastify.register(healthRoutes, { cache: deps.cache, store: deps.store });
  await fastify.register(pagesRoutes, {
    coordinator: deps.coordinator,
    store: deps.store,
    jwtSecret: deps.jwtSecret,
    shortUrlBase: deps.shortUrlBase,
    logger,
  });

  return fastify;
}
