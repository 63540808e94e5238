/**
 * Redirect Service Routes
 *
 * GET /:slug is the hot path; everything it needs arrives through
 * RedirectAppDeps so tests can run the app with in-process backends.
 *
 * Responses:
 * - 307 + Location       plain redirect
 * - 200 text/html        rich preview (og: tags + meta refresh)
 * - 404 text/plain       unknown or malformed slug
 * - 500 text/plain       store failure
 */

import { Hono, type Context } from "hono";
import type { ClientInfo } from "@shortpage/shared";
import type { VolatileCache } from "@shortpage/cache";
import type { PageStore } from "@shortpage/db";
import { resolveClientIp } from "@shortpage/analytics";
import {
  isLinkError,
  type LookupSource,
  type RedirectEngine,
  type RedirectOutcome,
} from "@shortpage/links";
import { createLogger, type Logger } from "@shortpage/logger";
import * as metrics from "./metrics.js";
import { renderPreview } from "./preview.js";

export interface RedirectAppDeps {
  engine: RedirectEngine;
  cache: Pick<VolatileCache, "ping">;
  store: Pick<PageStore, "ping">;
  logger?: Logger;
  /** Socket address of the caller, when the transport exposes it */
  remoteAddress?: (c: Context) => string | undefined;
}

const NOT_FOUND_BODY = "The URL you are looking for is not found.";

/**
 * Cache control header values.
 *
 * Destinations are mutable and every visit is counted, so redirects are
 * never cached by browsers or shared caches.
 */
const CACHE_CONTROL = {
  REDIRECT: "private, no-cache",
  NOT_FOUND: "public, max-age=60",
  ERROR: "no-store",
} as const;

function serverTiming(source: LookupSource, latencyMs: number): string {
  const parts = [`total;dur=${latencyMs.toFixed(2)}`];
  if (source !== "none") {
    parts.push(source === "cache" ? 'cache;desc="hit"' : 'cache;desc="miss"');
  }
  return parts.join(", ");
}

export function createApp(deps: RedirectAppDeps): Hono {
  const app = new Hono();
  const logger = deps.logger ?? createLogger("redirect");

  // ---------------------------------------------------------------------------
  // Health & Monitoring Routes (before the slug catch-all)
  // ---------------------------------------------------------------------------

  // Liveness probe - no dependencies
  app.get("/health", (c) => c.json({ status: "ok" }));

  // Readiness probe - checks Redis and the store
  app.get("/health/ready", async (c) => {
    const [cacheOk, storeOk] = await Promise.all([deps.cache.ping(), deps.store.ping()]);

    // Redis down still serves from the store; store down serves cache hits only
    const status = cacheOk && storeOk ? "ok" : cacheOk || storeOk ? "degraded" : "unhealthy";
    const httpStatus = status === "unhealthy" ? 503 : 200;

    return c.json(
      {
        status,
        checks: {
          redis: cacheOk ? "ok" : "error",
          db: storeOk ? "ok" : "error",
        },
      },
      httpStatus
    );
  });

  app.get("/metrics", (c) =>
    c.body(metrics.getMetrics(), 200, { "Content-Type": "text/plain; version=0.0.4" })
  );

  app.get("/", (c) => c.text("shortpage redirect service"));

  // ---------------------------------------------------------------------------
  // Slug Route (the hot path)
  // ---------------------------------------------------------------------------

  app.get("/:slug", async (c) => {
    const start = performance.now();
    const slug = c.req.param("slug");

    const client: ClientInfo = {
      userAgent: c.req.header("user-agent"),
      referer: c.req.header("referer"),
      ip: resolveClientIp((name) => c.req.header(name), deps.remoteAddress?.(c)),
    };

    let outcome: RedirectOutcome;
    try {
      outcome = await deps.engine.resolve(slug, client);
    } catch (err) {
      metrics.recordRedirect(500, "none", performance.now() - start);
      throw err;
    }

    const latencyMs = performance.now() - start;
    const timing = serverTiming(outcome.source, latencyMs);

    switch (outcome.kind) {
      case "not_found":
        metrics.recordRedirect(404, outcome.source, latencyMs);
        return c.text(NOT_FOUND_BODY, 404, {
          "Cache-Control": CACHE_CONTROL.NOT_FOUND,
          "Server-Timing": timing,
        });

      case "preview":
        metrics.recordRedirect(200, outcome.source, latencyMs);
        return c.html(renderPreview(outcome.url, outcome.ogp), 200, {
          "Cache-Control": CACHE_CONTROL.REDIRECT,
          "Server-Timing": timing,
        });

      case "redirect":
        metrics.recordRedirect(307, outcome.source, latencyMs);
        c.header("Cache-Control", CACHE_CONTROL.REDIRECT);
        c.header("Server-Timing", timing);
        return c.redirect(outcome.url, 307);
    }
  });

  // ---------------------------------------------------------------------------
  // Fallbacks
  // ---------------------------------------------------------------------------

  app.notFound((c) => c.text("Not Found", 404));

  app.onError((err, c) => {
    c.header("Cache-Control", CACHE_CONTROL.ERROR);

    if (isLinkError(err) && err.status < 500) {
      return c.text(err.message, err.status);
    }

    logger.error({ err, path: c.req.path }, "Request failed");
    return c.text("Internal Server Error", 500);
  });

  return app;
}
