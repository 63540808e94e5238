/**
 * @shortpage/logger - Structured Logging Package
 *
 * Consistent structured logging across all shortpage services.
 * Uses pino for JSON logging; pino-pretty in development.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@shortpage/logger";
 *
 * // Use default logger
 * logger.info({ slug: "Xk4pQa" }, "Page created");
 *
 * // Create component-specific logger
 * const cacheLogger = createLogger("cache");
 * cacheLogger.warn({ err }, "Redis GET failed");
 * ```
 */

import pino, { type Logger } from "pino";

// ============================================================================
// Configuration
// ============================================================================

const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "shortpage";

// Jest sets NODE_ENV=test; keep test output clean unless asked for.
const LOG_LEVEL = process.env.LOG_LEVEL || (NODE_ENV === "test" ? "silent" : "info");

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string): Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger for general use
 */
export const logger = createLogger("main");

// Re-export pino types for consumers
export type { Logger } from "pino";
