/**
 * @shortpage/db - Durable Store Package
 *
 * Usage:
 * ```ts
 * import { createPageStore } from "@shortpage/db";
 *
 * const store = createPageStore({ driver: "postgres", databaseUrl, timeoutMs: 200 });
 * const page = await store.findPageBySlug("Xk4pQa");
 * ```
 */

import type { Logger } from "@shortpage/logger";
import { MemoryPageStore, type MemoryPageStoreOptions } from "./memory.js";
import { PgPageStore, createPgPool } from "./pg.js";
import type { PageStore, StoreDriver } from "./types.js";

export * from "./errors.js";
export * from "./types.js";
export { PgPageStore, createPgPool } from "./pg.js";
export type { PgPool, PgPoolClient, Queryable, QueryResultLike, PgPoolOptions } from "./pg.js";
export { MemoryPageStore, type MemoryPageStoreOptions } from "./memory.js";
export { migrate, SCHEMA_PATH } from "./migrate.js";
export { ensureUser } from "./seed.js";

export interface CreatePageStoreOptions {
  driver: StoreDriver;
  databaseUrl: string;
  timeoutMs: number;
  logger?: Logger;
  /** Users to preload into the memory driver */
  seedUsers?: MemoryPageStoreOptions["users"];
}

/**
 * Build the configured store. The pg pool connects lazily.
 */
export function createPageStore(options: CreatePageStoreOptions): PageStore {
  if (options.driver === "memory") {
    return new MemoryPageStore({ users: options.seedUsers });
  }

  const pool = createPgPool({
    connectionString: options.databaseUrl,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });
  return new PgPageStore(pool, { timeoutMs: options.timeoutMs, logger: options.logger });
}
