import { readFile } from "node:fs/promises";
import path from "node:path";
import { createLogger, type Logger } from "@shortpage/logger";
import type { Queryable } from "./pg.js";

export const SCHEMA_PATH = path.join(__dirname, "..", "sql", "schema.sql");

/**
 * Apply sql/schema.sql. Every statement is IF NOT EXISTS, so running it
 * against an up-to-date database changes nothing.
 */
export async function migrate(db: Queryable, logger: Logger = createLogger("db")): Promise<void> {
  const sql = await readFile(SCHEMA_PATH, "utf8");
  await db.query(sql);
  logger.info({ schema: SCHEMA_PATH }, "Database schema applied");
}
