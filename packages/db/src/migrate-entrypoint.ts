/**
 * Schema migration entry point.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npm run migrate
 *   SEED_USER_EMAIL=dev@localhost npm run migrate   # also upsert a dev owner
 */

import { optional, optionalInt, required } from "@shortpage/shared";
import { createLogger } from "@shortpage/logger";
import { createPgPool } from "./pg.js";
import { migrate } from "./migrate.js";
import { ensureUser } from "./seed.js";

const logger = createLogger("migrate");

async function main(): Promise<void> {
  const pool = createPgPool({
    connectionString: required("DATABASE_URL"),
    timeoutMs: optionalInt("DB_TIMEOUT_MS", 5000),
    max: 1,
    logger,
  });

  try {
    await migrate(pool, logger);

    const seedEmail = optional("SEED_USER_EMAIL", "");
    if (seedEmail) {
      const userId = await ensureUser(pool, seedEmail, optional("SEED_USER_NAME", "Developer"));
      logger.info({ userId, email: seedEmail }, "Seed user ready");
    }
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Migration failed");
  process.exit(1);
});
