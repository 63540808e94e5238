/**
 * Token CLI
 *
 * Prints a Bearer token for an existing user:
 *
 *   JWT_SECRET=... npm run token -- 42
 */

import { z } from "zod";
import { logger } from "@shortpage/logger";
import { loadJwtSettings } from "./config.js";
import { signToken } from "./services/auth.js";

const userIdSchema = z.coerce.number().int().positive();

function run(argv: string[]): void {
  const parsed = userIdSchema.safeParse(argv[0]);
  if (!parsed.success) {
    logger.error({ arg: argv[0] }, "Usage: npm run token -- <userId>");
    process.exit(1);
  }

  const { jwtSecret, jwtExpiresInSeconds } = loadJwtSettings();
  process.stdout.write(`${signToken(parsed.data, jwtSecret, jwtExpiresInSeconds)}\n`);
}

run(process.argv.slice(2));
