/**
 * Development user seeding.
 *
 * Accounts are provisioned outside this system; this gives a local
 * database one owner to mint API tokens for.
 */

import { z } from "zod";
import type { Queryable } from "./pg.js";

const UPSERT_USER = `
  INSERT INTO users (email, name) VALUES ($1, $2)
  ON CONFLICT ON CONSTRAINT users_email_key DO UPDATE SET name = EXCLUDED.name
  RETURNING id
`;

const idRowSchema = z.object({ id: z.coerce.number().int() });

/**
 * Insert the user if the email is new; returns its ID either way.
 */
export async function ensureUser(db: Queryable, email: string, name: string | null): Promise<number> {
  const result = await db.query(UPSERT_USER, [email, name]);
  const [row] = idRowSchema.array().parse(result.rows);
  if (row === undefined) {
    throw new Error(`ensureUser returned no row for ${email}`);
  }
  return row.id;
}
