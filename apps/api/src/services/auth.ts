/**
 * Token Service
 *
 * Bearer tokens are HS256 JWTs whose `sub` is the user ID. Issuing
 * tokens to end users happens outside this service; `signToken` exists
 * for operators and tests.
 */

import jwt from "jsonwebtoken";
import { z } from "zod";

const tokenPayloadSchema = z.object({
  sub: z.coerce.number().int().positive(),
});

/**
 * Sign a token for a user.
 */
export function signToken(userId: number, secret: string, expiresInSeconds: number): string {
  return jwt.sign({}, secret, {
    algorithm: "HS256",
    subject: String(userId),
    expiresIn: expiresInSeconds,
  });
}

/**
 * Verify a token and return its user ID, or null when the token is
 * invalid, expired or carries no usable subject.
 */
export function verifyToken(token: string, secret: string): number | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch {
    return null;
  }

  const parsed = tokenPayloadSchema.safeParse(decoded);
  return parsed.success ? parsed.data.sub : null;
}
