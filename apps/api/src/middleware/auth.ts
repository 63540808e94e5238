/**
 * Authentication Middleware
 *
 * Fastify hooks and decorators for JWT-based authentication.
 */

import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import type { PageStore } from "@shortpage/db";
import type { Logger } from "@shortpage/logger";
import { verifyToken } from "../services/auth.js";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyRequest {
    /** Authenticated user ID, set by the requireAuth hook */
    userId?: number;
  }
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Missing, invalid or expired credentials. Answered with 401.
 */
export class UnauthorizedError extends Error {
  readonly statusCode = 401;

  constructor(message: string) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract Bearer token from Authorization header
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;

  if (!authHeader) {
    return null;
  }

  const [type, token] = authHeader.split(" ");

  if (type !== "Bearer" || !token) {
    return null;
  }

  return token;
}

/**
 * The caller's user ID inside a route guarded by requireAuth.
 */
export function authenticatedUserId(request: FastifyRequest): number {
  if (request.userId === undefined) {
    throw new UnauthorizedError("Authentication required");
  }
  return request.userId;
}

// ============================================================================
// Hooks
// ============================================================================

export interface RequireAuthOptions {
  secret: string;
  store: Pick<PageStore, "findUserById">;
  logger: Logger;
}

/**
 * Required authentication hook
 *
 * Verifies the Bearer token and that its user still exists, then sets
 * `request.userId`. Anything else is a 401.
 *
 * Usage:
 * ```ts
 * fastify.addHook("preHandler", createRequireAuth({ secret, store, logger }));
 * ```
 */
export function createRequireAuth(options: RequireAuthOptions) {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    const token = extractBearerToken(request);
    if (!token) {
      throw new UnauthorizedError("Authentication required");
    }

    const userId = verifyToken(token, options.secret);
    if (userId === null) {
      throw new UnauthorizedError("Invalid or expired token");
    }

    const user = await options.store.findUserById(userId);
    if (!user) {
      options.logger.debug({ userId }, "Token for unknown user");
      throw new UnauthorizedError("User not found");
    }

    request.userId = user.id;
  };
}

// ============================================================================
// Fastify Plugin
// ============================================================================

const authPluginCallback: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.decorateRequest("userId", undefined);
};

/**
 * Registers the request decorator once for the whole app.
 */
export const authPlugin = fp(authPluginCallback, {
  name: "auth-plugin",
  fastify: "4.x",
});
