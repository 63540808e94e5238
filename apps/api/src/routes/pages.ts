/**
 * Page Management Routes
 *
 * Endpoints (all require a Bearer token):
 *   POST      /pages        - Create a page under a generated slug
 *   GET       /pages        - List the caller's pages, newest first
 *   GET       /pages/:slug  - Read one of the caller's pages
 *   PUT|PATCH /pages/:slug  - Replace its URL and OGP
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ApiSuccess, Page } from "@shortpage/shared";
import type { PageStore } from "@shortpage/db";
import type { MutationCoordinator } from "@shortpage/links";
import type { Logger } from "@shortpage/logger";
import { authenticatedUserId, createRequireAuth } from "../middleware/auth.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

/**
 * Shape only; URL rules belong to the coordinator (422 VALIDATION).
 */
const ogpSchema = z.object({
  title: z.string().max(200, "title too long (max 200 characters)"),
  image: z.string().max(2048, "image too long (max 2048 characters)"),
  description: z.string().max(1000, "description too long (max 1000 characters)"),
});

const pageBodySchema = z.object({
  url: z.string(),
  // null and absent both mean "no OGP"
  ogp: ogpSchema.nullish().transform((value) => value ?? undefined),
});

type PageBody = z.infer<typeof pageBodySchema>;

interface SlugParams {
  slug: string;
}

/**
 * Malformed request body. Answered with 400.
 */
export class BadRequestError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function parseBody(body: unknown): PageBody {
  const result = pageBodySchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new BadRequestError(`${where}${issue.message}`);
  }
  return result.data;
}

// ============================================================================
// Response Shape
// ============================================================================

export interface PageResponse {
  id: number;
  slug: string;
  shortUrl: string;
  url: string;
  ownerId: number;
  createdAt: string;
  ogp: { title: string; image: string; description: string } | null;
}

function toPageResponse(page: Page, shortUrlBase: string): PageResponse {
  return {
    id: page.id,
    slug: page.slug,
    shortUrl: `${shortUrlBase}/${page.slug}`,
    url: page.url,
    ownerId: page.ownerId,
    createdAt: page.createdAt.toISOString(),
    ogp: page.ogp
      ? { title: page.ogp.title, image: page.ogp.image, description: page.ogp.description }
      : null,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export interface PagesRoutesOptions {
  coordinator: MutationCoordinator;
  store: Pick<PageStore, "findUserById">;
  jwtSecret: string;
  shortUrlBase: string;
  logger: Logger;
}

export async function pagesRoutes(fastify: FastifyInstance, options: PagesRoutesOptions): Promise<void> {
  const { coordinator, shortUrlBase } = options;

  // Encapsulated: guards every route in this plugin only
  fastify.addHook(
    "preHandler",
    createRequireAuth({ secret: options.jwtSecret, store: options.store, logger: options.logger })
  );

  fastify.post("/pages", async (request: FastifyRequest, reply: FastifyReply) => {
    const ownerId = authenticatedUserId(request);
    const body = parseBody(request.body);

    const page = await coordinator.create(ownerId, body.url, body.ogp);

    const response: ApiSuccess<PageResponse> = { success: true, data: toPageResponse(page, shortUrlBase) };
    return reply.status(201).send(response);
  });

  fastify.get("/pages", async (request: FastifyRequest) => {
    const ownerId = authenticatedUserId(request);
    const pages = await coordinator.listForOwner(ownerId);

    const response: ApiSuccess<PageResponse[]> = {
      success: true,
      data: pages.map((page) => toPageResponse(page, shortUrlBase)),
    };
    return response;
  });

  fastify.get<{ Params: SlugParams }>("/pages/:slug", async (request) => {
    const ownerId = authenticatedUserId(request);
    const page = await coordinator.get(request.params.slug, ownerId);

    const response: ApiSuccess<PageResponse> = { success: true, data: toPageResponse(page, shortUrlBase) };
    return response;
  });

  fastify.route<{ Params: SlugParams }>({
    method: ["PUT", "PATCH"],
    url: "/pages/:slug",
    handler: async (request) => {
      const ownerId = authenticatedUserId(request);
      const body = parseBody(request.body);

      const page = await coordinator.update(request.params.slug, ownerId, body.url, body.ogp);

      const response: ApiSuccess<PageResponse> = { success: true, data: toPageResponse(page, shortUrlBase) };
      return response;
    },
  });
}
