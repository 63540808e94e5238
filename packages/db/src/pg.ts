/**
 * PostgreSQL Page Store
 *
 * Raw SQL over `pg` - no ORM, no query builder.
 *
 * Design Decisions:
 * - Pool-level statement_timeout/query_timeout plus a client-side race,
 *   both set to the configured DB timeout
 * - Rows are parsed with zod; BIGSERIAL columns arrive as strings
 * - Page + OGP creation runs in one transaction
 * - Unique violation on pages.slug surfaces as SlugConflictError
 */

import { Pool } from "pg";
import { z } from "zod";
import { withTimeout, type OGP, type OGPInput, type Page, type PageView, type User } from "@shortpage/shared";
import { createLogger, type Logger } from "@shortpage/logger";
import { SlugConflictError, StoreError } from "./errors.js";
import type { CreatePageInput, PageStore } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal pg interfaces (what we actually use).
 * A pg.Pool satisfies PgPool; tests substitute a scripted double.
 */
export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface PgPoolClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface PgPool extends Queryable {
  connect(): Promise<PgPoolClient>;
  end(): Promise<void>;
}

export interface PgPoolOptions {
  connectionString: string;
  timeoutMs: number;
  max?: number;
  logger?: Logger;
}

// =============================================================================
// Row Schemas
// =============================================================================

const id = z.coerce.number().int();

const pageRowSchema = z.object({
  id,
  slug: z.string(),
  user_id: id,
  url: z.string(),
  created_at: z.coerce.date(),
});

const pageWithOgpRowSchema = pageRowSchema.extend({
  ogp_id: id.nullable(),
  ogp_title: z.string().nullable(),
  ogp_image: z.string().nullable(),
  ogp_description: z.string().nullable(),
});

const ogpRowSchema = z.object({
  id,
  page_id: id,
  title: z.string(),
  image: z.string(),
  description: z.string(),
});

const userRowSchema = z.object({
  id,
  email: z.string(),
  name: z.string().nullable(),
  created_at: z.coerce.date(),
});

// =============================================================================
// SQL Queries
// =============================================================================

const PAGE_SELECT = `
  SELECT p.id, p.slug, p.user_id, p.url, p.created_at,
         o.id AS ogp_id, o.title AS ogp_title,
         o.image AS ogp_image, o.description AS ogp_description
  FROM pages p
  LEFT JOIN ogps o ON o.page_id = p.id
`;

const FIND_PAGE_BY_SLUG = `${PAGE_SELECT} WHERE p.slug = $1 LIMIT 1`;

const LIST_PAGES_BY_OWNER = `${PAGE_SELECT} WHERE p.user_id = $1 ORDER BY p.created_at DESC, p.id DESC`;

const FIND_OGP_BY_ID = "SELECT id, page_id, title, image, description FROM ogps WHERE id = $1";

const FIND_USER_BY_ID = "SELECT id, email, name, created_at FROM users WHERE id = $1";

const INSERT_PAGE = `
  INSERT INTO pages (slug, user_id, url) VALUES ($1, $2, $3)
  RETURNING id, slug, user_id, url, created_at
`;

const INSERT_OGP = `
  INSERT INTO ogps (page_id, title, image, description) VALUES ($1, $2, $3, $4)
  RETURNING id, page_id, title, image, description
`;

const UPDATE_PAGE_URL = "UPDATE pages SET url = $2 WHERE id = $1";

const UPDATE_OGP = `
  UPDATE ogps SET title = $2, image = $3, description = $4 WHERE id = $1
  RETURNING id, page_id, title, image, description
`;

const DELETE_OGP = "DELETE FROM ogps WHERE id = $1";

const PAGE_VIEW_COLUMNS = [
  "slug",
  "real_ip",
  "referer",
  "mobile",
  "platform",
  "os",
  "browser_name",
  "created_at",
] as const;

const HEALTH_QUERY = "SELECT 1";

const UNIQUE_VIOLATION = "23505";

// =============================================================================
// Row Mapping
// =============================================================================

function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[], operation: string): z.infer<S>[] {
  const parsed = schema.array().safeParse(rows);
  if (!parsed.success) {
    throw new StoreError(`${operation} returned rows of an unexpected shape`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function firstRow<S extends z.ZodTypeAny>(schema: S, rows: unknown[], operation: string): z.infer<S> {
  const [row] = parseRows(schema, rows, operation);
  if (row === undefined) {
    throw new StoreError(`${operation} returned no row`);
  }
  return row;
}

function toOGP(row: z.infer<typeof ogpRowSchema>): OGP {
  return {
    id: row.id,
    pageId: row.page_id,
    title: row.title,
    image: row.image,
    description: row.description,
  };
}

function toPage(row: z.infer<typeof pageWithOgpRowSchema>): Page {
  return {
    id: row.id,
    slug: row.slug,
    ownerId: row.user_id,
    url: row.url,
    createdAt: row.created_at,
    ogp:
      row.ogp_id === null
        ? null
        : {
            id: row.ogp_id,
            pageId: row.id,
            title: row.ogp_title ?? "",
            image: row.ogp_image ?? "",
            description: row.ogp_description ?? "",
          },
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

// =============================================================================
// Pool Factory
// =============================================================================

/**
 * Create the shared connection pool. Connects lazily on first query.
 */
export function createPgPool(options: PgPoolOptions): Pool {
  const logger = options.logger ?? createLogger("db");

  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: options.timeoutMs,
    query_timeout: options.timeoutMs,
  });

  // An idle client losing its connection must not crash the process
  pool.on("error", (err: Error) => {
    logger.error({ err }, "Idle PostgreSQL client error");
  });

  return pool;
}

// =============================================================================
// Store
// =============================================================================

export class PgPageStore implements PageStore {
  private readonly pool: PgPool;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(pool: PgPool, options: { timeoutMs: number; logger?: Logger }) {
    this.pool = pool;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger("db");
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async findPageBySlug(slug: string): Promise<Page | null> {
    const result = await this.run("findPageBySlug", FIND_PAGE_BY_SLUG, [slug]);
    const [row] = parseRows(pageWithOgpRowSchema, result.rows, "findPageBySlug");
    return row === undefined ? null : toPage(row);
  }

  async findOGPByID(ogpId: number): Promise<OGP | null> {
    const result = await this.run("findOGPByID", FIND_OGP_BY_ID, [ogpId]);
    const [row] = parseRows(ogpRowSchema, result.rows, "findOGPByID");
    return row === undefined ? null : toOGP(row);
  }

  async listPagesByOwner(ownerId: number): Promise<Page[]> {
    const result = await this.run("listPagesByOwner", LIST_PAGES_BY_OWNER, [ownerId]);
    return parseRows(pageWithOgpRowSchema, result.rows, "listPagesByOwner").map(toPage);
  }

  async findUserById(userId: number): Promise<User | null> {
    const result = await this.run("findUserById", FIND_USER_BY_ID, [userId]);
    const [row] = parseRows(userRowSchema, result.rows, "findUserById");
    if (row === undefined) return null;
    return { id: row.id, email: row.email, name: row.name, createdAt: row.created_at };
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async createPage(input: CreatePageInput): Promise<Page> {
    let client: PgPoolClient;
    const connecting = this.pool.connect();
    try {
      client = await withTimeout(connecting, this.timeoutMs, "pg connect");
    } catch (err) {
      // A connect that loses the race still hands back a client later
      void connecting.then(
        (late) => late.release(),
        () => undefined
      );
      throw new StoreError("createPage could not acquire a connection", { cause: err });
    }

    try {
      await client.query("BEGIN");

      const pageResult = await client.query(INSERT_PAGE, [input.slug, input.ownerId, input.url]);
      const pageRow = firstRow(pageRowSchema, pageResult.rows, "createPage");

      let ogp: OGP | null = null;
      if (input.ogp) {
        const ogpResult = await client.query(INSERT_OGP, [
          pageRow.id,
          input.ogp.title,
          input.ogp.image,
          input.ogp.description,
        ]);
        ogp = toOGP(firstRow(ogpRowSchema, ogpResult.rows, "createOGP"));
      }

      await client.query("COMMIT");

      return {
        id: pageRow.id,
        slug: pageRow.slug,
        ownerId: pageRow.user_id,
        url: pageRow.url,
        createdAt: pageRow.created_at,
        ogp,
      };
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        this.logger.warn({ err: rollbackErr }, "Rollback failed");
      });

      if (isUniqueViolation(err)) {
        throw new SlugConflictError(input.slug, err);
      }
      if (err instanceof StoreError) {
        throw err;
      }
      throw new StoreError("createPage failed", { cause: err });
    } finally {
      client.release();
    }
  }

  async updatePage(pageId: number, url: string): Promise<void> {
    const result = await this.run("updatePage", UPDATE_PAGE_URL, [pageId, url]);
    if (result.rowCount === 0) {
      throw new StoreError(`updatePage: page ${pageId} does not exist`);
    }
  }

  async createOGP(pageId: number, input: OGPInput): Promise<OGP> {
    const result = await this.run("createOGP", INSERT_OGP, [
      pageId,
      input.title,
      input.image,
      input.description,
    ]);
    return toOGP(firstRow(ogpRowSchema, result.rows, "createOGP"));
  }

  async updateOGP(ogpId: number, input: OGPInput): Promise<OGP> {
    const result = await this.run("updateOGP", UPDATE_OGP, [
      ogpId,
      input.title,
      input.image,
      input.description,
    ]);
    const [row] = parseRows(ogpRowSchema, result.rows, "updateOGP");
    if (row === undefined) {
      throw new StoreError(`updateOGP: OGP ${ogpId} does not exist`);
    }
    return toOGP(row);
  }

  async deleteOGP(ogpId: number): Promise<void> {
    await this.run("deleteOGP", DELETE_OGP, [ogpId]);
  }

  async createPageViews(views: PageView[]): Promise<number> {
    if (views.length === 0) return 0;

    const values: unknown[] = [];
    const tuples = views.map((view, index) => {
      values.push(
        view.slug,
        view.realIp,
        view.referer,
        view.mobile,
        view.platform,
        view.os,
        view.browserName,
        view.timestamp
      );
      const offset = index * PAGE_VIEW_COLUMNS.length;
      const placeholders = PAGE_VIEW_COLUMNS.map((_, column) => `$${offset + column + 1}`);
      return `(${placeholders.join(", ")})`;
    });

    const sql = `INSERT INTO page_views (${PAGE_VIEW_COLUMNS.join(", ")}) VALUES ${tuples.join(", ")}`;
    const result = await this.run("createPageViews", sql, values);
    return result.rowCount ?? views.length;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async ping(): Promise<boolean> {
    try {
      await this.run("ping", HEALTH_QUERY);
      return true;
    } catch (err) {
      this.logger.warn({ err }, "PostgreSQL ping failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run(operation: string, text: string, values: unknown[] = []): Promise<QueryResultLike> {
    try {
      return await withTimeout(this.pool.query(text, values), this.timeoutMs, `pg ${operation}`);
    } catch (err) {
      throw new StoreError(`${operation} failed`, { cause: err });
    }
  }
}
