/**
 * Mutation Coordinator
 *
 * Owner-facing writes. Every operation commits to the store first and
 * only then touches the cache, so the cache is never the only place a
 * change is recorded.
 */

import type { OGP, OGPInput, Page } from "@shortpage/shared";
import { SLUG_CONFIG, generateSlug, validateDestinationUrl } from "@shortpage/shared";
import type { VolatileCache } from "@shortpage/cache";
import { SlugConflictError, type PageStore } from "@shortpage/db";
import { createLogger, type Logger } from "@shortpage/logger";
import { ForbiddenError, NotFoundError, StoreFailureError, ValidationError } from "./errors.js";

export interface MutationCoordinatorDeps {
  cache: VolatileCache;
  store: PageStore;
  logger?: Logger;
  /** Slug source; defaults to generateSlug() */
  generateSlug?: () => string;
  /** Attempts per create before a slug conflict becomes a store failure */
  maxAttempts?: number;
}

export class MutationCoordinator {
  private readonly cache: VolatileCache;
  private readonly store: PageStore;
  private readonly logger: Logger;
  private readonly nextSlug: () => string;
  private readonly maxAttempts: number;

  constructor(deps: MutationCoordinatorDeps) {
    this.cache = deps.cache;
    this.store = deps.store;
    this.logger = deps.logger ?? createLogger("mutations");
    this.nextSlug = deps.generateSlug ?? (() => generateSlug());
    this.maxAttempts = deps.maxAttempts ?? SLUG_CONFIG.MAX_RETRIES;
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Create a page under a fresh slug, with its OGP in the same
   * transaction when one is supplied.
   */
  async create(ownerId: number, url: string, ogp?: OGPInput): Promise<Page> {
    assertValidUrl(url);

    const page = await this.insertWithFreshSlug(ownerId, url, ogp);

    await this.cache.setURL(page.slug, page.url);
    if (page.ogp) {
      await this.cache.setOGPID(page.slug, page.ogp.id);
    }

    this.logger.info({ slug: page.slug, ownerId, hasOgp: page.ogp !== null }, "Page created");
    return page;
  }

  /**
   * Replace the URL and reconcile the OGP: create it, update it in place,
   * or delete it when withheld.
   */
  async update(slug: string, ownerId: number, url: string, ogp?: OGPInput): Promise<Page> {
    const page = await this.loadOwned(slug, ownerId);
    assertValidUrl(url);

    await this.storeCall("updatePage", () => this.store.updatePage(page.id, url));
    await this.cache.setURL(slug, url);

    let next: OGP | null = page.ogp;

    if (ogp) {
      const existing = page.ogp;
      next = existing
        ? await this.storeCall("updateOGP", () => this.store.updateOGP(existing.id, ogp))
        : await this.storeCall("createOGP", () => this.store.createOGP(page.id, ogp));
      // Same ID on update; setting it again repairs an evicted mapping
      await this.cache.setOGPID(slug, next.id);
    } else if (page.ogp) {
      const existing = page.ogp;
      await this.storeCall("deleteOGP", () => this.store.deleteOGP(existing.id));
      await this.cache.deleteOGPID(slug);
      next = null;
    }

    this.logger.info({ slug, ownerId, hasOgp: next !== null }, "Page updated");
    return { ...page, url, ogp: next };
  }

  // ===========================================================================
  // Owner Reads
  // ===========================================================================

  async get(slug: string, ownerId: number): Promise<Page> {
    return this.loadOwned(slug, ownerId);
  }

  /** Newest first */
  async listForOwner(ownerId: number): Promise<Page[]> {
    return this.storeCall("listPagesByOwner", () => this.store.listPagesByOwner(ownerId));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async loadOwned(slug: string, ownerId: number): Promise<Page> {
    const page = await this.storeCall("findPageBySlug", () => this.store.findPageBySlug(slug));
    if (!page) {
      throw new NotFoundError(slug);
    }
    if (page.ownerId !== ownerId) {
      throw new ForbiddenError(slug);
    }
    return page;
  }

  private async insertWithFreshSlug(ownerId: number, url: string, ogp?: OGPInput): Promise<Page> {
    let lastConflict: SlugConflictError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const slug = this.nextSlug();
      try {
        return await this.store.createPage({ slug, ownerId, url, ogp });
      } catch (err) {
        if (!(err instanceof SlugConflictError)) {
          this.logger.error({ err, slug }, "createPage failed");
          throw new StoreFailureError("createPage", err);
        }
        lastConflict = err;
        this.logger.warn({ slug, attempt }, "Slug collision, regenerating");
      }
    }

    this.logger.error({ attempts: this.maxAttempts }, "No free slug found");
    throw new StoreFailureError("createPage", lastConflict);
  }

  private async storeCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      this.logger.error({ err, operation }, "Store call failed");
      throw new StoreFailureError(operation, err);
    }
  }
}

function assertValidUrl(url: string): void {
  const result = validateDestinationUrl(url);
  if (!result.valid) {
    throw new ValidationError(result.error ?? "url is invalid");
  }
}
