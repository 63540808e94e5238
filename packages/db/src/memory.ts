/**
 * In-memory Page Store
 *
 * Mirrors the PostgreSQL constraints that callers rely on (unique slug,
 * one OGP per page, owner must exist) so the same behaviour can be
 * exercised without a database. Selected by STORE_DRIVER=memory.
 */

import type { OGP, OGPInput, Page, PageView, User } from "@shortpage/shared";
import { SlugConflictError, StoreError } from "./errors.js";
import type { CreatePageInput, PageStore } from "./types.js";

type StoredPage = Omit<Page, "ogp">;

export interface MemoryPageStoreOptions {
  users?: User[];
  now?: () => Date;
}

export class MemoryPageStore implements PageStore {
  private readonly users = new Map<number, User>();
  private readonly pages = new Map<number, StoredPage>();
  private readonly pageIdsBySlug = new Map<string, number>();
  private readonly ogps = new Map<number, OGP>();
  private readonly ogpIdsByPage = new Map<number, number>();
  private readonly views: PageView[] = [];
  private readonly now: () => Date;
  private nextPageId = 1;
  private nextOgpId = 1;

  constructor(options: MemoryPageStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    for (const user of options.users ?? []) {
      this.addUser(user);
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async findPageBySlug(slug: string): Promise<Page | null> {
    const pageId = this.pageIdsBySlug.get(slug);
    return pageId === undefined ? null : this.materialize(pageId);
  }

  async findOGPByID(ogpId: number): Promise<OGP | null> {
    const ogp = this.ogps.get(ogpId);
    return ogp ? { ...ogp } : null;
  }

  async listPagesByOwner(ownerId: number): Promise<Page[]> {
    return [...this.pages.values()]
      .filter((page) => page.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((page) => this.attachOGP(page));
  }

  async findUserById(userId: number): Promise<User | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async createPage(input: CreatePageInput): Promise<Page> {
    if (this.pageIdsBySlug.has(input.slug)) {
      throw new SlugConflictError(input.slug);
    }
    if (!this.users.has(input.ownerId)) {
      throw new StoreError(`createPage: user ${input.ownerId} does not exist`);
    }

    const page: StoredPage = {
      id: this.nextPageId++,
      slug: input.slug,
      ownerId: input.ownerId,
      url: input.url,
      createdAt: this.now(),
    };
    this.pages.set(page.id, page);
    this.pageIdsBySlug.set(page.slug, page.id);

    if (input.ogp) {
      this.insertOGP(page.id, input.ogp);
    }

    return this.attachOGP(page);
  }

  async updatePage(pageId: number, url: string): Promise<void> {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new StoreError(`updatePage: page ${pageId} does not exist`);
    }
    page.url = url;
  }

  async createOGP(pageId: number, input: OGPInput): Promise<OGP> {
    if (!this.pages.has(pageId)) {
      throw new StoreError(`createOGP: page ${pageId} does not exist`);
    }
    if (this.ogpIdsByPage.has(pageId)) {
      throw new StoreError(`createOGP: page ${pageId} already has an OGP`);
    }
    return { ...this.insertOGP(pageId, input) };
  }

  async updateOGP(ogpId: number, input: OGPInput): Promise<OGP> {
    const ogp = this.ogps.get(ogpId);
    if (!ogp) {
      throw new StoreError(`updateOGP: OGP ${ogpId} does not exist`);
    }
    ogp.title = input.title;
    ogp.image = input.image;
    ogp.description = input.description;
    return { ...ogp };
  }

  async deleteOGP(ogpId: number): Promise<void> {
    const ogp = this.ogps.get(ogpId);
    if (!ogp) return;
    this.ogps.delete(ogpId);
    this.ogpIdsByPage.delete(ogp.pageId);
  }

  async createPageViews(views: PageView[]): Promise<number> {
    this.views.push(...views.map((view) => ({ ...view })));
    return views.length;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  // ---------------------------------------------------------------------------
  // Helpers (seeding and inspection)
  // ---------------------------------------------------------------------------

  addUser(user: User): void {
    this.users.set(user.id, { ...user });
  }

  /** Page views recorded so far, oldest first */
  pageViews(): PageView[] {
    return this.views.map((view) => ({ ...view }));
  }

  clear(): void {
    this.pages.clear();
    this.pageIdsBySlug.clear();
    this.ogps.clear();
    this.ogpIdsByPage.clear();
    this.views.length = 0;
  }

  private insertOGP(pageId: number, input: OGPInput): OGP {
    const ogp: OGP = {
      id: this.nextOgpId++,
      pageId,
      title: input.title,
      image: input.image,
      description: input.description,
    };
    this.ogps.set(ogp.id, ogp);
    this.ogpIdsByPage.set(pageId, ogp.id);
    return ogp;
  }

  private materialize(pageId: number): Page | null {
    const page = this.pages.get(pageId);
    return page ? this.attachOGP(page) : null;
  }

  private attachOGP(page: StoredPage): Page {
    const ogpId = this.ogpIdsByPage.get(page.id);
    const ogp = ogpId === undefined ? undefined : this.ogps.get(ogpId);
    return { ...page, ogp: ogp ? { ...ogp } : null };
  }
}
