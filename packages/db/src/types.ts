/**
 * Store Type Definitions
 *
 * @see ../sql/schema.sql for the authoritative schema
 */

import type { OGP, OGPInput, Page, PageView, User } from "@shortpage/shared";

export interface CreatePageInput {
  slug: string;
  ownerId: number;
  url: string;
  /** Persisted in the same transaction as the page */
  ogp?: OGPInput;
}

/**
 * Durable record of users, pages, OGP metadata and page views.
 *
 * Lookups return null for an absent record. Everything else that goes
 * wrong surfaces as a StoreError (SlugConflictError for a taken slug).
 */
export interface PageStore {
  findPageBySlug(slug: string): Promise<Page | null>;
  findOGPByID(id: number): Promise<OGP | null>;
  /** Newest first */
  listPagesByOwner(ownerId: number): Promise<Page[]>;
  findUserById(id: number): Promise<User | null>;

  createPage(input: CreatePageInput): Promise<Page>;
  updatePage(id: number, url: string): Promise<void>;
  createOGP(pageId: number, input: OGPInput): Promise<OGP>;
  updateOGP(id: number, input: OGPInput): Promise<OGP>;
  /** No-op when the record is already gone */
  deleteOGP(id: number): Promise<void>;

  /** Batch append; resolves to the number of rows written */
  createPageViews(views: PageView[]): Promise<number>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export type StoreDriver = "postgres" | "memory";
