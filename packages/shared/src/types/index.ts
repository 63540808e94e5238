/**
 * Shared Domain Types
 *
 * Plain interfaces only; every workspace speaks in these shapes.
 */

// =============================================================================
// Persistent Records
// =============================================================================

/**
 * Account that owns pages. Provisioned outside this system.
 */
export interface User {
  id: number;
  email: string;
  name: string | null;
  createdAt: Date;
}

/**
 * Social-preview metadata attached to at most one page.
 */
export interface OGP {
  id: number;
  pageId: number;
  title: string;
  image: string;
  description: string;
}

/**
 * OGP fields as supplied by an owner, before the store assigns IDs.
 */
export interface OGPInput {
  title: string;
  image: string;
  description: string;
}

/**
 * A short link. `slug` is unique and never changes once created;
 * `url` is mutable by the owner.
 */
export interface Page {
  id: number;
  slug: string;
  ownerId: number;
  url: string;
  createdAt: Date;
  ogp: OGP | null;
}

/**
 * One non-bot visit to a page. Append-only.
 */
export interface PageView {
  slug: string;
  realIp: string;
  referer: string;
  mobile: boolean;
  platform: string;
  os: string;
  browserName: string;
  timestamp: Date;
}

// =============================================================================
// Request Context
// =============================================================================

/**
 * Client data taken from an incoming redirect request.
 */
export interface ClientInfo {
  userAgent?: string;
  ip?: string;
  referer?: string;
}

/**
 * Result of classifying a User-Agent string.
 */
export interface ClientAttributes {
  isBot: boolean;
  isMobile: boolean;
  /** Device class: "desktop", "mobile", "tablet", ... */
  platform: string;
  os: string;
  browserName: string;
}

// =============================================================================
// API Response Types
// =============================================================================

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: string;
  code: string;
}
