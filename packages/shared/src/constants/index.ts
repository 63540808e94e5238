/**
 * Slug Configuration Constants
 *
 * Single source of truth for slug generation and validation parameters.
 */
export const SLUG_CONFIG = {
  /**
   * Default length for generated slugs.
   * 56^6 = ~30.8 billion combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Alphanumerics without the easily confused glyphs 0 O o 1 l I.
   * 56 characters, all URL-safe.
   */
  ALPHABET: "23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnpqrstuvwxyz",

  /** Maximum generation attempts when the store reports a slug conflict */
  MAX_RETRIES: 5,

  /**
   * Accepted on the redirect path. Wider than ALPHABET so that slugs
   * minted by older generators keep resolving.
   */
  PATTERN: /^[A-Za-z0-9_-]{1,64}$/,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Volatile cache key prefixes, versioned so a format change can roll out
 * without reading stale entries: bump v1 → v2.
 */
export const CACHE_KEYS = {
  /** slug → destination URL: sp:v1:url:{slug} */
  URL_PREFIX: "sp:v1:url:",

  /** slug → OGP record ID: sp:v1:ogp:{slug} */
  OGP_PREFIX: "sp:v1:ogp:",
} as const;

/**
 * TTL jitter percentage (±8%)
 *
 * Keys written together do not all expire in the same second.
 * Math: TTL * (1 + random(-0.08, 0.08))
 */
export const TTL_JITTER_PERCENT = 0.08;
