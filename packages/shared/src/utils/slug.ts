/**
 * Slug Generation & URL Validation
 *
 * Strategy: uniform random sampling from SLUG_CONFIG.ALPHABET.
 * - No uniqueness check here. Callers insert, and on a unique-slug
 *   conflict from the store, generate again (max SLUG_CONFIG.MAX_RETRIES).
 * - Stateless, so safe to call from concurrent requests.
 */

import { randomInt } from "node:crypto";
import { SLUG_CONFIG, URL_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

// =============================================================================
// GENERATION
// =============================================================================

/**
 * Generate a random slug.
 *
 * Uses `crypto.randomInt()` so every alphabet position is equally likely
 * and slugs cannot be predicted from creation order.
 *
 * @example
 * ```ts
 * generateSlug();   // "Xk4pQa"
 * generateSlug(8);  // "m7HwZr2e"
 * ```
 */
export function generateSlug(length: number = SLUG_CONFIG.DEFAULT_LENGTH): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Slug length must be a positive integer, got ${length}`);
  }

  const alphabet = SLUG_CONFIG.ALPHABET;
  let slug = "";
  for (let i = 0; i < length; i++) {
    slug += alphabet.charAt(randomInt(alphabet.length));
  }
  return slug;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Syntactic slug check. Runs before any cache or store I/O on the
 * redirect path.
 */
export function isValidSlug(slug: string): boolean {
  return SLUG_CONFIG.PATTERN.test(slug);
}

/**
 * Validate a destination URL supplied by an owner.
 *
 * Rules:
 * - Non-empty
 * - At most URL_CONFIG.MAX_LENGTH characters
 * - Absolute, with an http: or https: scheme
 */
export function validateDestinationUrl(url: string): ValidationResult {
  if (url.trim() === "") {
    return { valid: false, error: "url cannot be empty" };
  }

  if (url.length > URL_CONFIG.MAX_LENGTH) {
    return {
      valid: false,
      error: `url must be at most ${URL_CONFIG.MAX_LENGTH} characters`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: "url must be an absolute URL" };
  }

  const allowed: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!allowed.includes(parsed.protocol)) {
    return { valid: false, error: "url must use http or https" };
  }

  return { valid: true };
}
