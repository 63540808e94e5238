/**
 * @shortpage/shared - Shared Package Exports
 *
 * Central export point for domain types, slug utilities, config helpers
 * and constants. Import from the package root, not from internal paths:
 *
 * ```ts
 * import { generateSlug, validateDestinationUrl } from "@shortpage/shared";
 * ```
 */

// Types (Page, OGP, PageView, ClientInfo, etc.)
export * from "./types/index.js";

// Utilities (slug generation, URL validation, env parsing, timeouts)
export * from "./utils/index.js";

// Constants (SLUG_CONFIG, URL_CONFIG, CACHE_KEYS)
export * from "./constants/index.js";
