/**
 * Shared Utility Functions
 */

export { generateSlug, isValidSlug, validateDestinationUrl } from "./slug.js";
export type { ValidationResult } from "./slug.js";

export { required, optional, optionalInt, optionalEnum } from "./env.js";

export { withTimeout, TimeoutError, applyJitter } from "./timeout.js";
