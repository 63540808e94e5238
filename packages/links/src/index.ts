/**
 * @shortpage/links
 *
 * The two halves of the core: RedirectEngine answers GET /:slug from the
 * cache with store fallback; MutationCoordinator applies owner writes to
 * the store and then the cache.
 */

export { RedirectEngine, type RedirectEngineDeps } from "./engine.js";
export { MutationCoordinator, type MutationCoordinatorDeps } from "./mutations.js";
export { decideOutcome } from "./decision.js";
export * from "./errors.js";
export type { LookupSource, RedirectOutcome, RedirectKind, UserAgentClassifier } from "./types.js";
