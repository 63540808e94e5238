import type { ClientAttributes, OGP } from "@shortpage/shared";

/**
 * Where the destination URL was found. `none` when the slug was rejected
 * before any lookup.
 */
export type LookupSource = "cache" | "store" | "none";

export type RedirectOutcome =
  | { kind: "not_found"; source: LookupSource }
  | { kind: "redirect"; url: string; source: LookupSource }
  | { kind: "preview"; url: string; ogp: OGP; source: LookupSource };

export type RedirectKind = RedirectOutcome["kind"];

export type UserAgentClassifier = (userAgent: string | undefined) => ClientAttributes;
