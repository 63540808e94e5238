import type { OGP } from "@shortpage/shared";
import type { LookupSource, RedirectOutcome } from "./types.js";

/**
 * | URL resolved | OGP resolved | Outcome   |
 * |--------------|--------------|-----------|
 * | no           | -            | not_found |
 * | yes          | no           | redirect  |
 * | yes          | yes          | preview   |
 */
export function decideOutcome(
  url: string | null,
  ogp: OGP | null,
  source: LookupSource
): RedirectOutcome {
  if (url === null) {
    return { kind: "not_found", source };
  }
  if (ogp === null) {
    return { kind: "redirect", url, source };
  }
  return { kind: "preview", url, ogp, source };
}
