/**
 * Client IP resolution behind proxies and CDNs.
 *
 * Priority:
 * 1. CF-Connecting-IP (Cloudflare)
 * 2. X-Forwarded-For, first hop
 * 3. X-Real-IP (nginx)
 * 4. Socket remote address
 */

export type HeaderLookup = (name: string) => string | undefined;

export function resolveClientIp(header: HeaderLookup, remoteAddress?: string): string {
  const cloudflare = header("cf-connecting-ip")?.trim();
  if (cloudflare) return cloudflare;

  const forwarded = header("x-forwarded-for")?.split(",")[0]?.trim();
  if (forwarded) return forwarded;

  const realIp = header("x-real-ip")?.trim();
  if (realIp) return realIp;

  return remoteAddress ?? "";
}
