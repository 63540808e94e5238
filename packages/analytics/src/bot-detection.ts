/**
 * Bot Detection Module
 *
 * Identifies crawler traffic so it is left out of page-view analytics.
 * Crawlers still get the normal response (social crawlers need the
 * preview page).
 *
 * Detection Methods:
 * - Missing User-Agent
 * - Known crawler / HTTP-library patterns (data/crawler-patterns.json)
 * - Suspicious User-Agent shapes (too short, bare "Mozilla/5.0", ...)
 *
 * False positives: curl, wget and other tools count as bots.
 */

import patterns from "./data/crawler-patterns.json";
import type { BotDetectionResult } from "./types.js";

const BOT_USER_AGENT_PATTERNS: readonly RegExp[] = patterns.known.map(
  (source) => new RegExp(source, "i")
);

const SUSPICIOUS_USER_AGENT_PATTERNS: readonly RegExp[] = patterns.suspicious.map(
  (source) => new RegExp(source, "i")
);

/**
 * Detect if a request is from a bot
 *
 * Detection priority:
 * 1. Missing User-Agent
 * 2. Known bot pattern
 * 3. Suspicious User-Agent shape
 */
export function detectBot(userAgent: string | undefined): BotDetectionResult {
  if (!userAgent || userAgent.trim() === "") {
    return { isBot: true, reason: "missing_user_agent" };
  }

  const ua = userAgent.trim();

  if (BOT_USER_AGENT_PATTERNS.some((pattern) => pattern.test(ua))) {
    return { isBot: true, reason: "user_agent_pattern" };
  }

  if (SUSPICIOUS_USER_AGENT_PATTERNS.some((pattern) => pattern.test(ua))) {
    return { isBot: true, reason: "suspicious_user_agent" };
  }

  return { isBot: false };
}

/**
 * Quick check if User-Agent matches a known bot pattern
 */
export function isKnownBot(userAgent: string | undefined): boolean {
  if (!userAgent) return true;
  return BOT_USER_AGENT_PATTERNS.some((pattern) => pattern.test(userAgent));
}
