import UAParser from "ua-parser-js";
import type { ClientAttributes } from "@shortpage/shared";
import { detectBot } from "./bot-detection.js";

/**
 * Classify a User-Agent for page-view analytics.
 *
 * `platform` is the device class ua-parser reports ("mobile", "tablet",
 * "smarttv", ...); desktops report none and become "desktop".
 */
export function classifyUserAgent(userAgent: string | undefined): ClientAttributes {
  const { isBot } = detectBot(userAgent);
  const result = new UAParser(userAgent ?? "").getResult();
  const deviceType = result.device.type;

  return {
    isBot,
    isMobile: deviceType === "mobile",
    platform: deviceType ?? "desktop",
    os: result.os.name ?? "",
    browserName: result.browser.name ?? "",
  };
}
