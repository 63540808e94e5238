/**
 * Page API Service
 *
 * Owner-facing management of pages. Redirects are served by the
 * separate redirect service.
 */

import { logger } from "@shortpage/logger";
import { main } from "./server.js";

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
