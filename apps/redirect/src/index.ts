/**
 * shortpage Redirect Service
 *
 * Entry point: npm run start:redirect
 */

import { createLogger } from "@shortpage/logger";
import { main } from "./server.js";

main().catch((err: unknown) => {
  createLogger("redirect").fatal({ err }, "Failed to start");
  process.exit(1);
});
