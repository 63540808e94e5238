import type { PageView } from "@shortpage/shared";
import type { PageViewRecorder } from "./types.js";

/**
 * ANALYTICS_MODE=off
 */
export class NoopPageViewRecorder implements PageViewRecorder {
  record(_view: PageView): void {
    return;
  }

  async close(): Promise<void> {
    return;
  }
}
