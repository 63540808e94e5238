/**
 * Redirect Engine
 *
 * The read path behind GET /:slug.
 *
 * Flow:
 * 1. Validate slug format (fast rejection, no I/O)
 * 2. Cache lookup: slug → URL
 * 3. Hit: read slug → OGP-ID from the cache
 * 4. Miss: load the page from the store and repopulate both keys
 * 5. Resolve the OGP record (stale cache IDs are dropped)
 * 6. Record a page view (detached, non-bots only)
 * 7. Decide: not_found / redirect / preview
 *
 * Graceful Degradation:
 * - Cache down → every lookup is a miss, served from the store
 * - Store down → StoreFailureError
 * - Analytics down → redirect still works
 */

import type { ClientInfo, OGP, PageView } from "@shortpage/shared";
import { isValidSlug } from "@shortpage/shared";
import type { VolatileCache } from "@shortpage/cache";
import type { PageStore } from "@shortpage/db";
import { classifyUserAgent, type PageViewRecorder } from "@shortpage/analytics";
import { createLogger, type Logger } from "@shortpage/logger";
import { decideOutcome } from "./decision.js";
import { StoreFailureError } from "./errors.js";
import type { LookupSource, RedirectOutcome, UserAgentClassifier } from "./types.js";

export interface RedirectEngineDeps {
  cache: VolatileCache;
  store: PageStore;
  recorder: PageViewRecorder;
  classify?: UserAgentClassifier;
  logger?: Logger;
  now?: () => Date;
}

export class RedirectEngine {
  private readonly cache: VolatileCache;
  private readonly store: PageStore;
  private readonly recorder: PageViewRecorder;
  private readonly classify: UserAgentClassifier;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: RedirectEngineDeps) {
    this.cache = deps.cache;
    this.store = deps.store;
    this.recorder = deps.recorder;
    this.classify = deps.classify ?? classifyUserAgent;
    this.logger = deps.logger ?? createLogger("redirect-engine");
    this.now = deps.now ?? (() => new Date());
  }

  async resolve(slug: string, client: ClientInfo = {}): Promise<RedirectOutcome> {
    if (!isValidSlug(slug)) {
      return decideOutcome(null, null, "none");
    }

    let url = await this.cache.getURL(slug);
    let source: LookupSource;
    let ogp: OGP | null = null;
    let ogpId = 0;

    if (url !== null) {
      source = "cache";
      ogpId = await this.cache.getOGPID(slug);
    } else {
      source = "store";
      const page = await this.storeCall("findPageBySlug", () => this.store.findPageBySlug(slug));
      if (!page) {
        return decideOutcome(null, null, source);
      }

      url = page.url;
      await this.cache.setURL(slug, page.url);
      if (page.ogp) {
        ogp = page.ogp;
        await this.cache.setOGPID(slug, page.ogp.id);
      } else {
        // A mapping can outlive its OGP when the cache missed the delete
        await this.cache.deleteOGPID(slug);
      }
    }

    if (ogp === null && ogpId !== 0) {
      const id = ogpId;
      ogp = await this.storeCall("findOGPByID", () => this.store.findOGPByID(id));
      if (ogp === null) {
        this.logger.info({ slug, ogpId }, "Dropping stale OGP mapping");
        await this.cache.deleteOGPID(slug);
      }
    }

    this.recordView(slug, client);

    return decideOutcome(url, ogp, source);
  }

  /**
   * Fire-and-forget. Classification or recorder failures are logged and
   * never reach the caller.
   */
  private recordView(slug: string, client: ClientInfo): void {
    try {
      const attributes = this.classify(client.userAgent);
      if (attributes.isBot) {
        return;
      }

      const view: PageView = {
        slug,
        realIp: client.ip ?? "",
        referer: client.referer ?? "",
        mobile: attributes.isMobile,
        platform: attributes.platform,
        os: attributes.os,
        browserName: attributes.browserName,
        timestamp: this.now(),
      };
      this.recorder.record(view);
    } catch (err) {
      this.logger.error({ err, slug }, "Failed to record page view");
    }
  }

  private async storeCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      this.logger.error({ err, operation }, "Store lookup failed");
      throw new StoreFailureError(operation, err);
    }
  }
}
