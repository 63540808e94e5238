/**
 * Shared fixtures: an in-process cache and store wired into a real engine
 * and coordinator.
 */

import type { PageView, User } from "@shortpage/shared";
import { MemoryRedis, RedisVolatileCache, type RedisCommands } from "@shortpage/cache";
import { MemoryPageStore } from "@shortpage/db";
import type { PageViewRecorder } from "@shortpage/analytics";
import { MutationCoordinator, RedirectEngine } from "../src/index.js";

export const OWNER_ID = 1;
export const OTHER_ID = 2;
export const NOW = new Date("2024-06-01T10:00:00.000Z");

export const CHROME_UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const GOOGLEBOT_UA = "Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)";

export function testUsers(): User[] {
  return [
    { id: OWNER_ID, email: "owner@example.com", name: "Owner", createdAt: NOW },
    { id: OTHER_ID, email: "other@example.com", name: null, createdAt: NOW },
  ];
}

export class RecordingRecorder implements PageViewRecorder {
  readonly views: PageView[] = [];

  record(view: PageView): void {
    this.views.push(view);
  }

  async close(): Promise<void> {
    this.views.length = 0;
  }
}

/**
 * Every command rejects, as ioredis does with the offline queue disabled.
 */
export class UnavailableRedis implements RedisCommands {
  private fail(): Promise<never> {
    return Promise.reject(new Error("Connection is closed."));
  }

  get(): Promise<string | null> {
    return this.fail();
  }
  set(): Promise<unknown> {
    return this.fail();
  }
  setex(): Promise<unknown> {
    return this.fail();
  }
  del(): Promise<number> {
    return this.fail();
  }
  ping(): Promise<string> {
    return this.fail();
  }
  quit(): Promise<unknown> {
    return this.fail();
  }
}

export interface FixtureOptions {
  /** Slugs handed out in order by the coordinator */
  slugs?: string[];
  redis?: RedisCommands;
}

export function createFixture(options: FixtureOptions = {}) {
  const redis = new MemoryRedis();
  const cache = new RedisVolatileCache(options.redis ?? redis, { timeoutMs: 50 });
  const store = new MemoryPageStore({ users: testUsers() });
  const recorder = new RecordingRecorder();
  const slugs = [...(options.slugs ?? ["abc234"])];

  const engine = new RedirectEngine({ cache, store, recorder, now: () => NOW });
  const coordinator = new MutationCoordinator({
    cache,
    store,
    generateSlug: () => slugs.shift() ?? "exhausted",
  });

  return { redis, cache, store, recorder, engine, coordinator };
}
