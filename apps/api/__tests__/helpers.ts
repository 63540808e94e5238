/**
 * Shared fixtures for API tests: a real coordinator over the in-process
 * cache and store, and tokens signed with a placeholder secret.
 */

import type { FastifyInstance } from "fastify";
import { MemoryRedis, RedisVolatileCache } from "@shortpage/cache";
import { MemoryPageStore } from "@shortpage/db";
import { MutationCoordinator } from "@shortpage/links";
import { buildApp } from "../src/app.js";
import { signToken } from "../src/services/auth.js";

export const SECRET = "test-secret";
export const OWNER_ID = 1;
export const OTHER_ID = 2;
export const NOW = new Date("2024-06-01T10:00:00.000Z");
export const SHORT_URL_BASE = "https://sp.test";

export function bearer(userId: number, secret = SECRET, expiresInSeconds = 3600): string {
  return `Bearer ${signToken(userId, secret, expiresInSeconds)}`;
}

export interface TestContext {
  app: FastifyInstance;
  redis: MemoryRedis;
  store: MemoryPageStore;
  coordinator: MutationCoordinator;
}

export async function createTestApp(slugs: string[] = ["abc234", "def567", "ghk892"]): Promise<TestContext> {
  const redis = new MemoryRedis();
  const cache = new RedisVolatileCache(redis);
  const store = new MemoryPageStore({
    users: [
      { id: OWNER_ID, email: "owner@example.com", name: "Owner", createdAt: NOW },
      { id: OTHER_ID, email: "other@example.com", name: null, createdAt: NOW },
    ],
    now: () => NOW,
  });

  const queue = [...slugs];
  const coordinator = new MutationCoordinator({
    cache,
    store,
    generateSlug: () => queue.shift() ?? "overflow",
  });

  const app = await buildApp({
    coordinator,
    cache,
    store,
    jwtSecret: SECRET,
    shortUrlBase: SHORT_URL_BASE,
  });

  return { app, redis, store, coordinator };
}
