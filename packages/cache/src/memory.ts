/**
 * In-process Redis stand-in.
 *
 * Implements the command subset RedisVolatileCache issues, with lazy
 * expiry. Selected by CACHE_DRIVER=memory and used throughout the tests.
 */

import type { RedisCommands } from "./types.js";

interface Entry {
  value: string;
  expiresAt: number | null;
}

export class MemoryRedis implements RedisCommands {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string): Promise<"OK"> {
    this.entries.set(key, { value, expiresAt: null });
    return "OK";
  }

  async setex(key: string, seconds: number, value: string): Promise<"OK"> {
    this.entries.set(key, { value, expiresAt: this.now() + seconds * 1000 });
    return "OK";
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async quit(): Promise<"OK"> {
    this.entries.clear();
    return "OK";
  }

  /** Remaining TTL in seconds, -1 without expiry, -2 when absent (as TTL does). */
  ttl(key: string): number {
    const entry = this.read(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  /** Live keys, sorted. */
  keys(): string[] {
    return [...this.entries.keys()].filter((key) => this.read(key) !== undefined).sort();
  }

  flushall(): void {
    this.entries.clear();
  }

  private read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
