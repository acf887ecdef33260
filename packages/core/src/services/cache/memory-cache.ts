/**
 * Process-local TTL cache
 */

import type { CacheEntry, CacheStore } from "./types";

export interface MemoryCacheOptions {
  /** Default TTL applied when `set` gets none */
  ttlSeconds: number;
  /** Entry count before the soonest-expiring entry is dropped */
  maxItems: number;
}

export class MemoryCache implements CacheStore {
  readonly kind = "memory" as const;
  private readonly store = new Map<string, CacheEntry>();
  private readonly ttlSeconds: number;
  private readonly maxItems: number;

  constructor(options: Partial<MemoryCacheOptions> = {}) {
    this.ttlSeconds = options.ttlSeconds ?? 120;
    this.maxItems = options.maxItems ?? 1000;
  }

  get size(): number {
    return this.store.size;
  }

  async get(key: string): Promise<unknown | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.ttlSeconds;
    if (ttl <= 0) return;

    if (!this.store.has(key) && this.store.size >= this.maxItems) {
      this.evictSoonestExpiring();
    }
    this.store.set(key, { value, expiresAt: Date.now() + ttl * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  private evictSoonestExpiring(): void {
    let victim: string | null = null;
    let soonest = Infinity;
    for (const [key, entry] of this.store) {
      if (entry.expiresAt < soonest) {
        soonest = entry.expiresAt;
        victim = key;
      }
    }
    if (victim !== null) {
      this.store.delete(victim);
    }
  }
}
