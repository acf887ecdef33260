/**
 * Shared cache over Upstash Redis
 */

import { Redis } from "@upstash/redis";
import type { CacheStore } from "./types";

export interface UpstashCacheOptions {
  url: string;
  token: string;
  ttlSeconds: number;
  prefix?: string;
}

export class UpstashCache implements CacheStore {
  readonly kind = "upstash" as const;
  private readonly redis: Redis;
  private readonly ttlSeconds: number;
  private readonly prefix: string;

  constructor(options: UpstashCacheOptions, redis?: Redis) {
    this.redis = redis ?? new Redis({ url: options.url, token: options.token });
    this.ttlSeconds = options.ttlSeconds;
    this.prefix = options.prefix ?? "picks:cache:";
  }

  async get(key: string): Promise<unknown | null> {
    const value = await this.redis.get<unknown>(this.prefix + key);
    return value ?? null;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.ttlSeconds;
    if (ttl <= 0) return;
    await this.redis.set(this.prefix + key, value, { ex: ttl });
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }

  async clear(): Promise<void> {
    let cursor = "0";
    do {
      const [next, keys] = await this.redis.scan(cursor, { match: `${this.prefix}*`, count: 100 });
      if (keys.length > 0) {
        await this.redis.del(...keys);
      }
      cursor = String(next);
    } while (cursor !== "0");
  }
}
