/**
 * Response cache
 *
 * `MemoryCache` for a single process, `UpstashCache` when Upstash credentials
 * are configured.
 */

import type { AppConfig } from "../../config";
import { getLogger } from "../logger";
import { MemoryCache } from "./memory-cache";
import { UpstashCache } from "./upstash-cache";
import type { CacheStore } from "./types";

export { MemoryCache, type MemoryCacheOptions } from "./memory-cache";
export { UpstashCache, type UpstashCacheOptions } from "./upstash-cache";
export type { CacheStore, CacheEntry } from "./types";

/**
 * Stable cache key: URL plus the params serialized with sorted keys.
 * Undefined params are dropped.
 */
export function cacheKey(
  url: string,
  params: Record<string, string | number | undefined> = {}
): string {
  const sorted: Record<string, string | number> = {};
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return `${url}?${JSON.stringify(sorted)}`;
}

export function createCache(config: Pick<AppConfig, "cache" | "upstash">): CacheStore {
  if (config.upstash) {
    getLogger().info("Using Upstash response cache", { service: "cache" });
    return new UpstashCache({
      url: config.upstash.url,
      token: config.upstash.token,
      ttlSeconds: config.cache.ttlSeconds,
    });
  }
  return new MemoryCache({
    ttlSeconds: config.cache.ttlSeconds,
    maxItems: config.cache.maxItems,
  });
}
