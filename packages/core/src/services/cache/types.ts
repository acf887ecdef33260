/**
 * Cache Types
 */

/**
 * Async key/value store for upstream responses.
 * Values are JSON-compatible; callers validate what they read back.
 */
export interface CacheStore {
  readonly kind: "memory" | "upstash";
  get(key: string): Promise<unknown | null>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheEntry {
  value: unknown;
  expiresAt: number;
}
