/**
 * Route test helpers
 */

import {
  BacktestService,
  DataService,
  MemoryCache,
  MockSportsProvider,
  PicksService,
  loadConfig,
} from "@picks/core";
import type { Services } from "../lib/services";

// Every mock game up to this instant is final
export const NOW = Date.parse("2025-03-01T00:00:00Z");

// 2025-01-15 is day 20103 since the epoch; fixtures are numbered by day and slot
export const FIRST_NBA_FIXTURE = 1_000_000 + 20103 * 10;

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Services over the deterministic mock provider with a fixed clock
 */
export function createTestServices(now: number = NOW): Services {
  const config = loadConfig({ SPORTS_PROVIDER: "mock", NODE_ENV: "test" });
  const provider = new MockSportsProvider({ now: () => now });
  const picks = new PicksService({ provider });
  return {
    config,
    cache: new MemoryCache(config.cache),
    provider,
    data: new DataService({ provider, apiKeyConfigured: false }),
    picks,
    backtest: new BacktestService(picks),
  };
}

/**
 * Value at a path inside a parsed JSON body; undefined when the path is missing
 */
export function at(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
