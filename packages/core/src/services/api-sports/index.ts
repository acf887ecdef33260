/**
 * API-SPORTS integration
 *
 * Client, payload parsing and the `SportsDataProvider` implementations.
 *
 * @example
 * ```typescript
 * import { createSportsProvider } from '@picks/core/services/api-sports';
 *
 * const provider = createSportsProvider(getConfig(), createCache(getConfig()));
 * const fixtures = await provider.listFixtures('nfl', { date: '2024-11-10' });
 * ```
 */

import type { AppConfig } from "../../config";
import type { CacheStore } from "../cache";
import { ConfigErrors } from "../errors";
import { ApiSportsClient } from "./client";
import { MockSportsProvider } from "./mock";
import { ApiSportsProvider, type SportsDataProvider } from "./provider";

export { ApiSportsClient } from "./client";
export { ApiSportsProvider } from "./provider";
export type { SportsDataProvider } from "./provider";
export { MockSportsProvider } from "./mock";
export type { MockSportsProviderOptions } from "./mock";
export {
  LEAGUE_FAMILY,
  LEAGUE_IDS,
  DEFAULT_BASES,
  OPERATIONS,
  oddsParamFor,
} from "./endpoints";
export type { SportFamily, ApiSportsOperation, OperationSpec } from "./endpoints";
export {
  mapStatus,
  scoreTotal,
  parseFixture,
  parseFixtures,
  toCompactFixture,
  normalizeSeason,
} from "./parse";
export { envelopeSchema, responseItems } from "./types";
export type {
  ApiSportsEnvelope,
  ApiSportsClientConfig,
  FixtureQuery,
  QueryParams,
  RawBookmaker,
  RawBet,
  RawOddValue,
} from "./types";

/**
 * Provider selected by `SPORTS_PROVIDER`
 */
export function createSportsProvider(
  config: Pick<AppConfig, "provider" | "apiSports" | "cache">,
  cache?: CacheStore
): SportsDataProvider {
  if (config.provider === "mock") {
    return new MockSportsProvider();
  }

  const { apiKey, bases, timeoutMs, maxRetries, backoffMs, requestsPerMinute } = config.apiSports;
  if (!apiKey) {
    throw ConfigErrors.missingApiKey();
  }

  const client = new ApiSportsClient({
    apiKey,
    bases: {
      basketball: bases.basketball,
      "american-football": bases.americanFootball,
      football: bases.football,
    },
    timeoutMs,
    maxRetries,
    backoffMs,
    requestsPerMinute,
    cache,
    cacheTtlSeconds: config.cache.ttlSeconds,
  });
  return new ApiSportsProvider(client);
}
