/**
 * Data services: injuries, history, odds, fixture resolution and listings
 */

export { DataService, DEFAULT_MAX_ODDS_LOOKUPS, DEFAULT_GAMES_LIMIT, DEFAULT_HISTORY_LIMIT } from "./service";
export type {
  DataServiceOptions,
  InjuriesQuery,
  HistoryQuery,
  OddsQuery,
  FixtureOdds,
  ResolveQuery,
  GamesQuery,
  GamesHistoryQuery,
  GamesListing,
  ProviderInfo,
} from "./service";
export { resolveFromFixtures, normalizeName, scoreFixture, RESOLVE_REASONS } from "./resolve";
export {
  validateLeague,
  rejectUnknownParams,
  ensureRequiredParams,
  allowedParams,
} from "./validation";
export type { DataOperation } from "./validation";
