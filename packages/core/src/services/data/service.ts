/**
 * Data Service
 *
 * Injuries, history, odds, fixture resolution, bookmaker/market listings and
 * vendor game listings on top of a sports data provider.
 */

import type {
  BookmakerSummary,
  CompactFixture,
  Fixture,
  HistoryResult,
  HistoryRow,
  League,
  MarketSummary,
  NormalizedOdds,
  ResolveResult,
  SportsProviderName,
} from "@picks/types";
import type { SportsDataProvider } from "../api-sports/provider";
import { normalizeSeason, toCompactFixture } from "../api-sports/parse";
import type { ApiSportsEnvelope, QueryParams } from "../api-sports/types";
import { ValidationErrors, toPicksApiError } from "../errors";
import { getLogger, type Logger } from "../logger";
import { listBookmakers, listMarkets, normalizeOdds } from "../odds";
import { daysInRange, parseIsoDate, todayUtc } from "../../utils/dates";
import { resolveFromFixtures } from "./resolve";
import { ensureRequiredParams, rejectUnknownParams } from "./validation";

export const DEFAULT_MAX_ODDS_LOOKUPS = 200;
export const DEFAULT_GAMES_LIMIT = 25;
export const DEFAULT_HISTORY_LIMIT = 500;

export interface InjuriesQuery {
  team?: number;
  player?: number;
  /** Soccer competition id */
  leagueId?: number;
  season?: string;
}

export interface HistoryQuery {
  startDate: string;
  endDate: string;
  season?: string;
  leagueId?: number;
  includeOdds?: boolean;
  bookmakerId?: number;
  maxOddsLookups?: number;
}

export interface OddsQuery {
  /** Return the provider payload untouched */
  raw?: boolean;
  /** Preferred bookmaker for normalization */
  bookmakerId?: number;
  /** Upstream bookmaker filter */
  bookmaker?: number;
  /** Upstream bet filter */
  bet?: number;
}

export interface FixtureOdds {
  fixtureId: number;
  odds: NormalizedOdds;
}

export interface ResolveQuery {
  league: League;
  date: string;
  home?: string;
  away?: string;
  season?: string;
  leagueId?: number;
}

export interface GamesQuery {
  date?: string;
  season?: string;
  limit?: number;
  compact?: boolean;
  leagueId?: number;
}

export interface GamesHistoryQuery {
  dateFrom?: string;
  dateTo?: string;
  seasonFrom?: string;
  seasonTo?: string;
  limit?: number;
  compact?: boolean;
  leagueId?: number;
}

export interface GamesListing {
  league: League;
  count: number;
  games: Fixture[] | CompactFixture[];
}

export interface ProviderInfo {
  sportsProvider: SportsProviderName;
  apisportsKey: "set" | "not-set";
}

export interface DataServiceOptions {
  provider: SportsDataProvider;
  /** Whether APISPORTS_KEY is configured; defaults to the provider's view */
  apiKeyConfigured?: boolean;
  logger?: Logger;
}

function assertDateRange(startDate: string, endDate: string): void {
  if (parseIsoDate(startDate) === null || parseIsoDate(endDate) === null) {
    throw ValidationErrors.invalidDateRange(startDate, endDate, "Dates must be YYYY-MM-DD.");
  }
  if (daysInRange(startDate, endDate) === 0) {
    throw ValidationErrors.invalidDateRange(startDate, endDate, "endDate is before startDate.");
  }
}

export class DataService {
  private readonly provider: SportsDataProvider;
  private readonly apiKeyConfigured: boolean;
  private readonly logger: Logger;

  constructor(options: DataServiceOptions) {
    this.provider = options.provider;
    this.apiKeyConfigured = options.apiKeyConfigured ?? options.provider.hasCredentials;
    this.logger = options.logger ?? getLogger().child({ service: "data" });
  }

  // ==========================================================================
  // Injuries
  // ==========================================================================

  /**
   * nba/ncaab have no injuries feed; nfl/ncaaf need a team or player;
   * soccer needs a competition and season.
   */
  async injuries(league: League, query: InjuriesQuery): Promise<ApiSportsEnvelope> {
    if (league === "nba" || league === "ncaab") {
      throw ValidationErrors.notSupported(
        "injuries",
        league,
        "Injuries are not provided for NBA/NCAAB."
      );
    }

    const params: QueryParams = { team: query.team, player: query.player };
    if (league === "soccer") {
      params.league = query.leagueId;
      params.season = normalizeSeason(league, query.season);
      ensureRequiredParams(
        "injuries",
        ["league", "season"],
        params,
        "Soccer injuries require leagueId (competition) and season."
      );
    } else if (!query.team && !query.player) {
      throw ValidationErrors.missingParams(
        "injuries",
        ["player", "team"],
        "NFL/NCAAF injuries require at least one of: team or player."
      );
    }

    rejectUnknownParams(league, "injuries", params);
    return this.provider.injuries(league, params);
  }

  // ==========================================================================
  // History
  // ==========================================================================

  /**
   * Fixtures between two dates with final scores and, optionally, normalized odds.
   * Odds are attached until `maxOddsLookups` lookups have succeeded; rows past
   * the cap carry no odds and a failed lookup leaves `odds: null`.
   */
  async history(league: League, query: HistoryQuery): Promise<HistoryResult> {
    assertDateRange(query.startDate, query.endDate);
    const maxLookups = query.maxOddsLookups ?? DEFAULT_MAX_ODDS_LOOKUPS;

    const fixtures = await this.provider.listFixtures(league, {
      from: query.startDate,
      to: query.endDate,
      season: query.season,
      leagueId: query.leagueId,
    });

    const items: HistoryRow[] = [];
    let lookups = 0;

    for (const fixture of fixtures) {
      const row: HistoryRow = {
        fixtureId: fixture.fixtureId,
        date: fixture.date,
        home: fixture.home.name,
        away: fixture.away.name,
        homeScore: fixture.homeScore,
        awayScore: fixture.awayScore,
      };

      if (query.includeOdds && lookups < maxLookups) {
        row.odds = await this.lookupOdds(league, fixture.fixtureId, query.bookmakerId);
        if (row.odds !== null) lookups++;
      }
      items.push(row);
    }

    return {
      count: items.length,
      league,
      range: [query.startDate, query.endDate],
      items,
    };
  }

  private async lookupOdds(
    league: League,
    fixtureId: number,
    bookmakerId: number | undefined
  ): Promise<NormalizedOdds | null> {
    try {
      const payload = await this.provider.oddsPayload(league, fixtureId);
      return normalizeOdds(payload, { preferredBookmakerId: bookmakerId, league });
    } catch (error) {
      const apiError = toPicksApiError(error);
      this.logger.warn("History odds lookup failed", {
        league,
        fixtureId,
        errorCode: apiError.code,
        errorMessage: apiError.message,
      });
      return null;
    }
  }

  // ==========================================================================
  // Odds
  // ==========================================================================

  odds(league: League, fixtureId: number, query: OddsQuery & { raw: true }): Promise<ApiSportsEnvelope>;
  odds(league: League, fixtureId: number, query?: OddsQuery & { raw?: false }): Promise<FixtureOdds>;
  odds(league: League, fixtureId: number, query?: OddsQuery): Promise<ApiSportsEnvelope | FixtureOdds>;
  async odds(
    league: League,
    fixtureId: number,
    query: OddsQuery = {}
  ): Promise<ApiSportsEnvelope | FixtureOdds> {
    const filters = { bookmaker: query.bookmaker, bet: query.bet };
    rejectUnknownParams(league, "odds", filters);

    const payload = await this.provider.oddsPayload(league, fixtureId, filters);
    if (query.raw) {
      return payload;
    }
    return {
      fixtureId,
      odds: normalizeOdds(payload, { preferredBookmakerId: query.bookmakerId, league }),
    };
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  async resolveFixture(query: ResolveQuery): Promise<ResolveResult> {
    const fixtures = await this.provider.listFixtures(query.league, {
      date: query.date,
      season: query.season,
      leagueId: query.leagueId,
    });
    return resolveFromFixtures(fixtures, query.home, query.away);
  }

  // ==========================================================================
  // Debug listings
  // ==========================================================================

  async bookmakers(
    league: League,
    fixtureId: number
  ): Promise<{ fixtureId: number; bookmakers: BookmakerSummary[] }> {
    const payload = await this.provider.oddsPayload(league, fixtureId);
    return { fixtureId, bookmakers: listBookmakers(payload) };
  }

  async markets(
    league: League,
    fixtureId: number,
    bookmakerId: number
  ): Promise<{ fixtureId: number; bookmakerId: number; bets: MarketSummary[] }> {
    const payload = await this.provider.oddsPayload(league, fixtureId);
    const offered = listBookmakers(payload).some((bookmaker) => bookmaker.id === bookmakerId);
    return {
      fixtureId,
      bookmakerId,
      bets: offered ? listMarkets(payload, { bookmakerId, league }) : [],
    };
  }

  // ==========================================================================
  // Vendor listings
  // ==========================================================================

  /**
   * Games on a date (today by default) or across a season
   */
  async games(league: League, query: GamesQuery = {}): Promise<GamesListing> {
    const limit = query.limit ?? DEFAULT_GAMES_LIMIT;
    const date = query.date ?? (query.season ? undefined : todayUtc());
    const fixtures = await this.provider.listFixtures(league, {
      date,
      season: query.season,
      leagueId: query.leagueId,
      timezone: "UTC",
      limit,
    });
    return this.listing(league, fixtures.slice(0, limit), query.compact ?? false);
  }

  /**
   * Historical games over a date window, or season by season over a season window.
   * Without either window this is today's listing.
   */
  async gamesHistory(league: League, query: GamesHistoryQuery): Promise<GamesListing> {
    const limit = query.limit ?? DEFAULT_HISTORY_LIMIT;
    const compact = query.compact ?? true;

    if (query.dateFrom || query.dateTo) {
      const fixtures = await this.provider.listFixtures(league, {
        from: query.dateFrom,
        to: query.dateTo,
        leagueId: query.leagueId,
        timezone: "UTC",
        limit,
      });
      return this.listing(league, fixtures.slice(0, limit), compact);
    }

    let seasonFrom = normalizeSeason(league, query.seasonFrom);
    let seasonTo = normalizeSeason(league, query.seasonTo);
    seasonFrom = seasonFrom ?? seasonTo;
    seasonTo = seasonTo ?? seasonFrom;
    if (!seasonFrom || !seasonTo) {
      // No window: today's games
      return this.games(league, { limit, compact, leagueId: query.leagueId });
    }

    const first = Number(seasonFrom);
    const last = Number(seasonTo);
    if (last < first) {
      throw ValidationErrors.failed({ seasonTo: "seasonTo must not be before seasonFrom" });
    }

    const fixtures: Fixture[] = [];
    for (let year = first; year <= last && fixtures.length < limit; year++) {
      const season = await this.provider.listFixtures(league, {
        season: String(year),
        leagueId: query.leagueId,
        timezone: "UTC",
        limit: limit - fixtures.length,
      });
      fixtures.push(...season);
    }
    return this.listing(league, fixtures.slice(0, limit), compact);
  }

  providerInfo(): ProviderInfo {
    return {
      sportsProvider: this.provider.name,
      apisportsKey: this.apiKeyConfigured ? "set" : "not-set",
    };
  }

  private listing(league: League, fixtures: Fixture[], compact: boolean): GamesListing {
    return {
      league,
      count: fixtures.length,
      games: compact ? fixtures.map(toCompactFixture) : fixtures,
    };
  }
}
