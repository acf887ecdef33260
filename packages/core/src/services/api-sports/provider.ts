/**
 * Sports data providers
 *
 * Services depend on `SportsDataProvider`; `ApiSportsProvider` backs it with
 * the live API and `MockSportsProvider` with deterministic in-memory data.
 */

import type { Fixture, League, SportsProviderName } from "@picks/types";
import { getLogger, type Logger } from "../logger";
import type { ApiSportsClient } from "./client";
import { normalizeSeason, parseFixtures } from "./parse";
import type { ApiSportsEnvelope, FixtureQuery, QueryParams } from "./types";

export interface SportsDataProvider {
  readonly name: SportsProviderName;
  /** Whether upstream credentials are configured */
  readonly hasCredentials: boolean;

  /**
   * Fixtures for a single date, a from/to window, or a season.
   * A date wins over a window; a window wins over a season.
   */
  listFixtures(league: League, query: FixtureQuery): Promise<Fixture[]>;

  /** Raw `/odds` envelope for one fixture */
  oddsPayload(
    league: League,
    fixtureId: number,
    options?: { bookmaker?: number; bet?: number }
  ): Promise<ApiSportsEnvelope>;

  /** Raw `/injuries` envelope */
  injuries(league: League, params: QueryParams): Promise<ApiSportsEnvelope>;
}

export class ApiSportsProvider implements SportsDataProvider {
  readonly name = "apisports" as const;
  readonly hasCredentials = true;
  private readonly logger: Logger;

  constructor(
    private readonly client: ApiSportsClient,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger().child({ service: "api-sports-provider" });
  }

  async listFixtures(league: League, query: FixtureQuery): Promise<Fixture[]> {
    const season = normalizeSeason(league, query.season);
    const options = { season, leagueId: query.leagueId, timezone: query.timezone ?? "UTC" };

    let items: unknown[];
    if (query.date) {
      const date = query.date;
      items = await this.client.allPages(
        (page) => this.client.fixturesByDate(league, date, { ...options, page }),
        query.limit
      );
    } else if (query.from || query.to) {
      const from = query.from ?? query.to ?? "";
      const to = query.to ?? query.from ?? "";
      items = await this.client.allPages(
        (page) => this.client.fixturesRange(league, from, to, { ...options, page }),
        query.limit
      );
    } else if (season) {
      items = await this.client.allPages(
        (page) => this.client.fixturesBySeason(league, season, { ...options, page }),
        query.limit
      );
    } else {
      items = [];
    }

    const fixtures = parseFixtures(league, items);
    if (fixtures.length < items.length) {
      this.logger.debug("Skipped unparseable fixtures", {
        league,
        skipped: items.length - fixtures.length,
      });
    }
    return fixtures;
  }

  async oddsPayload(
    league: League,
    fixtureId: number,
    options: { bookmaker?: number; bet?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.client.oddsForFixture(league, fixtureId, options);
  }

  async injuries(league: League, params: QueryParams): Promise<ApiSportsEnvelope> {
    return this.client.injuries(league, params);
  }
}
