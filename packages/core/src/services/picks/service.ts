/**
 * Picks Service
 *
 * Loads fixtures, recent results and odds from a sports data provider and
 * runs them through the Picks Engine.
 */

import { BET_TYPES } from "@picks/types";
import type {
  BetType,
  Fixture,
  League,
  MatchupEvaluation,
  NormalizedOdds,
  Pick,
  SlateResult,
} from "@picks/types";
import type { SportsDataProvider } from "../api-sports/provider";
import { getLogger, type Logger } from "../logger";
import { normalizeOdds } from "../odds";
import { SystemErrors, toPicksApiError } from "../errors";
import { addDays } from "../../utils/dates";
import { PicksEngine } from "./engine";
import { buildTeamForms } from "./ratings";

export interface SlateRequest {
  league: League;
  date: string;
  season?: string;
  betTypes?: readonly BetType[];
  leagueId?: number;
  bookmakerId?: number;
  minEdge?: number;
}

export interface EvaluateFixtureRequest {
  league: League;
  date: string;
  fixtureId: number;
  season?: string;
  leagueId?: number;
  bookmakerId?: number;
}

export interface SlateEvaluation {
  fixtures: Fixture[];
  evaluations: MatchupEvaluation[];
  picks: Pick[];
}

export interface PicksServiceOptions {
  provider: SportsDataProvider;
  engine?: PicksEngine;
  logger?: Logger;
}

const UNPLAYABLE = new Set(["postponed", "cancelled"]);

export class PicksService {
  private readonly provider: SportsDataProvider;
  private readonly engine: PicksEngine;
  private readonly logger: Logger;

  constructor(options: PicksServiceOptions) {
    this.provider = options.provider;
    this.engine = options.engine ?? new PicksEngine();
    this.logger = options.logger ?? getLogger().child({ service: "picks" });
  }

  /**
   * Picks for every fixture on a date
   */
  async buildSlate(request: SlateRequest): Promise<SlateResult> {
    const { fixtures, picks } = await this.evaluateSlate(request);
    return {
      league: request.league,
      date: request.date,
      fixtures: fixtures.length,
      picks,
    };
  }

  /**
   * Slate with the fixtures and evaluations behind each pick
   */
  async evaluateSlate(request: SlateRequest): Promise<SlateEvaluation> {
    const { league, date } = request;
    const betTypes = request.betTypes ?? BET_TYPES;
    const fixtures = await this.provider.listFixtures(league, {
      date,
      season: request.season,
      leagueId: request.leagueId,
    });

    const playable = fixtures.filter((fixture) => !UNPLAYABLE.has(fixture.status));
    if (playable.length === 0) {
      return { fixtures, evaluations: [], picks: [] };
    }

    const history = await this.loadHistory(request);
    const evaluations: MatchupEvaluation[] = [];
    const picks: Pick[] = [];

    // Sequential to stay inside upstream rate limits
    for (const fixture of playable) {
      const evaluation = await this.evaluateMatchup(fixture, history, request.bookmakerId);
      evaluations.push(evaluation);
      picks.push(...this.engine.toPicks(evaluation, betTypes, request.minEdge));
    }

    this.logger.info("Slate built", {
      league,
      date,
      fixtures: fixtures.length,
      picks: picks.length,
    });

    return { fixtures, evaluations, picks };
  }

  /**
   * Full distribution and market evaluations for one fixture
   */
  async evaluateFixture(request: EvaluateFixtureRequest): Promise<MatchupEvaluation> {
    const fixtures = await this.provider.listFixtures(request.league, {
      date: request.date,
      season: request.season,
      leagueId: request.leagueId,
    });
    const fixture = fixtures.find((candidate) => candidate.fixtureId === request.fixtureId);
    if (!fixture) {
      throw SystemErrors.fixtureNotFound(request.league, request.fixtureId, request.date);
    }

    const history = await this.loadHistory(request);
    return this.evaluateMatchup(fixture, history, request.bookmakerId);
  }

  /**
   * Finished games in the league's lookback window, ending the day before
   */
  private async loadHistory(request: {
    league: League;
    date: string;
    season?: string;
    leagueId?: number;
  }): Promise<Fixture[]> {
    const params = this.engine.paramsFor(request.league);
    const from = addDays(request.date, -params.lookbackDays);
    const to = addDays(request.date, -1);
    const fixtures = await this.provider.listFixtures(request.league, {
      from,
      to,
      season: request.season,
      leagueId: request.leagueId,
    });
    return fixtures.filter((fixture) => fixture.status === "finished");
  }

  private async evaluateMatchup(
    fixture: Fixture,
    history: readonly Fixture[],
    bookmakerId: number | undefined
  ): Promise<MatchupEvaluation> {
    const params = this.engine.paramsFor(fixture.league);
    const { homeForm, awayForm } = buildTeamForms(history, fixture, params);
    const odds = await this.loadOdds(fixture, bookmakerId);
    return this.engine.evaluate({ fixture, homeForm, awayForm, odds });
  }

  private async loadOdds(
    fixture: Fixture,
    bookmakerId: number | undefined
  ): Promise<NormalizedOdds | null> {
    try {
      const payload = await this.provider.oddsPayload(fixture.league, fixture.fixtureId);
      return normalizeOdds(payload, {
        preferredBookmakerId: bookmakerId,
        league: fixture.league,
      });
    } catch (error) {
      const apiError = toPicksApiError(error);
      this.logger.warn("Odds lookup failed; pricing without a market", {
        league: fixture.league,
        fixtureId: fixture.fixtureId,
        errorCode: apiError.code,
        errorMessage: apiError.message,
      });
      return null;
    }
  }
}
