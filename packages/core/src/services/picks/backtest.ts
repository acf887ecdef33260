/**
 * Backtest
 *
 * Replays daily slates over a date range and grades each pick against the
 * final score of its fixture.
 */

import type {
  BacktestBreakdown,
  BacktestSummary,
  BetType,
  Fixture,
  GradedPick,
  League,
  Pick,
  PickGrade,
  Staking,
} from "@picks/types";
import { ValidationErrors } from "../errors";
import { getLogger, type Logger } from "../logger";
import { daysInRange, eachDay, parseIsoDate } from "../../utils/dates";
import type { PicksService } from "./service";

export const MAX_BACKTEST_DAYS = 62;

export interface BacktestRequest {
  league: League;
  startDate: string;
  endDate: string;
  season?: string;
  betTypes?: readonly BetType[];
  minEdge?: number;
  staking?: Staking;
  leagueId?: number;
  bookmakerId?: number;
  /** Flat stake per pick */
  unitStake?: number;
  /** Bankroll Kelly fractions are sized against */
  bankroll?: number;
  /** Scale applied to the Kelly fraction; 0.5 is half Kelly */
  kellyMultiplier?: number;
}

/**
 * Settle a pick against a final score: margin and total from the side's view
 */
export function gradePick(pick: Pick, fixture: Fixture | undefined): PickGrade {
  if (!fixture || fixture.status !== "finished") return "ungraded";
  if (fixture.homeScore === null || fixture.awayScore === null) return "ungraded";

  const margin = fixture.homeScore - fixture.awayScore;
  const total = fixture.homeScore + fixture.awayScore;

  let result: number;
  switch (pick.betType) {
    case "moneyline":
      if (pick.side === "draw") return margin === 0 ? "win" : "loss";
      if (margin === 0) return pick.league === "soccer" ? "loss" : "push";
      result = pick.side === "home" ? margin : -margin;
      break;
    case "spread":
      if (pick.line === null) return "ungraded";
      result = (pick.side === "home" ? margin : -margin) + pick.line;
      break;
    case "total":
      if (pick.line === null) return "ungraded";
      result = pick.side === "over" ? total - pick.line : pick.line - total;
      break;
    default:
      // Period scores are not part of the fixture record
      return "ungraded";
  }

  if (result > 0) return "win";
  if (result < 0) return "loss";
  return "push";
}

function emptyBreakdown(): BacktestBreakdown {
  return { picks: 0, wins: 0, losses: 0, pushes: 0, profit: 0 };
}

export class BacktestService {
  private readonly logger: Logger;

  constructor(
    private readonly picks: PicksService,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger().child({ service: "backtest" });
  }

  validateRange(startDate: string, endDate: string): number {
    if (parseIsoDate(startDate) === null || parseIsoDate(endDate) === null) {
      throw ValidationErrors.invalidDateRange(startDate, endDate, "Dates must be YYYY-MM-DD.");
    }
    const days = daysInRange(startDate, endDate);
    if (days === 0) {
      throw ValidationErrors.invalidDateRange(startDate, endDate, "endDate is before startDate.");
    }
    if (days > MAX_BACKTEST_DAYS) {
      throw ValidationErrors.invalidDateRange(
        startDate,
        endDate,
        `Range exceeds ${MAX_BACKTEST_DAYS} days.`
      );
    }
    return days;
  }

  async run(request: BacktestRequest): Promise<BacktestSummary> {
    const days = this.validateRange(request.startDate, request.endDate);
    const staking = request.staking ?? "flat";
    const unitStake = request.unitStake ?? 1;
    const bankroll = request.bankroll ?? 100;
    const kellyMultiplier = request.kellyMultiplier ?? 0.5;

    const results: GradedPick[] = [];

    for (const date of eachDay(request.startDate, request.endDate)) {
      const slate = await this.picks.evaluateSlate({
        league: request.league,
        date,
        season: request.season,
        betTypes: request.betTypes,
        minEdge: request.minEdge,
        leagueId: request.leagueId,
        bookmakerId: request.bookmakerId,
      });
      const byId = new Map(slate.fixtures.map((fixture) => [fixture.fixtureId, fixture]));

      for (const pick of slate.picks) {
        const grade = pick.hasMarket ? gradePick(pick, byId.get(pick.fixtureId)) : "ungraded";
        const stake =
          grade === "ungraded"
            ? 0
            : staking === "kelly"
              ? bankroll * (pick.kellyFraction ?? 0) * kellyMultiplier
              : unitStake;

        let profit = 0;
        if (grade === "win" && pick.decimalPrice !== null) profit = stake * (pick.decimalPrice - 1);
        else if (grade === "loss") profit = -stake;

        results.push({ ...pick, date, grade, stake, profit });
      }
    }

    const summary = this.summarize(request, days, results);
    this.logger.info("Backtest complete", {
      league: request.league,
      startDate: request.startDate,
      endDate: request.endDate,
      picks: summary.picks,
      graded: summary.graded,
      profit: summary.profit,
    });
    return summary;
  }

  private summarize(
    request: BacktestRequest,
    days: number,
    results: GradedPick[]
  ): BacktestSummary {
    let wins = 0;
    let losses = 0;
    let pushes = 0;
    let staked = 0;
    let profit = 0;
    let sumEv = 0;
    const byBetType: Partial<Record<BetType, BacktestBreakdown>> = {};

    for (const result of results) {
      sumEv += result.expectedValue ?? 0;
      const breakdown = byBetType[result.betType] ?? emptyBreakdown();
      byBetType[result.betType] = breakdown;
      breakdown.picks++;

      if (result.grade === "ungraded") continue;
      staked += result.stake;
      profit += result.profit;
      breakdown.profit += result.profit;

      if (result.grade === "win") {
        wins++;
        breakdown.wins++;
      } else if (result.grade === "loss") {
        losses++;
        breakdown.losses++;
      } else {
        pushes++;
        breakdown.pushes++;
      }
    }

    const decided = wins + losses;
    return {
      league: request.league,
      range: [request.startDate, request.endDate],
      days,
      picks: results.length,
      graded: wins + losses + pushes,
      wins,
      losses,
      pushes,
      hitRate: decided > 0 ? wins / decided : null,
      staked,
      profit,
      roi: staked > 0 ? profit / staked : null,
      sumEv,
      byBetType,
      results,
    };
  }
}
