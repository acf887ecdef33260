/**
 * Picks Engine
 *
 * Prices a matchup from both teams' form: expected scores, an outcome
 * distribution, and model-vs-market evaluations for every supported bet type.
 */

import { BET_TYPES } from "@picks/types";
import type {
  BetType,
  Fixture,
  League,
  MarketEvaluation,
  MatchupEvaluation,
  NormalizedOdds,
  OutcomeDistribution,
  OutcomeEvaluation,
  OutcomeSide,
  Pick,
  SpreadBucket,
  TeamForm,
  TotalOdds,
} from "@picks/types";
import { oddsConverter } from "../odds";
import { LEAGUE_PARAMS } from "./params";
import type { LeagueModelParams } from "./params";
import { createScoreModel } from "./model";
import type { ScoreModel } from "./model";

export interface Matchup {
  fixture: Fixture;
  homeForm: TeamForm;
  awayForm: TeamForm;
  odds: NormalizedOdds | null;
}

interface OutcomeInput {
  side: OutcomeSide;
  selection: string;
  line: number | null;
  probability: number;
  push: number;
  price: number | null;
  implied: number | null;
}

/** Round to the nearest half point; never returns -0 */
export function roundHalf(value: number): number {
  return Math.round(value * 2) / 2 + 0;
}

export function formatLine(line: number): string {
  return line > 0 ? `+${line}` : String(line);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Vig-free implied probabilities for a market's prices.
 * A partially priced market falls back to the raw implied probability per price.
 */
export function marketImplied(prices: Array<number | null>): Array<number | null> {
  const complete = prices.every((price) => price !== null && price > 1);
  if (complete && prices.length > 1) {
    return oddsConverter.removeVig(
      prices.map((price) => (price === null ? 0 : oddsConverter.decimalImpliedProbability(price)))
    );
  }
  return prices.map((price) =>
    price !== null && price > 1 ? oddsConverter.decimalImpliedProbability(price) : null
  );
}

function evaluateOutcome(input: OutcomeInput): OutcomeEvaluation {
  const { probability, push, price, implied } = input;
  // Probability of winning given the bet does not push
  const conditional = push < 1 ? probability / (1 - push) : 0;

  let edge = 0;
  let expectedValue: number | null = null;
  let kellyFraction: number | null = null;

  if (price !== null && implied !== null) {
    edge = conditional - implied;
    expectedValue = probability * (price - 1) - (1 - probability - push);
    const b = price - 1;
    const q = 1 - conditional;
    kellyFraction = b > 0 ? Math.max(0, (b * conditional - q) / b) : 0;
  }

  return {
    side: input.side,
    selection: input.selection,
    line: input.line,
    modelProbability: probability,
    pushProbability: push,
    marketPrice: price,
    impliedProbability: implied,
    fairPrice: oddsConverter.probabilityToAmerican(conditional),
    edge,
    expectedValue,
    kellyFraction,
  };
}

function buildMarket(
  betType: BetType,
  line: number | null,
  inputs: Array<Omit<OutcomeInput, "implied">>
): MarketEvaluation {
  const implied = marketImplied(inputs.map((input) => input.price));
  const outcomes = inputs.map((input, i) => evaluateOutcome({ ...input, implied: implied[i] }));
  return {
    betType,
    line,
    hasMarket: outcomes.some((outcome) => outcome.marketPrice !== null),
    outcomes,
  };
}

export class PicksEngine {
  constructor(private readonly params: Record<League, LeagueModelParams> = LEAGUE_PARAMS) {}

  paramsFor(league: League): LeagueModelParams {
    return this.params[league];
  }

  /**
   * Expected home/away scores from each side's offense and the opponent's defense
   */
  scoreModel(league: League, homeForm: TeamForm, awayForm: TeamForm): ScoreModel {
    const params = this.params[league];
    const hfa = params.homeAdvantage / 2;
    const home = (homeForm.off + awayForm.def) / 2 + hfa;
    const away = (awayForm.off + homeForm.def) / 2 - hfa;
    return createScoreModel(params, Math.max(home, 0), Math.max(away, 0));
  }

  distribution(model: ScoreModel, params: LeagueModelParams): OutcomeDistribution {
    const wins = model.winProbabilities();
    return {
      moneyline: {
        home: wins.home,
        away: wins.away,
        draw: params.allowsDraw ? wins.draw : 0,
      },
      spreadBuckets: this.spreadBuckets(model, params.spreadBuckets),
      expected: model.expected,
    };
  }

  /**
   * Probability mass of the home margin between consecutive bucket edges.
   * Buckets are (lower, upper]; the first and last are open-ended.
   */
  spreadBuckets(model: ScoreModel, edges: readonly number[]): SpreadBucket[] {
    const buckets: SpreadBucket[] = [];
    const bounds: Array<number | null> = [null, ...edges, null];

    for (let i = 0; i < bounds.length - 1; i++) {
      const lower = bounds[i];
      const upper = bounds[i + 1];
      const aboveLower = lower === null ? 1 : model.marginAbove(lower);
      const aboveUpper = upper === null ? 0 : model.marginAbove(upper);

      let label: string;
      if (lower === null) label = `<= ${upper}`;
      else if (upper === null) label = `> ${lower}`;
      else label = `${lower} to ${upper}`;

      buckets.push({
        label,
        lower,
        upper,
        probability: clamp01(aboveLower - aboveUpper),
      });
    }
    return buckets;
  }

  /**
   * Full evaluation of a matchup
   */
  evaluate(matchup: Matchup): MatchupEvaluation {
    const { fixture, homeForm, awayForm, odds } = matchup;
    const params = this.params[fixture.league];
    const model = this.scoreModel(fixture.league, homeForm, awayForm);

    const markets: MarketEvaluation[] = [
      this.moneyline(fixture, model, params, odds),
      this.spread(fixture, model, odds),
      this.total("total", model, odds?.total ?? null),
      this.total("half_total", model.scaled(params.periodFractions["1h"]), odds?.halfTotal ?? null),
    ];

    const quarter = params.periodFractions["1q"];
    if (quarter !== null) {
      markets.push(this.total("quarter_total", model.scaled(quarter), odds?.quarterTotal ?? null));
    }

    return {
      fixture,
      homeForm,
      awayForm,
      distribution: this.distribution(model, params),
      markets,
      odds,
    };
  }

  private moneyline(
    fixture: Fixture,
    model: ScoreModel,
    params: LeagueModelParams,
    odds: NormalizedOdds | null
  ): MarketEvaluation {
    const wins = model.winProbabilities();
    const prices = odds?.moneyline ?? null;
    const inputs: Array<Omit<OutcomeInput, "implied">> = [
      {
        side: "home",
        selection: fixture.home.name,
        line: null,
        probability: wins.home,
        push: 0,
        price: prices?.home ?? null,
      },
      {
        side: "away",
        selection: fixture.away.name,
        line: null,
        probability: wins.away,
        push: 0,
        price: prices?.away ?? null,
      },
    ];
    if (params.allowsDraw) {
      inputs.push({
        side: "draw",
        selection: "Draw",
        line: null,
        probability: wins.draw,
        push: 0,
        price: prices?.draw ?? null,
      });
    }
    return buildMarket("moneyline", null, inputs);
  }

  private spread(fixture: Fixture, model: ScoreModel, odds: NormalizedOdds | null): MarketEvaluation {
    const market = odds?.spread ?? null;
    // Home handicap: home covers when margin + line > 0
    const line = market ? market.line : roundHalf(-model.expected.margin);
    const home = clamp01(model.marginAbove(-line));
    const push = clamp01(model.marginEquals(-line));
    const awayLine = -line + 0;

    return buildMarket("spread", line, [
      {
        side: "home",
        selection: `${fixture.home.name} ${formatLine(line)}`,
        line,
        probability: home,
        push,
        price: market?.homePrice ?? null,
      },
      {
        side: "away",
        selection: `${fixture.away.name} ${formatLine(awayLine)}`,
        line: awayLine,
        probability: clamp01(1 - home - push),
        push,
        price: market?.awayPrice ?? null,
      },
    ]);
  }

  private total(betType: BetType, model: ScoreModel, market: TotalOdds | null): MarketEvaluation {
    const line = market ? market.line : roundHalf(model.expected.total);
    const over = clamp01(model.totalAbove(line));
    const push = clamp01(model.totalEquals(line));

    return buildMarket(betType, line, [
      {
        side: "over",
        selection: `Over ${line}`,
        line,
        probability: over,
        push,
        price: market?.over ?? null,
      },
      {
        side: "under",
        selection: `Under ${line}`,
        line,
        probability: clamp01(1 - over - push),
        push,
        price: market?.under ?? null,
      },
    ]);
  }

  /**
   * One pick per requested bet type: the highest-edge priced outcome, or the
   * most probable outcome when the market is not offered.
   */
  toPicks(
    evaluation: MatchupEvaluation,
    betTypes: readonly BetType[] = BET_TYPES,
    minEdge?: number
  ): Pick[] {
    const picks: Pick[] = [];

    for (const market of evaluation.markets) {
      if (!betTypes.includes(market.betType)) continue;

      const priced = market.outcomes.filter((outcome) => outcome.marketPrice !== null);
      const pool = priced.length > 0 ? priced : market.outcomes;
      const score = (outcome: OutcomeEvaluation) =>
        priced.length > 0 ? outcome.edge : outcome.modelProbability;

      let best: OutcomeEvaluation | null = null;
      for (const outcome of pool) {
        if (best === null || score(outcome) > score(best)) best = outcome;
      }
      if (best === null) continue;
      if (minEdge !== undefined && best.edge < minEdge) continue;

      const conditional =
        best.pushProbability < 1 ? best.modelProbability / (1 - best.pushProbability) : 0;
      const decimalPrice = best.marketPrice ?? oddsConverter.probabilityToDecimal(conditional);
      let price: number | null = null;
      if (best.marketPrice !== null) {
        price = oddsConverter.decimalToAmerican(best.marketPrice);
      } else if (best.fairPrice !== 0) {
        price = best.fairPrice;
      }

      picks.push({
        fixtureId: evaluation.fixture.fixtureId,
        league: evaluation.fixture.league,
        betType: market.betType,
        selection: best.selection,
        side: best.side,
        line: best.line,
        price,
        decimalPrice,
        winProb: best.modelProbability,
        impliedProb: best.impliedProbability,
        edge: best.edge,
        expectedValue: best.expectedValue,
        kellyFraction: best.kellyFraction,
        hasMarket: best.marketPrice !== null,
      });
    }

    return picks;
  }
}
