/**
 * Picks Types
 * Outcome distributions, market evaluations and derived picks
 */

import type { BetType, Fixture, League, NormalizedOdds } from "./sports";

export type OutcomeSide = "home" | "away" | "draw" | "over" | "under";

/** Points (or goals) per game for one team over the lookback window */
export interface TeamForm {
  games: number;
  off: number;
  def: number;
  net: number;
}

export interface ExpectedScore {
  homeScore: number;
  awayScore: number;
  /** Home minus away */
  margin: number;
  total: number;
}

export interface SpreadBucket {
  label: string;
  /** Exclusive lower bound on the home margin, null for open */
  lower: number | null;
  /** Inclusive upper bound on the home margin, null for open */
  upper: number | null;
  probability: number;
}

export interface OutcomeDistribution {
  moneyline: { home: number; away: number; draw: number };
  spreadBuckets: SpreadBucket[];
  expected: ExpectedScore;
}

export interface OutcomeEvaluation {
  side: OutcomeSide;
  selection: string;
  line: number | null;
  modelProbability: number;
  pushProbability: number;
  /** Decimal price offered by the bookmaker */
  marketPrice: number | null;
  /** Vig-free probability implied by the market */
  impliedProbability: number | null;
  /** American fair price from the model */
  fairPrice: number;
  edge: number;
  expectedValue: number | null;
  kellyFraction: number | null;
}

export interface MarketEvaluation {
  betType: BetType;
  line: number | null;
  hasMarket: boolean;
  outcomes: OutcomeEvaluation[];
}

export interface MatchupEvaluation {
  fixture: Fixture;
  homeForm: TeamForm;
  awayForm: TeamForm;
  distribution: OutcomeDistribution;
  markets: MarketEvaluation[];
  odds: NormalizedOdds | null;
}

export interface Pick {
  fixtureId: number;
  league: League;
  betType: BetType;
  selection: string;
  side: OutcomeSide;
  line: number | null;
  /** American price: the market's when offered, otherwise the model's fair price */
  price: number | null;
  decimalPrice: number | null;
  winProb: number;
  impliedProb: number | null;
  /** Model probability minus the vig-free market probability */
  edge: number;
  expectedValue: number | null;
  kellyFraction: number | null;
  hasMarket: boolean;
}

export interface SlateResult {
  league: League;
  date: string;
  fixtures: number;
  picks: Pick[];
}

// ============================================================================
// Backtest
// ============================================================================

export type Staking = "flat" | "kelly";
export type PickGrade = "win" | "loss" | "push" | "ungraded";

export interface GradedPick extends Pick {
  date: string;
  grade: PickGrade;
  stake: number;
  profit: number;
}

export interface BacktestBreakdown {
  picks: number;
  wins: number;
  losses: number;
  pushes: number;
  profit: number;
}

export interface BacktestSummary {
  league: League;
  range: [string, string];
  days: number;
  picks: number;
  graded: number;
  wins: number;
  losses: number;
  pushes: number;
  hitRate: number | null;
  staked: number;
  profit: number;
  roi: number | null;
  sumEv: number;
  byBetType: Partial<Record<BetType, BacktestBreakdown>>;
  results: GradedPick[];
}
