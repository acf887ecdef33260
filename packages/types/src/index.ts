/**
 * Shared TypeScript types for the picks monorepo.
 *
 * @example
 * import type { Pick, League } from "@picks/types";
 * import type { ApiResponse } from "@picks/types/api";
 */

export { LEAGUES, BET_TYPES, PERIODS } from "./sports";
export type {
  League,
  BetType,
  Period,
  MarketAlias,
  SportsProviderName,
  TeamRef,
  FixtureStatus,
  Fixture,
  CompactFixture,
  MoneylineOdds,
  SpreadOdds,
  TotalOdds,
  BookmakerRef,
  BookmakerSummary,
  NormalizedOdds,
  MarketSummary,
  HistoryRow,
  HistoryResult,
  ResolveCandidate,
  ResolveResult,
} from "./sports";

export type {
  OutcomeSide,
  TeamForm,
  ExpectedScore,
  SpreadBucket,
  OutcomeDistribution,
  OutcomeEvaluation,
  MarketEvaluation,
  MatchupEvaluation,
  Pick,
  SlateResult,
  Staking,
  PickGrade,
  GradedPick,
  BacktestBreakdown,
  BacktestSummary,
} from "./picks";

export type { ApiResponse, ErrorResponse, ApiError } from "./api";
