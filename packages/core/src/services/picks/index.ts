/**
 * Picks Engine
 *
 * @example
 * ```typescript
 * import { PicksService } from '@picks/core/services/picks';
 *
 * const picks = new PicksService({ provider });
 * const slate = await picks.buildSlate({ league: 'nba', date: '2025-01-15', minEdge: 0.02 });
 * ```
 */

export { LEAGUE_PARAMS } from "./params";
export type { LeagueModelParams, ScoreModelKind } from "./params";

export {
  LogisticScoreModel,
  PoissonScoreModel,
  createScoreModel,
  expectedScore,
  logistic,
} from "./model";
export type { ScoreModel, WinProbabilities } from "./model";

export { computeEfficiency, shrinkForm, buildTeamForms, emptyForm } from "./ratings";

export { PicksEngine, marketImplied, roundHalf, formatLine } from "./engine";
export type { Matchup } from "./engine";

export { PicksService } from "./service";
export type {
  SlateRequest,
  SlateEvaluation,
  EvaluateFixtureRequest,
  PicksServiceOptions,
} from "./service";

export { BacktestService, gradePick, MAX_BACKTEST_DAYS } from "./backtest";
export type { BacktestRequest } from "./backtest";
