/**
 * Per-league model parameters
 */

import type { League } from "@picks/types";

export type ScoreModelKind = "logistic" | "poisson";

export interface LeagueModelParams {
  kind: ScoreModelKind;
  /** League mean points (goals) per team per game */
  baseline: number;
  /** Home margin advantage in points (goals) */
  homeAdvantage: number;
  /** Logistic scale of the final margin */
  marginScale: number;
  /** Logistic scale of the combined total */
  totalScale: number;
  /** Home-margin bucket edges, ascending */
  spreadBuckets: number[];
  /** Share of full-game scoring in each priced period; null when the period is not played */
  periodFractions: { "1h": number; "1q": number | null };
  /** Games of league-average form blended into each team's rating */
  priorGames: number;
  /** Days of finished games used for ratings */
  lookbackDays: number;
  /** Regulation draws settle moneyline bets */
  allowsDraw: boolean;
  /** Poisson grid bound per team */
  maxGoals: number;
}

export const LEAGUE_PARAMS: Record<League, LeagueModelParams> = {
  nba: {
    kind: "logistic",
    baseline: 114,
    homeAdvantage: 2.5,
    marginScale: 7.0,
    totalScale: 10,
    spreadBuckets: [-15, -10, -5, 0, 5, 10, 15],
    periodFractions: { "1h": 0.5, "1q": 0.25 },
    priorGames: 5,
    lookbackDays: 30,
    allowsDraw: false,
    maxGoals: 0,
  },
  ncaab: {
    kind: "logistic",
    baseline: 72,
    homeAdvantage: 3,
    marginScale: 6,
    totalScale: 7.5,
    spreadBuckets: [-15, -10, -5, 0, 5, 10, 15],
    periodFractions: { "1h": 0.48, "1q": null },
    priorGames: 5,
    lookbackDays: 30,
    allowsDraw: false,
    maxGoals: 0,
  },
  nfl: {
    kind: "logistic",
    baseline: 22,
    homeAdvantage: 1.5,
    marginScale: 7.4,
    totalScale: 7.2,
    spreadBuckets: [-14, -7, -3, 0, 3, 7, 14],
    periodFractions: { "1h": 0.5, "1q": 0.23 },
    priorGames: 3,
    lookbackDays: 70,
    allowsDraw: false,
    maxGoals: 0,
  },
  ncaaf: {
    kind: "logistic",
    baseline: 28,
    homeAdvantage: 2.5,
    marginScale: 8.8,
    totalScale: 8.8,
    spreadBuckets: [-21, -14, -7, 0, 7, 14, 21],
    periodFractions: { "1h": 0.5, "1q": 0.24 },
    priorGames: 3,
    lookbackDays: 70,
    allowsDraw: false,
    maxGoals: 0,
  },
  soccer: {
    kind: "poisson",
    baseline: 1.35,
    homeAdvantage: 0.3,
    marginScale: 0,
    totalScale: 0,
    spreadBuckets: [-1.5, -0.5, 0.5, 1.5],
    periodFractions: { "1h": 0.45, "1q": null },
    priorGames: 4,
    lookbackDays: 90,
    allowsDraw: true,
    maxGoals: 10,
  },
};
