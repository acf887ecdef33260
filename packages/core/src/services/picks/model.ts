/**
 * Score models
 *
 * A score model turns expected home/away scores into probabilities over the
 * final margin (home minus away) and the combined total.
 */

import type { ExpectedScore } from "@picks/types";
import type { LeagueModelParams } from "./params";

export interface WinProbabilities {
  home: number;
  away: number;
  draw: number;
}

export interface ScoreModel {
  readonly expected: ExpectedScore;
  winProbabilities(): WinProbabilities;
  /** P(home - away > line) */
  marginAbove(line: number): number;
  /** P(home - away = line); 0 for half-point lines */
  marginEquals(line: number): number;
  /** P(home + away > line) */
  totalAbove(line: number): number;
  /** P(home + away = line); 0 for half-point lines */
  totalEquals(line: number): number;
  /** Same model over a share of the game (halves, quarters) */
  scaled(fraction: number): ScoreModel;
}

export function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export function expectedScore(homeScore: number, awayScore: number): ExpectedScore {
  return {
    homeScore,
    awayScore,
    margin: homeScore - awayScore,
    total: homeScore + awayScore,
  };
}

// ============================================================================
// Logistic
// ============================================================================

/**
 * Margin and total follow logistic distributions centred on the expected
 * values. Integer lines use a half-point continuity correction, so the mass
 * within half a point of the line is the push probability.
 */
export class LogisticScoreModel implements ScoreModel {
  readonly expected: ExpectedScore;

  constructor(
    homeScore: number,
    awayScore: number,
    private readonly marginScale: number,
    private readonly totalScale: number
  ) {
    this.expected = expectedScore(homeScore, awayScore);
  }

  private above(mean: number, scale: number, line: number): number {
    const edge = Number.isInteger(line) ? line + 0.5 : line;
    return logistic((mean - edge) / scale);
  }

  private equals(mean: number, scale: number, line: number): number {
    if (!Number.isInteger(line)) return 0;
    return logistic((mean - (line - 0.5)) / scale) - logistic((mean - (line + 0.5)) / scale);
  }

  winProbabilities(): WinProbabilities {
    const home = logistic(this.expected.margin / this.marginScale);
    return { home, away: 1 - home, draw: 0 };
  }

  marginAbove(line: number): number {
    return this.above(this.expected.margin, this.marginScale, line);
  }

  marginEquals(line: number): number {
    return this.equals(this.expected.margin, this.marginScale, line);
  }

  totalAbove(line: number): number {
    return this.above(this.expected.total, this.totalScale, line);
  }

  totalEquals(line: number): number {
    return this.equals(this.expected.total, this.totalScale, line);
  }

  scaled(fraction: number): ScoreModel {
    const spread = Math.sqrt(fraction);
    return new LogisticScoreModel(
      this.expected.homeScore * fraction,
      this.expected.awayScore * fraction,
      this.marginScale * spread,
      this.totalScale * spread
    );
  }
}

// ============================================================================
// Poisson
// ============================================================================

function poissonPmf(lambda: number, maxGoals: number): number[] {
  const pmf: number[] = [];
  let p = Math.exp(-lambda);
  for (let k = 0; k <= maxGoals; k++) {
    pmf.push(p);
    p = (p * lambda) / (k + 1);
  }
  return pmf;
}

/**
 * Independent Poisson goals for each side on a truncated grid,
 * renormalized so the grid sums to 1.
 */
export class PoissonScoreModel implements ScoreModel {
  readonly expected: ExpectedScore;
  private readonly grid: number[][];

  constructor(
    homeGoals: number,
    awayGoals: number,
    private readonly maxGoals: number
  ) {
    this.expected = expectedScore(homeGoals, awayGoals);
    const home = poissonPmf(homeGoals, maxGoals);
    const away = poissonPmf(awayGoals, maxGoals);

    let mass = 0;
    const grid = home.map((ph) =>
      away.map((pa) => {
        mass += ph * pa;
        return ph * pa;
      })
    );
    this.grid = grid.map((row) => row.map((p) => p / mass));
  }

  private sum(predicate: (home: number, away: number) => boolean): number {
    let total = 0;
    for (let h = 0; h < this.grid.length; h++) {
      const row = this.grid[h];
      for (let a = 0; a < row.length; a++) {
        if (predicate(h, a)) total += row[a];
      }
    }
    return total;
  }

  winProbabilities(): WinProbabilities {
    return {
      home: this.sum((h, a) => h > a),
      away: this.sum((h, a) => h < a),
      draw: this.sum((h, a) => h === a),
    };
  }

  marginAbove(line: number): number {
    return this.sum((h, a) => h - a > line);
  }

  marginEquals(line: number): number {
    return this.sum((h, a) => h - a === line);
  }

  totalAbove(line: number): number {
    return this.sum((h, a) => h + a > line);
  }

  totalEquals(line: number): number {
    return this.sum((h, a) => h + a === line);
  }

  scaled(fraction: number): ScoreModel {
    return new PoissonScoreModel(
      this.expected.homeScore * fraction,
      this.expected.awayScore * fraction,
      this.maxGoals
    );
  }
}

/**
 * Score model for a league from expected home/away scores
 */
export function createScoreModel(
  params: LeagueModelParams,
  homeScore: number,
  awayScore: number
): ScoreModel {
  if (params.kind === "poisson") {
    return new PoissonScoreModel(
      Math.max(homeScore, 0.05),
      Math.max(awayScore, 0.05),
      params.maxGoals
    );
  }
  return new LogisticScoreModel(homeScore, awayScore, params.marginScale, params.totalScale);
}
