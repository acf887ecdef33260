import { describe, it, expect } from "vitest";
import {
  LEAGUE_PARAMS,
  LogisticScoreModel,
  PoissonScoreModel,
  createScoreModel,
  logistic,
} from "../../services/picks";

/**
 * Score Model Tests
 *
 * Margin/total probabilities for the logistic and Poisson models
 */

describe("logistic", () => {
  it("is 0.5 at zero and symmetric", () => {
    expect(logistic(0)).toBe(0.5);
    expect(logistic(1.3) + logistic(-1.3)).toBeCloseTo(1, 12);
  });
});

describe("LogisticScoreModel", () => {
  const even = new LogisticScoreModel(110, 110, 7, 10);

  it("gives evenly matched teams a 0.5 win probability", () => {
    expect(even.winProbabilities()).toEqual({ home: 0.5, away: 0.5, draw: 0 });
  });

  it("exposes expected margin and total", () => {
    const model = new LogisticScoreModel(112, 108, 7, 10);
    expect(model.expected).toEqual({ homeScore: 112, awayScore: 108, margin: 4, total: 220 });
  });

  it("has no push mass on half-point lines", () => {
    expect(even.marginEquals(3.5)).toBe(0);
    expect(even.totalEquals(219.5)).toBe(0);
    expect(even.marginAbove(-3.5)).toBeCloseTo(logistic(0.5), 12);
  });

  it("splits integer lines into above, push and below", () => {
    const above = even.marginAbove(0);
    const push = even.marginEquals(0);
    expect(push).toBeGreaterThan(0);
    expect(2 * above + push).toBeCloseTo(1, 12);
  });

  it("centres totals on the expected total", () => {
    expect(even.totalAbove(220)).toBeCloseTo(logistic(-0.05), 12);
    expect(even.totalEquals(220)).toBeCloseTo(logistic(0.05) - logistic(-0.05), 12);
  });

  it("scales scores linearly and spread by the square root", () => {
    const quarter = even.scaled(0.25);
    expect(quarter.expected.homeScore).toBe(27.5);
    expect(quarter.expected.total).toBe(55);
    // margin scale 7 * sqrt(0.25) = 3.5
    expect(quarter.marginAbove(-3.5)).toBeCloseTo(logistic(1), 12);
  });
});

describe("PoissonScoreModel", () => {
  const model = new PoissonScoreModel(1.5, 1.2, 10);

  it("returns win/draw/loss probabilities that sum to 1", () => {
    const { home, away, draw } = model.winProbabilities();
    expect(home + away + draw).toBeCloseTo(1, 10);
    expect(draw).toBeGreaterThan(0);
    expect(home).toBeGreaterThan(away);
  });

  it("matches the joint probability of a 0-0 draw", () => {
    expect(model.totalEquals(0)).toBeCloseTo(Math.exp(-2.7), 5);
  });

  it("treats margin above -0.5 as home win or draw", () => {
    const { home, draw } = model.winProbabilities();
    expect(model.marginAbove(-0.5)).toBeCloseTo(home + draw, 10);
  });

  it("keeps totals consistent across a line", () => {
    const over = model.totalAbove(2);
    const push = model.totalEquals(2);
    const under = 1 - over - push;
    expect(under).toBeCloseTo(model.totalEquals(0) + model.totalEquals(1), 10);
  });

  it("scales goal expectations for a half", () => {
    expect(model.scaled(0.5).expected).toEqual({
      homeScore: 0.75,
      awayScore: 0.6,
      margin: 0.75 - 0.6,
      total: 0.75 + 0.6,
    });
  });
});

describe("createScoreModel", () => {
  it("uses the logistic model for basketball and football", () => {
    expect(createScoreModel(LEAGUE_PARAMS.nba, 110, 108)).toBeInstanceOf(LogisticScoreModel);
    expect(createScoreModel(LEAGUE_PARAMS.nfl, 24, 20)).toBeInstanceOf(LogisticScoreModel);
  });

  it("uses the Poisson model for soccer with a floor on goal expectations", () => {
    const model = createScoreModel(LEAGUE_PARAMS.soccer, 0, 1.1);
    expect(model).toBeInstanceOf(PoissonScoreModel);
    expect(model.expected.homeScore).toBe(0.05);
  });
});
