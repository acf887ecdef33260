/**
 * Test Data Fixtures
 * Fixture and odds builders shared across tests
 */

import type { Fixture, League, NormalizedOdds, TeamRef } from "@picks/types";

// ===========================================================================
// Teams
// ===========================================================================

export const teams = {
  herons: { id: 101, name: "Harbor City Herons", code: "HCH" },
  lynx: { id: 102, name: "Lakeview Lynx", code: "LVL" },
  peaks: { id: 103, name: "Summit Peaks", code: "SUM" },
  rapids: { id: 104, name: "Riverside Rapids", code: "RIV" },
} satisfies Record<string, TeamRef>;

// ===========================================================================
// Fixtures
// ===========================================================================

let nextId = 9000;

export function makeFixture(overrides: Partial<Fixture> = {}): Fixture {
  return {
    fixtureId: nextId++,
    league: "nba",
    date: "2025-01-15T00:30:00+00:00",
    status: "scheduled",
    statusCode: "NS",
    home: teams.herons,
    away: teams.lynx,
    homeScore: null,
    awayScore: null,
    ...overrides,
  };
}

export function finished(
  home: TeamRef,
  away: TeamRef,
  homeScore: number,
  awayScore: number,
  league: League = "nba"
): Fixture {
  return makeFixture({
    league,
    home,
    away,
    homeScore,
    awayScore,
    status: "finished",
    statusCode: "FT",
  });
}

// ===========================================================================
// Odds
// ===========================================================================

export function makeOdds(overrides: Partial<NormalizedOdds> = {}): NormalizedOdds {
  return {
    bookmaker: { id: 1, name: "Test Book" },
    moneyline: { home: 1.91, away: 1.91, draw: null },
    spread: { line: -3.5, homePrice: 1.91, awayPrice: 1.91 },
    total: { line: 220.5, over: 1.91, under: 1.91 },
    halfTotal: null,
    quarterTotal: null,
    ...overrides,
  };
}
