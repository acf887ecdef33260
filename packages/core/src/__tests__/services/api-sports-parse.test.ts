import { describe, it, expect } from "vitest";
import {
  MockSportsProvider,
  mapStatus,
  normalizeSeason,
  parseFixture,
  parseFixtures,
  scoreTotal,
  toCompactFixture,
} from "../../services/api-sports";
import { normalizeOdds } from "../../services/odds";

/**
 * Payload Parsing Tests
 */

describe("mapStatus", () => {
  it("maps provider status codes", () => {
    expect(mapStatus("FT")).toBe("finished");
    expect(mapStatus("aot")).toBe("finished");
    expect(mapStatus("NS")).toBe("scheduled");
    expect(mapStatus("PST")).toBe("postponed");
    expect(mapStatus("CANC")).toBe("cancelled");
    expect(mapStatus("Q3")).toBe("live");
    expect(mapStatus("WAT")).toBe("unknown");
    expect(mapStatus(null)).toBe("unknown");
  });
});

describe("scoreTotal", () => {
  it("reads plain, string and nested totals", () => {
    expect(scoreTotal(3)).toBe(3);
    expect(scoreTotal("21")).toBe(21);
    expect(scoreTotal({ quarter_1: 7, total: 24 })).toBe(24);
    expect(scoreTotal({ total: null })).toBeNull();
    expect(scoreTotal("")).toBeNull();
  });
});

describe("parseFixture", () => {
  it("parses american-football games", () => {
    const fixture = parseFixture("nfl", {
      game: {
        id: "3301",
        date: { date: "2024-11-10", time: "18:00", timestamp: null },
        status: { short: "NS" },
      },
      teams: { home: { id: 301, name: "Metro Ironclads" }, away: { id: 302, name: "Prairie Stallions" } },
      scores: { home: { total: null }, away: { total: null } },
    });

    expect(fixture).toEqual({
      fixtureId: 3301,
      league: "nfl",
      date: "2024-11-10T18:00:00.000Z",
      status: "scheduled",
      statusCode: "NS",
      home: { id: 301, name: "Metro Ironclads", code: null },
      away: { id: 302, name: "Prairie Stallions", code: null },
      homeScore: null,
      awayScore: null,
    });
  });

  it("parses soccer fixtures", () => {
    const fixture = parseFixture("soccer", {
      fixture: { id: 881, date: "2025-01-18T15:00:00+00:00", status: { short: "FT" } },
      teams: { home: { id: 501, name: "Harbourside FC" }, away: { id: 502, name: "Ashford United" } },
      goals: { home: 2, away: 2 },
    });

    expect(fixture).toMatchObject({ fixtureId: 881, status: "finished", homeScore: 2, awayScore: 2 });
  });

  it("falls back to placeholder team names", () => {
    const fixture = parseFixture("nba", { id: 7, teams: { home: null, away: { name: "" } } });
    expect(fixture?.home).toEqual({ id: null, name: "Home", code: null });
    expect(fixture?.away.name).toBe("Away");
    expect(fixture?.date).toBe("");
  });

  it("drops items no shape fits", () => {
    expect(parseFixture("nba", { name: "not a game" })).toBeNull();
    expect(parseFixtures("nba", [{ id: 1 }, "junk", null])).toHaveLength(1);
  });
});

describe("normalizeSeason", () => {
  it("keeps the starting year for basketball", () => {
    expect(normalizeSeason("nba", "2024-2025")).toBe("2024");
    expect(normalizeSeason("nfl", 2024)).toBe("2024");
    expect(normalizeSeason("soccer", " 2023 ")).toBe("2023");
    expect(normalizeSeason("nba", "")).toBeUndefined();
    expect(normalizeSeason("nba", undefined)).toBeUndefined();
  });
});

describe("toCompactFixture", () => {
  it("keeps id, date and team names", () => {
    const [fixture] = parseFixtures("nba", [
      {
        id: 12,
        date: "2025-01-15T00:30:00+00:00",
        teams: { home: { id: 1, name: "Harbor City Herons", code: "HCH" }, away: { id: 2, name: "Lakeview Lynx" } },
      },
    ]);
    expect(toCompactFixture(fixture)).toEqual({
      fixtureId: 12,
      date: "2025-01-15T00:30:00+00:00",
      home: { name: "Harbor City Herons", code: "HCH" },
      away: { name: "Lakeview Lynx", code: null },
    });
  });
});

// ===========================================================================
// Mock provider
// ===========================================================================

describe("MockSportsProvider", () => {
  const now = Date.parse("2025-01-15T12:00:00Z");
  const provider = new MockSportsProvider({ now: () => now });

  it("serves three fixtures per day with scores once final", async () => {
    const past = await provider.listFixtures("nba", { date: "2025-01-14" });
    const future = await provider.listFixtures("nba", { date: "2025-01-16" });

    expect(past).toHaveLength(3);
    expect(past.every((fixture) => fixture.status === "finished")).toBe(true);
    expect(past.every((fixture) => fixture.homeScore !== null && fixture.homeScore >= 100)).toBe(true);
    expect(future.every((fixture) => fixture.status === "scheduled" && fixture.homeScore === null)).toBe(true);
  });

  it("is deterministic", async () => {
    const first = await provider.listFixtures("nfl", { from: "2025-01-01", to: "2025-01-03" });
    const second = await provider.listFixtures("nfl", { from: "2025-01-01", to: "2025-01-03" });
    expect(first).toHaveLength(9);
    expect(second).toEqual(first);
    expect(first[0].date).toBe("2025-01-01T17:00:00.000Z");
  });

  it("honours limits and rejects reversed windows", async () => {
    expect(await provider.listFixtures("soccer", { from: "2025-01-01", to: "2025-01-10", limit: 4 })).toHaveLength(4);
    expect(await provider.listFixtures("soccer", { from: "2025-01-10", to: "2025-01-01" })).toEqual([]);
  });

  it("prices its fixtures through the normal odds path", async () => {
    const [fixture] = await provider.listFixtures("soccer", { date: "2025-01-16" });
    const odds = normalizeOdds(await provider.oddsPayload("soccer", fixture.fixtureId), {
      league: "soccer",
    });

    expect(odds.bookmaker).toEqual({ id: 1, name: "Mock Sportsbook" });
    expect(odds.moneyline).toEqual({ home: 2.1, away: 3.4, draw: 3.3 });
    expect(odds.spread).toEqual({ line: -0.5, homePrice: 1.91, awayPrice: 1.91 });
    expect(odds.total).toEqual({ line: 2.5, over: 1.91, under: 1.91 });
    expect(odds.halfTotal).toEqual({ line: 1.5, over: 1.87, under: 1.95 });
    expect(odds.quarterTotal).toBeNull();
  });

  it("filters odds by bookmaker and returns nothing for unknown fixtures", async () => {
    const [fixture] = await provider.listFixtures("nba", { date: "2025-01-16" });
    const payload = await provider.oddsPayload("nba", fixture.fixtureId, { bookmaker: 2 });
    expect(normalizeOdds(payload, { league: "nba" }).bookmaker).toEqual({ id: 2, name: "Mock Exchange" });

    expect((await provider.oddsPayload("nba", 42)).results).toBe(0);
  });
});
