import { describe, it, expect, vi } from "vitest";
import type { Services } from "../../lib/services";
import { FIRST_NBA_FIXTURE, at, createTestServices } from "../helpers";

/**
 * Data Routes Tests
 *
 * Injuries, history, odds, resolution and the debug listings
 */

const services: Services = createTestServices();

vi.mock("../../lib/services", () => ({
  getServices: () => services,
}));

// Import after mocks are set up
const { app } = await import("../../index");

// ===========================================================================
// Injuries
// ===========================================================================

describe("GET /data/injuries", () => {
  it("is not offered for the NBA", async () => {
    const res = await app.request("/data/injuries?league=nba");
    const body = await res.json();

    expect(res.status).toBe(501);
    expect(at(body, "error")).toMatchObject({
      code: 1006,
      key: "FEATURE_NOT_SUPPORTED",
      details: {
        operation: "injuries",
        league: "nba",
        reason: "Injuries are not provided for NBA/NCAAB.",
      },
    });
  });

  it("needs a team or player for the NFL", async () => {
    const res = await app.request("/data/injuries?league=nfl");
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "code")).toBe(1004);
    expect(at(body, "error", "details", "missing")).toEqual(["player", "team"]);
  });

  it("passes the provider payload through", async () => {
    const res = await app.request("/data/injuries?league=nfl&team=301");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "get")).toBe("injuries");
    expect(at(body, "data", "results")).toBe(0);
  });

  it("needs a competition and season for soccer", async () => {
    const res = await app.request("/data/injuries?league=soccer&season=2024");
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "details", "missing")).toEqual(["league"]);
  });
});

// ===========================================================================
// History
// ===========================================================================

describe("GET /data/history", () => {
  it("lists final scores and caps odds lookups", async () => {
    const res = await app.request(
      "/data/history?league=nba&start_date=2025-01-15&end_date=2025-01-15&include_odds=true&max_odds_lookups=1"
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "count")).toBe(3);
    expect(at(body, "data", "range")).toEqual(["2025-01-15", "2025-01-15"]);
    expect(at(body, "data", "items", 0)).toMatchObject({
      fixtureId: FIRST_NBA_FIXTURE,
      home: "Riverside Rapids",
      away: "Desert Suns",
    });
    expect(typeof at(body, "data", "items", 0, "homeScore")).toBe("number");
    expect(at(body, "data", "items", 0, "odds", "total", "line")).toBe(221.5);
    expect(at(body, "data", "items", 1)).not.toHaveProperty("odds");
  });

  it("leaves odds out unless asked", async () => {
    const res = await app.request(
      "/data/history?league=nba&start_date=2025-01-15&end_date=2025-01-15"
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "items", 0)).not.toHaveProperty("odds");
  });

  it("rejects a reversed range", async () => {
    const res = await app.request(
      "/data/history?league=nba&start_date=2025-01-16&end_date=2025-01-15"
    );
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "code")).toBe(1005);
  });
});

// ===========================================================================
// Odds
// ===========================================================================

describe("GET /data/odds", () => {
  it("normalizes the main markets", async () => {
    const res = await app.request(`/data/odds?league=nba&fixture_id=${FIRST_NBA_FIXTURE}`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "fixtureId")).toBe(FIRST_NBA_FIXTURE);
    expect(at(body, "data", "odds", "bookmaker")).toEqual({ id: 1, name: "Mock Sportsbook" });
    expect(at(body, "data", "odds", "moneyline")).toEqual({ home: 1.8, away: 2.05, draw: null });
    expect(at(body, "data", "odds", "spread")).toEqual({
      line: -3.5,
      homePrice: 1.91,
      awayPrice: 1.91,
    });
  });

  it("normalizes against the preferred bookmaker", async () => {
    const res = await app.request(
      `/data/odds?league=nba&fixture_id=${FIRST_NBA_FIXTURE}&bookmaker_id=2`
    );
    const body = await res.json();

    expect(at(body, "data", "odds", "bookmaker")).toEqual({ id: 2, name: "Mock Exchange" });
    expect(at(body, "data", "odds", "moneyline")).toEqual({ home: 1.83, away: 2.02, draw: null });
    expect(at(body, "data", "odds", "spread")).toBeNull();
  });

  it("returns the raw payload with upstream filters", async () => {
    const res = await app.request(
      `/data/odds?league=nba&fixture_id=${FIRST_NBA_FIXTURE}&raw=true&bookmaker=2`
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "get")).toBe("odds");
    expect(at(body, "data", "response", 0, "bookmakers")).toHaveLength(1);
    expect(at(body, "data", "response", 0, "bookmakers", 0, "name")).toBe("Mock Exchange");
  });
});

// ===========================================================================
// Resolution
// ===========================================================================

describe("GET /data/resolve", () => {
  it("resolves a matchup from team names", async () => {
    const res = await app.request(
      "/data/resolve?league=nba&date=2025-01-15&home=Northgate%20Owls&away=Harbor%20City%20Herons"
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "fixtureId")).toBe(FIRST_NBA_FIXTURE + 1);
    expect(at(body, "data", "pickedReason")).toBe("High-confidence team match.");
  });

  it("needs at least one team", async () => {
    const res = await app.request("/data/resolve?league=nba&date=2025-01-15");
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "details")).toEqual({ fields: { home: "Pass home, away or both" } });
  });
});

// ===========================================================================
// Debug listings
// ===========================================================================

describe("GET /data/debug", () => {
  it("lists bookmakers with their market counts", async () => {
    const res = await app.request(
      `/data/debug/bookmakers?league=nba&fixture_id=${FIRST_NBA_FIXTURE}`
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data")).toEqual({
      fixtureId: FIRST_NBA_FIXTURE,
      bookmakers: [
        { id: 1, name: "Mock Sportsbook", markets: 5 },
        { id: 2, name: "Mock Exchange", markets: 1 },
      ],
    });
  });

  it("lists one bookmaker's markets", async () => {
    const res = await app.request(
      `/data/debug/markets?league=nba&fixture_id=${FIRST_NBA_FIXTURE}&bookmaker_id=2`
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "bookmakerId")).toBe(2);
    expect(at(body, "data", "bets")).toHaveLength(1);
    expect(at(body, "data", "bets", 0, "name")).toBe("Home/Away");
  });

  it("gives no markets for a bookmaker that is not offered", async () => {
    const res = await app.request(
      `/data/debug/markets?league=nba&fixture_id=${FIRST_NBA_FIXTURE}&bookmaker_id=9`
    );
    const body = await res.json();

    expect(at(body, "data", "bets")).toEqual([]);
  });

  it("requires the bookmaker id", async () => {
    const res = await app.request(`/data/debug/markets?league=nba&fixture_id=${FIRST_NBA_FIXTURE}`);

    expect(res.status).toBe(422);
  });
});
