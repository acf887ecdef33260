import { describe, it, expect, vi } from "vitest";
import type { Services } from "../../lib/services";
import { FIRST_NBA_FIXTURE, at, createTestServices } from "../helpers";

/**
 * Vendor Routes Tests
 */

const services: Services = createTestServices();

vi.mock("../../lib/services", () => ({
  getServices: () => services,
}));

// Import after mocks are set up
const { app } = await import("../../index");

// ===========================================================================
// GET /vendor/games
// ===========================================================================

describe("GET /vendor/games", () => {
  it("lists compact games for a date", async () => {
    const res = await app.request("/vendor/games?league=nba&date=2025-01-15&compact=true");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "league")).toBe("nba");
    expect(at(body, "data", "count")).toBe(3);
    expect(at(body, "data", "games", 0)).toEqual({
      fixtureId: FIRST_NBA_FIXTURE,
      date: "2025-01-15T00:30:00+00:00",
      home: { name: "Riverside Rapids", code: "RIV" },
      away: { name: "Desert Suns", code: "DSU" },
    });
  });

  it("returns full fixtures unless compact", async () => {
    const res = await app.request("/vendor/games?league=nba&date=2025-01-15&limit=2");
    const body = await res.json();

    expect(at(body, "data", "count")).toBe(2);
    expect(at(body, "data", "games", 1)).toMatchObject({
      fixtureId: FIRST_NBA_FIXTURE + 1,
      league: "nba",
      status: "finished",
    });
  });

  it("caps the limit at 200", async () => {
    const res = await app.request("/vendor/games?league=nba&date=2025-01-15&limit=500");
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "details", "fields")).toHaveProperty("limit");
  });
});

// ===========================================================================
// GET /vendor/games/history
// ===========================================================================

describe("GET /vendor/games/history", () => {
  it("lists a date window compactly by default", async () => {
    const res = await app.request(
      "/vendor/games/history?league=nba&date_from=2025-01-15&date_to=2025-01-16"
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "count")).toBe(6);
    expect(at(body, "data", "games", 0)).not.toHaveProperty("status");
  });

  it("walks a season window up to the limit", async () => {
    const res = await app.request(
      "/vendor/games/history?league=nfl&season_from=2023&season_to=2024&limit=4&compact=false"
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data", "count")).toBe(4);
    expect(at(body, "data", "games", 0, "date")).toBe("2023-09-01T17:00:00.000Z");
  });

  it("falls back to today's games without a window", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-15T12:00:00Z"));
    try {
      const res = await app.request("/vendor/games/history?league=nba");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(at(body, "data", "count")).toBe(3);
      expect(at(body, "data", "games", 0)).toEqual({
        fixtureId: FIRST_NBA_FIXTURE,
        date: "2025-01-15T00:30:00+00:00",
        home: { name: "Riverside Rapids", code: "RIV" },
        away: { name: "Desert Suns", code: "DSU" },
      });
    } finally {
      vi.useRealTimers();
    }
  });

  it("rejects a season window that runs backwards", async () => {
    const res = await app.request("/vendor/games/history?league=nfl&season_from=2024&season_to=2023");
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(at(body, "error", "details")).toEqual({
      fields: { seasonTo: "seasonTo must not be before seasonFrom" },
    });
  });
});

// ===========================================================================
// GET /vendor/provider
// ===========================================================================

describe("GET /vendor/provider", () => {
  it("names the provider without exposing the key", async () => {
    const res = await app.request("/vendor/provider");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(at(body, "data")).toEqual({ sportsProvider: "mock", apisportsKey: "not-set" });
  });
});
