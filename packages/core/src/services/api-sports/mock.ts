/**
 * Mock sports data provider
 *
 * Deterministic fixtures and odds in the API-SPORTS payload shapes, so the
 * parsing and normalization paths run the same way as against the live API.
 * Three fixtures per league per day; games that started more than three
 * hours ago are final.
 */

import type { Fixture, League } from "@picks/types";
import { LEAGUE_FAMILY } from "./endpoints";
import { normalizeSeason, parseFixtures } from "./parse";
import type { SportsDataProvider } from "./provider";
import type { ApiSportsEnvelope, FixtureQuery, QueryParams } from "./types";
import teamsData from "./mock-teams.json";

const DAY_MS = 86_400_000;
const GAME_LENGTH_MS = 3 * 60 * 60 * 1000;
const FIXTURES_PER_DAY = 3;
const MAX_DAYS = 366;

const ID_BASE: Record<League, number> = {
  nba: 1_000_000,
  ncaab: 2_000_000,
  nfl: 3_000_000,
  ncaaf: 4_000_000,
  soccer: 5_000_000,
};

interface MockTeam {
  id: number;
  name: string;
  code: string;
}

interface MockProfile {
  kickoff: string;
  /** Lowest possible score */
  floor: number;
  /** Score range above the floor */
  range: number;
  spread: number;
  total: number;
  halfTotal: number | null;
  quarterTotal: number | null;
}

const PROFILES: Record<League, MockProfile> = {
  nba: { kickoff: "00:30", floor: 100, range: 30, spread: -3.5, total: 221.5, halfTotal: 110.5, quarterTotal: 55.5 },
  ncaab: { kickoff: "23:00", floor: 60, range: 24, spread: -4.5, total: 141.5, halfTotal: 68.5, quarterTotal: null },
  nfl: { kickoff: "17:00", floor: 10, range: 24, spread: -2.5, total: 44.5, halfTotal: 22.5, quarterTotal: 10.5 },
  ncaaf: { kickoff: "19:30", floor: 14, range: 28, spread: -6.5, total: 54.5, halfTotal: 27.5, quarterTotal: 13.5 },
  soccer: { kickoff: "15:00", floor: 0, range: 4, spread: -0.5, total: 2.5, halfTotal: 1.5, quarterTotal: null },
};

const TEAMS: Record<League, MockTeam[]> = teamsData;

/** FNV-1a, for stable pseudo-random scores */
function hash(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function dayIndexOf(date: string): number | null {
  const ms = Date.parse(`${date}T00:00:00Z`);
  return Number.isNaN(ms) ? null : Math.floor(ms / DAY_MS);
}

function isoDay(dayIndex: number): string {
  return new Date(dayIndex * DAY_MS).toISOString().slice(0, 10);
}

function envelope(get: string, response: unknown[]): ApiSportsEnvelope {
  return {
    get,
    parameters: {},
    errors: [],
    results: response.length,
    paging: { current: 1, total: 1 },
    response,
  };
}

export interface MockSportsProviderOptions {
  /** Clock used to decide which games are final */
  now?: () => number;
}

export class MockSportsProvider implements SportsDataProvider {
  readonly name = "mock" as const;
  readonly hasCredentials = false;
  private readonly now: () => number;

  constructor(options: MockSportsProviderOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async listFixtures(league: League, query: FixtureQuery): Promise<Fixture[]> {
    const raw = this.rawFixtures(league, query);
    const limited = query.limit !== undefined ? raw.slice(0, query.limit) : raw;
    return parseFixtures(league, limited);
  }

  async oddsPayload(
    league: League,
    fixtureId: number,
    options: { bookmaker?: number; bet?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    const slot = this.decode(league, fixtureId);
    if (!slot) {
      return envelope("odds", []);
    }

    const bookmakers = this.bookmakers(league)
      .filter((bm) => options.bookmaker === undefined || bm.id === options.bookmaker)
      .map((bm) => ({
        ...bm,
        bets: bm.bets.filter((bet) => options.bet === undefined || bet.id === options.bet),
      }));

    const idKey = LEAGUE_FAMILY[league] === "football" ? "fixture" : "game";
    return envelope("odds", [
      {
        [idKey]: { id: fixtureId },
        update: new Date(this.now()).toISOString(),
        bookmakers,
      },
    ]);
  }

  async injuries(_league: League, _params: QueryParams): Promise<ApiSportsEnvelope> {
    return envelope("injuries", []);
  }

  // ==========================================================================
  // Raw payloads
  // ==========================================================================

  private days(league: League, query: FixtureQuery): number[] {
    let first: number | null;
    let last: number | null;
    if (query.date) {
      first = last = dayIndexOf(query.date);
    } else if (query.from || query.to) {
      first = dayIndexOf(query.from ?? query.to ?? "");
      last = dayIndexOf(query.to ?? query.from ?? "");
    } else {
      const season = normalizeSeason(league, query.season);
      if (!season) return [];
      first = dayIndexOf(`${season}-09-01`);
      last = first === null ? null : first + 272;
    }
    if (first === null || last === null || last < first) return [];

    const days: number[] = [];
    for (let day = first; day <= last && days.length < MAX_DAYS; day++) {
      days.push(day);
    }
    return days;
  }

  private rawFixtures(league: League, query: FixtureQuery): unknown[] {
    const raw: unknown[] = [];
    for (const day of this.days(league, query)) {
      for (let slot = 0; slot < FIXTURES_PER_DAY; slot++) {
        raw.push(this.rawFixture(league, day, slot));
      }
      if (query.limit !== undefined && raw.length >= query.limit) break;
    }
    return raw;
  }

  private pairing(league: League, day: number, slot: number): { home: MockTeam; away: MockTeam } {
    const teams = TEAMS[league];
    const offset = day % teams.length;
    return {
      home: teams[(offset + slot * 2) % teams.length],
      away: teams[(offset + slot * 2 + 1) % teams.length],
    };
  }

  private decode(league: League, fixtureId: number): { day: number; slot: number } | null {
    const local = fixtureId - ID_BASE[league];
    if (local < 0 || local >= ID_BASE.nba) return null;
    const slot = local % 10;
    if (slot >= FIXTURES_PER_DAY) return null;
    return { day: Math.floor(local / 10), slot };
  }

  private rawFixture(league: League, day: number, slot: number): unknown {
    const profile = PROFILES[league];
    const id = ID_BASE[league] + day * 10 + slot;
    const { home, away } = this.pairing(league, day, slot);
    const date = `${isoDay(day)}T${profile.kickoff}:00+00:00`;
    const start = Date.parse(date);
    const finished = start + GAME_LENGTH_MS <= this.now();

    const homeScore = finished ? profile.floor + (hash(`${id}:home`) % (profile.range + 1)) : null;
    const awayScore = finished ? profile.floor + (hash(`${id}:away`) % (profile.range + 1)) : null;
    const status = finished
      ? { short: "FT", long: "Game Finished" }
      : { short: "NS", long: "Not Started" };
    const teams = { home, away };

    switch (LEAGUE_FAMILY[league]) {
      case "football":
        return {
          fixture: { id, date, status },
          teams,
          goals: { home: homeScore, away: awayScore },
        };
      case "american-football":
        return {
          game: {
            id,
            date: {
              date: isoDay(day),
              time: profile.kickoff,
              timestamp: Math.floor(start / 1000),
            },
            status,
          },
          teams,
          scores: { home: { total: homeScore }, away: { total: awayScore } },
        };
      case "basketball":
        return {
          id,
          date,
          status,
          teams,
          scores: { home: { total: homeScore }, away: { total: awayScore } },
        };
    }
  }

  private bookmakers(league: League) {
    const p = PROFILES[league];
    const soccer = LEAGUE_FAMILY[league] === "football";
    const line = (value: number) => (value > 0 ? `+${value}` : String(value));
    const totalName = soccer ? "Goals Over/Under" : "Over/Under";

    const bets = [
      soccer
        ? {
            id: 1,
            name: "Match Winner",
            values: [
              { value: "Home", odd: "2.10" },
              { value: "Draw", odd: "3.30" },
              { value: "Away", odd: "3.40" },
            ],
          }
        : {
            id: 1,
            name: "Home/Away",
            values: [
              { value: "Home", odd: "1.80" },
              { value: "Away", odd: "2.05" },
            ],
          },
      {
        id: soccer ? 4 : 2,
        name: "Asian Handicap",
        values: [
          { value: `Home ${line(p.spread - 1)}`, odd: "2.20" },
          { value: `Away ${line(-(p.spread - 1))}`, odd: "1.65" },
          { value: `Home ${line(p.spread)}`, odd: "1.91" },
          { value: `Away ${line(-p.spread)}`, odd: "1.91" },
        ],
      },
      {
        id: soccer ? 5 : 3,
        name: totalName,
        values: [
          { value: `Over ${p.total - 2}`, odd: "1.70" },
          { value: `Under ${p.total - 2}`, odd: "2.15" },
          { value: `Over ${p.total}`, odd: "1.91" },
          { value: `Under ${p.total}`, odd: "1.91" },
        ],
      },
    ];

    if (p.halfTotal !== null) {
      bets.push({
        id: soccer ? 6 : 16,
        name: `${totalName} First Half`,
        values: [
          { value: `Over ${p.halfTotal}`, odd: "1.87" },
          { value: `Under ${p.halfTotal}`, odd: "1.95" },
        ],
      });
    }
    if (p.quarterTotal !== null) {
      bets.push({
        id: 17,
        name: `${totalName} 1st Quarter`,
        values: [
          { value: `Over ${p.quarterTotal}`, odd: "1.90" },
          { value: `Under ${p.quarterTotal}`, odd: "1.90" },
        ],
      });
    }

    return [
      { id: 1, name: "Mock Sportsbook", bets },
      {
        id: 2,
        name: "Mock Exchange",
        bets: [
          soccer
            ? {
                id: 1,
                name: "Match Winner",
                values: [
                  { value: "Home", odd: "2.05" },
                  { value: "Draw", odd: "3.40" },
                  { value: "Away", odd: "3.50" },
                ],
              }
            : {
                id: 1,
                name: "Home/Away",
                values: [
                  { value: "Home", odd: "1.83" },
                  { value: "Away", odd: "2.02" },
                ],
              },
        ],
      },
    ];
  }
}
