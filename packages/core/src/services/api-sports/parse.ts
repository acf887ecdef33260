/**
 * Fixture parsing
 *
 * Maps the three API-SPORTS game shapes onto `Fixture`:
 * - basketball: `{ id, date, status, teams, scores: { home: { total } } }`
 * - american-football: `{ game: { id, date: { date, time, timestamp }, status }, teams, scores }`
 * - football (soccer): `{ fixture: { id, date, status }, teams, goals }`
 */

import type { CompactFixture, Fixture, FixtureStatus, League, TeamRef } from "@picks/types";
import { LEAGUE_FAMILY } from "./endpoints";
import {
  americanFootballGameSchema,
  basketballGameSchema,
  soccerFixtureSchema,
  type RawTeam,
} from "./types";

const FINISHED = new Set(["FT", "AOT", "AET", "PEN", "AWD", "WO"]);
const SCHEDULED = new Set(["NS", "TBD"]);
const POSTPONED = new Set(["POST", "PST", "SUSP", "INT"]);
const CANCELLED = new Set(["CANC", "ABD"]);
const LIVE = new Set([
  "Q1", "Q2", "Q3", "Q4", "OT", "BT", "HT", "1H", "2H", "ET", "P", "LIVE",
]);

export function mapStatus(code: string | null | undefined): FixtureStatus {
  if (!code) return "unknown";
  const upper = code.toUpperCase();
  if (FINISHED.has(upper)) return "finished";
  if (SCHEDULED.has(upper)) return "scheduled";
  if (POSTPONED.has(upper)) return "postponed";
  if (CANCELLED.has(upper)) return "cancelled";
  if (LIVE.has(upper)) return "live";
  return "unknown";
}

/**
 * Score objects carry their final value in `total`; soccer goals are plain numbers.
 */
export function scoreTotal(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  if (typeof value === "object" && value !== null && "total" in value) {
    return scoreTotal(value.total);
  }
  return null;
}

function toTeam(raw: RawTeam | null | undefined, fallbackName: string): TeamRef {
  return {
    id: raw?.id ?? null,
    name: raw?.name || fallbackName,
    code: raw?.code ?? null,
  };
}

function americanFootballDate(
  date: string | { date?: string | null; time?: string | null; timestamp?: number | null } | null | undefined
): string {
  if (!date) return "";
  if (typeof date === "string") return date;
  if (typeof date.timestamp === "number") {
    return new Date(date.timestamp * 1000).toISOString();
  }
  if (date.date) {
    return `${date.date}T${date.time || "00:00"}:00.000Z`;
  }
  return "";
}

function parseSoccer(league: League, raw: unknown): Fixture | null {
  const parsed = soccerFixtureSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { fixture, teams, goals } = parsed.data;
  const statusCode = fixture.status?.short ?? null;
  return {
    fixtureId: fixture.id,
    league,
    date: fixture.date ?? "",
    status: mapStatus(statusCode),
    statusCode,
    home: toTeam(teams?.home, "Home"),
    away: toTeam(teams?.away, "Away"),
    homeScore: scoreTotal(goals?.home),
    awayScore: scoreTotal(goals?.away),
  };
}

function parseAmericanFootball(league: League, raw: unknown): Fixture | null {
  const parsed = americanFootballGameSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { game, teams, scores } = parsed.data;
  const statusCode = game.status?.short ?? null;
  return {
    fixtureId: game.id,
    league,
    date: americanFootballDate(game.date),
    status: mapStatus(statusCode),
    statusCode,
    home: toTeam(teams?.home, "Home"),
    away: toTeam(teams?.away, "Away"),
    homeScore: scoreTotal(scores?.home),
    awayScore: scoreTotal(scores?.away),
  };
}

function parseBasketball(league: League, raw: unknown): Fixture | null {
  const parsed = basketballGameSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { id, date, status, teams, scores } = parsed.data;
  const statusCode = status?.short ?? null;
  return {
    fixtureId: id,
    league,
    date: date ?? "",
    status: mapStatus(statusCode),
    statusCode,
    home: toTeam(teams?.home, "Home"),
    away: toTeam(teams?.away, "Away"),
    homeScore: scoreTotal(scores?.home),
    awayScore: scoreTotal(scores?.away),
  };
}

/**
 * Parse one `response` item. The league's own shape is tried first, then the
 * others; null when none fits.
 */
export function parseFixture(league: League, raw: unknown): Fixture | null {
  const order =
    LEAGUE_FAMILY[league] === "football"
      ? [parseSoccer, parseAmericanFootball, parseBasketball]
      : LEAGUE_FAMILY[league] === "american-football"
        ? [parseAmericanFootball, parseSoccer, parseBasketball]
        : [parseBasketball, parseAmericanFootball, parseSoccer];

  for (const parse of order) {
    const fixture = parse(league, raw);
    if (fixture) return fixture;
  }
  return null;
}

export function parseFixtures(league: League, items: unknown[]): Fixture[] {
  const fixtures: Fixture[] = [];
  for (const item of items) {
    const fixture = parseFixture(league, item);
    if (fixture) fixtures.push(fixture);
  }
  return fixtures;
}

export function toCompactFixture(fixture: Fixture): CompactFixture {
  return {
    fixtureId: fixture.fixtureId,
    date: fixture.date,
    home: { name: fixture.home.name, code: fixture.home.code },
    away: { name: fixture.away.name, code: fixture.away.code },
  };
}

/**
 * Basketball seasons are keyed by their starting year ("2024-2025" -> "2024").
 * Every league keeps digits only; empty input gives undefined.
 */
export function normalizeSeason(
  league: League,
  season: string | number | null | undefined
): string | undefined {
  if (season === null || season === undefined) return undefined;
  let value = String(season).trim();
  if (value === "") return undefined;
  if (LEAGUE_FAMILY[league] === "basketball" && value.includes("-")) {
    value = value.split("-")[0];
  }
  const digits = value.replace(/\D/g, "");
  return digits || undefined;
}
