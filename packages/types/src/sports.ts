/**
 * Sports Types
 * Leagues, fixtures and normalized bookmaker odds shared across packages
 */

// ============================================================================
// Leagues & Markets
// ============================================================================

export const LEAGUES = ["nba", "nfl", "ncaaf", "ncaab", "soccer"] as const;
export type League = (typeof LEAGUES)[number];

export const BET_TYPES = [
  "moneyline",
  "spread",
  "total",
  "half_total",
  "quarter_total",
] as const;
export type BetType = (typeof BET_TYPES)[number];

export const PERIODS = ["game", "1h", "2h", "1q", "2q", "3q", "4q"] as const;
export type Period = (typeof PERIODS)[number];

/** Market family a bookmaker bet belongs to */
export type MarketAlias = "moneyline" | "spread" | "total";

export type SportsProviderName = "apisports" | "mock";

// ============================================================================
// Fixtures
// ============================================================================

export interface TeamRef {
  id: number | null;
  name: string;
  code: string | null;
}

export type FixtureStatus =
  | "scheduled"
  | "live"
  | "finished"
  | "postponed"
  | "cancelled"
  | "unknown";

export interface Fixture {
  fixtureId: number;
  league: League;
  /** ISO 8601 start time, "" when the provider omits it */
  date: string;
  status: FixtureStatus;
  /** Raw provider status code (FT, NS, Q1, ...) */
  statusCode: string | null;
  home: TeamRef;
  away: TeamRef;
  homeScore: number | null;
  awayScore: number | null;
}

/** Compact fixture listing used by the vendor endpoints */
export interface CompactFixture {
  fixtureId: number;
  date: string;
  home: { name: string; code: string | null };
  away: { name: string; code: string | null };
}

// ============================================================================
// Normalized Odds
// ============================================================================

/** All prices are decimal odds */
export interface MoneylineOdds {
  home: number | null;
  away: number | null;
  draw: number | null;
}

export interface SpreadOdds {
  /** Handicap from the home side's point of view */
  line: number;
  homePrice: number | null;
  awayPrice: number | null;
}

export interface TotalOdds {
  line: number;
  over: number | null;
  under: number | null;
}

export interface BookmakerRef {
  id: number | null;
  name: string | null;
}

export interface NormalizedOdds {
  bookmaker: BookmakerRef | null;
  moneyline: MoneylineOdds | null;
  spread: SpreadOdds | null;
  total: TotalOdds | null;
  halfTotal: TotalOdds | null;
  quarterTotal: TotalOdds | null;
}

export interface BookmakerSummary extends BookmakerRef {
  /** Number of bets the bookmaker offers for the fixture */
  markets: number;
}

export interface MarketSummary {
  id: number | null;
  name: string | null;
  alias: MarketAlias | null;
  period: Period | null;
}

// ============================================================================
// Data Service Results
// ============================================================================

export interface HistoryRow {
  fixtureId: number;
  date: string;
  home: string;
  away: string;
  homeScore: number | null;
  awayScore: number | null;
  odds?: NormalizedOdds | null;
}

export interface HistoryResult {
  count: number;
  league: League;
  range: [string, string];
  items: HistoryRow[];
}

export interface ResolveCandidate {
  fixtureId: number;
  date: string;
  home: string;
  away: string;
  score: number;
}

export interface ResolveResult {
  fixtureId: number | null;
  candidates: ResolveCandidate[];
  pickedReason: string;
}
