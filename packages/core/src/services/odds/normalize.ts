/**
 * Odds normalization
 *
 * Reduces an API-SPORTS `/odds` payload to one bookmaker's main markets.
 * All prices come out as decimal odds; spread lines are from the home side.
 */

import type {
  BookmakerSummary,
  League,
  MarketSummary,
  MoneylineOdds,
  NormalizedOdds,
  SpreadOdds,
  TotalOdds,
} from "@picks/types";
import {
  envelopeSchema,
  rawOddsNodeSchema,
  responseItems,
  type RawBookmaker,
  type RawOddValue,
} from "../api-sports/types";
import { oddsConverter } from "./converter";
import { classifyBet } from "./markets";

export interface NormalizeOptions {
  preferredBookmakerId?: number;
  league?: League;
}

type ValueSide = "home" | "away" | "draw" | "over" | "under";

export interface ParsedOddValue {
  side: ValueSide | null;
  line: number | null;
  price: number | null;
}

const SIDE_TOKENS: Record<string, ValueSide> = {
  home: "home",
  "1": "home",
  away: "away",
  "2": "away",
  draw: "draw",
  x: "draw",
  over: "over",
  under: "under",
};

export function emptyOdds(): NormalizedOdds {
  return {
    bookmaker: null,
    moneyline: null,
    spread: null,
    total: null,
    halfTotal: null,
    quarterTotal: null,
  };
}

function parseLine(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const text = String(raw).trim();
  if (text === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Split a value label like "Home -3.5" or "Over 221.5" into side and line.
 * A `handicap` field takes precedence over a line in the label.
 */
export function parseOddValue(value: RawOddValue): ParsedOddValue {
  const tokens = String(value.value ?? "")
    .trim()
    .toLowerCase()
    .split(/\s+/);
  const side = SIDE_TOKENS[tokens[0] ?? ""] ?? null;
  const labelLine = side ? parseLine(tokens.slice(1).join("")) : null;
  return {
    side,
    line: parseLine(value.handicap) ?? labelLine,
    price: oddsConverter.parsePrice(value.odd),
  };
}

function bookmakersOf(payload: unknown): RawBookmaker[] {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) return [];
  const node = rawOddsNodeSchema.safeParse(responseItems(envelope.data)[0]);
  return node.success ? node.data.bookmakers ?? [] : [];
}

/**
 * Preferred bookmaker, else the first with bets, else the first.
 */
export function pickBookmaker(
  bookmakers: RawBookmaker[],
  preferredId?: number
): RawBookmaker | null {
  if (bookmakers.length === 0) return null;
  if (preferredId !== undefined) {
    const preferred = bookmakers.find((bm) => bm.id === preferredId);
    if (preferred) return preferred;
  }
  return bookmakers.find((bm) => (bm.bets ?? []).length > 0) ?? bookmakers[0];
}

function balance(a: number, b: number): number {
  return Math.abs(1 / a - 1 / b);
}

function buildMoneyline(values: ParsedOddValue[]): MoneylineOdds | null {
  const ml: MoneylineOdds = { home: null, away: null, draw: null };
  for (const v of values) {
    if (v.price === null) continue;
    if (v.side === "home" && ml.home === null) ml.home = v.price;
    else if (v.side === "away" && ml.away === null) ml.away = v.price;
    else if (v.side === "draw" && ml.draw === null) ml.draw = v.price;
  }
  return ml.home === null && ml.away === null ? null : ml;
}

/**
 * Main spread: the home/away pair whose implied probabilities are closest.
 */
function buildSpread(values: ParsedOddValue[]): SpreadOdds | null {
  const lines = new Map<number, SpreadOdds>();
  for (const v of values) {
    if (v.line === null || v.price === null) continue;
    if (v.side !== "home" && v.side !== "away") continue;
    const homeLine = v.side === "home" ? v.line : -v.line;
    const entry = lines.get(homeLine) ?? { line: homeLine + 0, homePrice: null, awayPrice: null };
    if (v.side === "home" && entry.homePrice === null) entry.homePrice = v.price;
    if (v.side === "away" && entry.awayPrice === null) entry.awayPrice = v.price;
    lines.set(homeLine, entry);
  }

  let best: SpreadOdds | null = null;
  for (const entry of lines.values()) {
    if (entry.homePrice === null || entry.awayPrice === null) continue;
    if (
      !best ||
      best.homePrice === null ||
      best.awayPrice === null ||
      balance(entry.homePrice, entry.awayPrice) < balance(best.homePrice, best.awayPrice)
    ) {
      best = entry;
    }
  }
  return best ?? lines.values().next().value ?? null;
}

/**
 * Main total: the over/under pair whose implied probabilities are closest.
 */
function buildTotal(values: ParsedOddValue[]): TotalOdds | null {
  const lines = new Map<number, TotalOdds>();
  for (const v of values) {
    if (v.line === null || v.price === null) continue;
    if (v.side !== "over" && v.side !== "under") continue;
    const entry = lines.get(v.line) ?? { line: v.line, over: null, under: null };
    if (v.side === "over" && entry.over === null) entry.over = v.price;
    if (v.side === "under" && entry.under === null) entry.under = v.price;
    lines.set(v.line, entry);
  }

  let best: TotalOdds | null = null;
  for (const entry of lines.values()) {
    if (entry.over === null || entry.under === null) continue;
    if (
      !best ||
      best.over === null ||
      best.under === null ||
      balance(entry.over, entry.under) < balance(best.over, best.under)
    ) {
      best = entry;
    }
  }
  return best ?? lines.values().next().value ?? null;
}

/**
 * Normalize an `/odds` payload. Missing or empty payloads give all-null odds.
 */
export function normalizeOdds(payload: unknown, options: NormalizeOptions = {}): NormalizedOdds {
  const bookmaker = pickBookmaker(bookmakersOf(payload), options.preferredBookmakerId);
  if (!bookmaker) return emptyOdds();

  let moneylineValues: ParsedOddValue[] | null = null;
  const spreadValues: ParsedOddValue[] = [];
  const totals: Record<"game" | "1h" | "1q", ParsedOddValue[]> = { game: [], "1h": [], "1q": [] };

  for (const bet of bookmaker.bets ?? []) {
    const market = classifyBet(options.league, bet);
    if (!market) continue;
    const values = (bet.values ?? []).map(parseOddValue);

    if (market.alias === "moneyline" && market.period === "game") {
      moneylineValues ??= values;
    } else if (market.alias === "spread" && market.period === "game") {
      spreadValues.push(...values);
    } else if (market.alias === "total") {
      if (market.period === "game" || market.period === "1h" || market.period === "1q") {
        totals[market.period].push(...values);
      }
    }
  }

  return {
    bookmaker: { id: bookmaker.id ?? null, name: bookmaker.name ?? null },
    moneyline: moneylineValues ? buildMoneyline(moneylineValues) : null,
    spread: buildSpread(spreadValues),
    total: buildTotal(totals.game),
    halfTotal: buildTotal(totals["1h"]),
    quarterTotal: buildTotal(totals["1q"]),
  };
}

/**
 * Bookmakers in an `/odds` payload with their bet counts
 */
export function listBookmakers(payload: unknown): BookmakerSummary[] {
  return bookmakersOf(payload).map((bm) => ({
    id: bm.id ?? null,
    name: bm.name ?? null,
    markets: (bm.bets ?? []).length,
  }));
}

/**
 * Bets offered by one bookmaker (preferred, else the default pick) with their classification
 */
export function listMarkets(
  payload: unknown,
  options: { bookmakerId?: number; league?: League } = {}
): MarketSummary[] {
  const bookmaker = pickBookmaker(bookmakersOf(payload), options.bookmakerId);
  if (!bookmaker) return [];
  return (bookmaker.bets ?? []).map((bet) => {
    const market = classifyBet(options.league, bet);
    return {
      id: bet.id ?? null,
      name: bet.name ?? null,
      alias: market?.alias ?? null,
      period: market?.period ?? null,
    };
  });
}
