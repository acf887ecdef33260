/**
 * Market classification
 *
 * Bookmaker bets are classified by name first (names are stable across
 * sport families) and by the per-league bet id map second. Three-way
 * result markets only count as moneylines in leagues that settle draws.
 */

import { z } from "zod";
import { LEAGUES, PERIODS } from "@picks/types";
import type { League, MarketAlias, Period } from "@picks/types";
import betMapData from "./bet-map.json";

const aliasSchema = z.enum(["moneyline", "spread", "total"]);
const periodSchema = z.enum(PERIODS);

const betMapSchema = z.object({
  bets: z.record(
    z.enum(LEAGUES),
    z.record(z.string(), z.object({ alias: aliasSchema, periods: z.array(periodSchema).min(1) }))
  ),
  nameFallbacks: z.object({
    moneyline: z.array(z.string()),
    spread: z.array(z.string()),
    total: z.array(z.string()),
  }),
  threeWayHints: z.array(z.string()),
  drawLeagues: z.array(z.enum(LEAGUES)),
  excludeHints: z.array(z.string()),
  periodHints: z.record(periodSchema, z.array(z.string())),
});

export type BetMap = z.infer<typeof betMapSchema>;

export const BET_MAP: BetMap = betMapSchema.parse(betMapData);

/** Specific periods are checked before "game" */
const PERIOD_ORDER: readonly Period[] = ["1q", "2q", "3q", "4q", "1h", "2h", "game"];

/** Totals are checked first so "Over/Under ... Winner" style names stay totals */
const ALIAS_ORDER: readonly MarketAlias[] = ["total", "spread", "moneyline"];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsPhrase(name: string, phrase: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}($|[^a-z0-9])`);
  return pattern.test(name);
}

function normalizeName(name: string | null | undefined): string {
  return (name ?? "").toLowerCase().replace(/\s+/g, " ").trim();
}

/** True for markets the engine does not price (player props, team totals, ...) */
export function isExcludedMarket(name: string | null | undefined): boolean {
  const normalized = normalizeName(name);
  return BET_MAP.excludeHints.some((hint) => containsPhrase(normalized, hint));
}

/** True for 1X2-style markets that carry a draw selection */
export function isThreeWayMarket(name: string | null | undefined): boolean {
  const normalized = normalizeName(name);
  return BET_MAP.threeWayHints.some((hint) => containsPhrase(normalized, hint));
}

function settlesDraws(league: League | undefined): boolean {
  return league === undefined || BET_MAP.drawLeagues.includes(league);
}

/**
 * Market family from a bet name, or null when no fallback matches
 */
export function classifyMarket(name: string | null | undefined): MarketAlias | null {
  const normalized = normalizeName(name);
  if (!normalized || isExcludedMarket(normalized)) return null;
  for (const alias of ALIAS_ORDER) {
    if (BET_MAP.nameFallbacks[alias].some((hint) => containsPhrase(normalized, hint))) {
      return alias;
    }
  }
  return null;
}

/**
 * Period from a bet name, or null when the name carries no hint
 */
export function inferPeriod(name: string | null | undefined): Period | null {
  const normalized = normalizeName(name);
  if (!normalized) return null;
  for (const period of PERIOD_ORDER) {
    const hints = BET_MAP.periodHints[period] ?? [];
    if (hints.some((hint) => containsPhrase(normalized, hint))) {
      return period;
    }
  }
  return null;
}

/**
 * Bet id for a market alias and period: exact alias+period first, then alias
 * only, else null.
 */
export function resolveBetId(
  league: League,
  alias: string | null | undefined,
  period: string | null | undefined = "game"
): number | null {
  if (!alias) return null;
  const key = alias.toLowerCase().trim();
  const wanted = (period || "game").toLowerCase().trim();
  const bets = Object.entries(BET_MAP.bets[league] ?? {});

  for (const [id, meta] of bets) {
    if (meta.alias === key && meta.periods.some((p) => p === wanted)) {
      return Number(id);
    }
  }
  for (const [id, meta] of bets) {
    if (meta.alias === key) {
      return Number(id);
    }
  }
  return null;
}

export interface MarketClassification {
  alias: MarketAlias;
  period: Period;
}

/**
 * Classify a bookmaker bet by name, falling back to the league's id map.
 */
export function classifyBet(
  league: League | undefined,
  bet: { id?: number | null; name?: string | null }
): MarketClassification | null {
  if (isExcludedMarket(bet.name)) return null;
  if (!settlesDraws(league) && isThreeWayMarket(bet.name)) return null;

  const mapped =
    league && bet.id !== null && bet.id !== undefined
      ? BET_MAP.bets[league]?.[String(bet.id)]
      : undefined;

  const alias = classifyMarket(bet.name) ?? mapped?.alias ?? null;
  if (!alias) return null;

  const period =
    inferPeriod(bet.name) ??
    (mapped && mapped.periods.length === 1 ? mapped.periods[0] : "game");

  return { alias, period };
}
