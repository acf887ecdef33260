/**
 * Backtest API Routes
 */

import { Hono } from "hono";
import { z } from "zod";
import { betTypesSchema, validateLeague } from "@picks/core";
import type { Env } from "../index";
import { envelope } from "../lib/response";
import { getServices } from "../lib/services";
import {
  dateField,
  flagField,
  idField,
  leagueField,
  seasonField,
  validateQuery,
} from "../lib/validation";

const app = new Hono<Env>();

const BacktestQuerySchema = z.object({
  league: leagueField,
  start_date: dateField,
  end_date: dateField,
  season: seasonField,
  bet_types: betTypesSchema.optional(),
  min_edge: z.coerce.number().min(-1).max(1).optional(),
  staking: z.enum(["flat", "kelly"]).default("flat"),
  unit_stake: z.coerce.number().positive().optional(),
  bankroll: z.coerce.number().positive().optional(),
  kelly_multiplier: z.coerce.number().positive().max(1).optional(),
  league_id_override: idField.optional(),
  bookmaker_id: idField.optional(),
  /** Include every graded pick in the response */
  include_results: flagField,
});

/**
 * Replay daily slates over a date range and grade them against final scores
 */
app.get("/", validateQuery(BacktestQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { backtest } = getServices();

  const summary = await backtest.run({
    league: validateLeague(query.league),
    startDate: query.start_date,
    endDate: query.end_date,
    season: query.season,
    betTypes: query.bet_types,
    minEdge: query.min_edge,
    staking: query.staking,
    unitStake: query.unit_stake,
    bankroll: query.bankroll,
    kellyMultiplier: query.kelly_multiplier,
    leagueId: query.league_id_override,
    bookmakerId: query.bookmaker_id,
  });

  const { results, ...totals } = summary;
  return c.json(
    envelope(c.get("requestId"), query.include_results ? { ...totals, results } : totals)
  );
});

export { app as backtestRoutes };
