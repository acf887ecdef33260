/**
 * Vendor API Routes
 *
 * Game listings straight from the sports data provider.
 */

import { Hono } from "hono";
import { z } from "zod";
import { validateLeague } from "@picks/core";
import type { Env } from "../index";
import { envelope } from "../lib/response";
import { getServices } from "../lib/services";
import { dateField, flagField, idField, leagueField, seasonField, validateQuery } from "../lib/validation";

const app = new Hono<Env>();

const GamesQuerySchema = z.object({
  league: leagueField,
  date: dateField.optional(),
  season: seasonField,
  limit: z.coerce.number().int().min(1).max(200).default(25),
  compact: flagField,
  soccer_league_id: idField.optional(),
});

const GamesHistoryQuerySchema = z.object({
  league: leagueField,
  date_from: dateField.optional(),
  date_to: dateField.optional(),
  season_from: seasonField,
  season_to: seasonField,
  limit: z.coerce.number().int().min(1).max(2000).default(500),
  compact: flagField,
  soccer_league_id: idField.optional(),
});

/**
 * Games on a date (today, UTC, by default) or across a season
 */
app.get("/games", validateQuery(GamesQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const listing = await data.games(validateLeague(query.league), {
    date: query.date,
    season: query.season,
    limit: query.limit,
    compact: query.compact ?? false,
    leagueId: query.soccer_league_id,
  });

  return c.json(envelope(c.get("requestId"), listing));
});

/**
 * Historical games over a date window or a season window; compact by default
 */
app.get("/games/history", validateQuery(GamesHistoryQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const listing = await data.gamesHistory(validateLeague(query.league), {
    dateFrom: query.date_from,
    dateTo: query.date_to,
    seasonFrom: query.season_from,
    seasonTo: query.season_to,
    limit: query.limit,
    compact: query.compact ?? true,
    leagueId: query.soccer_league_id,
  });

  return c.json(envelope(c.get("requestId"), listing));
});

/**
 * Active provider; the key itself is never shown
 */
app.get("/provider", (c) => {
  const { data } = getServices();
  return c.json(envelope(c.get("requestId"), data.providerInfo()));
});

export { app as vendorRoutes };
