/**
 * Data API Routes
 *
 * Injuries, history with odds, fixture odds, fixture resolution and the
 * bookmaker/market debug listings.
 */

import { Hono } from "hono";
import { z } from "zod";
import { validateLeague } from "@picks/core";
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

// ============================================================================
// SCHEMAS
// ============================================================================

const InjuriesQuerySchema = z.object({
  league: leagueField,
  season: seasonField,
  league_id_override: idField.optional(),
  team: idField.optional(),
  player: idField.optional(),
});

const HistoryQuerySchema = z.object({
  league: leagueField,
  start_date: dateField,
  end_date: dateField,
  season: seasonField,
  include_odds: flagField,
  league_id_override: idField.optional(),
  bookmaker_id: idField.optional(),
  max_odds_lookups: z.coerce.number().int().min(0).max(1000).optional(),
});

const OddsQuerySchema = z.object({
  league: leagueField,
  fixture_id: idField,
  raw: flagField,
  bookmaker_id: idField.optional(),
  bookmaker: idField.optional(),
  bet: idField.optional(),
});

const ResolveQuerySchema = z
  .object({
    league: leagueField,
    date: dateField,
    home: z.string().trim().min(1).optional(),
    away: z.string().trim().min(1).optional(),
    season: seasonField,
    league_id_override: idField.optional(),
  })
  .refine((query) => query.home !== undefined || query.away !== undefined, {
    message: "Pass home, away or both",
    path: ["home"],
  });

const BookmakersQuerySchema = z.object({
  league: leagueField,
  fixture_id: idField,
});

const MarketsQuerySchema = z.object({
  league: leagueField,
  fixture_id: idField,
  bookmaker_id: idField,
});

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Injury reports: nfl/ncaaf by team or player, soccer by competition and season
 */
app.get("/injuries", validateQuery(InjuriesQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const payload = await data.injuries(validateLeague(query.league), {
    team: query.team,
    player: query.player,
    leagueId: query.league_id_override,
    season: query.season,
  });

  return c.json(envelope(c.get("requestId"), payload));
});

/**
 * Fixtures between two dates with final scores and optional normalized odds
 */
app.get("/history", validateQuery(HistoryQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const history = await data.history(validateLeague(query.league), {
    startDate: query.start_date,
    endDate: query.end_date,
    season: query.season,
    leagueId: query.league_id_override,
    includeOdds: query.include_odds ?? false,
    bookmakerId: query.bookmaker_id,
    maxOddsLookups: query.max_odds_lookups,
  });

  return c.json(envelope(c.get("requestId"), history));
});

/**
 * Fixture odds, normalized unless raw=true
 */
app.get("/odds", validateQuery(OddsQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const odds = await data.odds(validateLeague(query.league), query.fixture_id, {
    raw: query.raw ?? false,
    bookmakerId: query.bookmaker_id,
    bookmaker: query.bookmaker,
    bet: query.bet,
  });

  return c.json(envelope(c.get("requestId"), odds));
});

/**
 * Fixture id for a matchup on a date, from team names
 */
app.get("/resolve", validateQuery(ResolveQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const resolved = await data.resolveFixture({
    league: validateLeague(query.league),
    date: query.date,
    home: query.home,
    away: query.away,
    season: query.season,
    leagueId: query.league_id_override,
  });

  return c.json(envelope(c.get("requestId"), resolved));
});

// ============================================================================
// DEBUG
// ============================================================================

app.get("/debug/bookmakers", validateQuery(BookmakersQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const listing = await data.bookmakers(validateLeague(query.league), query.fixture_id);

  return c.json(envelope(c.get("requestId"), listing));
});

app.get("/debug/markets", validateQuery(MarketsQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { data } = getServices();

  const listing = await data.markets(
    validateLeague(query.league),
    query.fixture_id,
    query.bookmaker_id
  );

  return c.json(envelope(c.get("requestId"), listing));
});

export { app as dataRoutes };
