/**
 * Picks API Routes
 */

import { Hono } from "hono";
import { z } from "zod";
import { betTypesSchema, validateLeague } from "@picks/core";
import type { Env } from "../index";
import { envelope } from "../lib/response";
import { getServices } from "../lib/services";
import { dateField, idField, leagueField, seasonField, validateQuery } from "../lib/validation";

const app = new Hono<Env>();

// ============================================================================
// SCHEMAS
// ============================================================================

const PicksQuerySchema = z.object({
  league: leagueField.optional(),
  date: dateField,
  season: seasonField,
  bet_types: betTypesSchema.optional(),
  league_id_override: idField.optional(),
  bookmaker_id: idField.optional(),
  min_edge: z.coerce.number().min(-1).max(1).optional(),
});

const EvaluateQuerySchema = z.object({
  league: leagueField.optional(),
  date: dateField,
  fixture_id: idField,
  season: seasonField,
  league_id_override: idField.optional(),
  bookmaker_id: idField.optional(),
});

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Picks for every fixture on a date
 */
app.get("/", validateQuery(PicksQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { picks, config } = getServices();
  const league = validateLeague(query.league ?? config.defaultLeague);

  const slate = await picks.buildSlate({
    league,
    date: query.date,
    season: query.season,
    betTypes: query.bet_types,
    leagueId: query.league_id_override,
    bookmakerId: query.bookmaker_id,
    minEdge: query.min_edge,
  });

  return c.json(envelope(c.get("requestId"), slate));
});

/**
 * Score distribution and market evaluations for one fixture
 */
app.get("/evaluate", validateQuery(EvaluateQuerySchema), async (c) => {
  const query = c.req.valid("query");
  const { picks, config } = getServices();
  const league = validateLeague(query.league ?? config.defaultLeague);

  const evaluation = await picks.evaluateFixture({
    league,
    date: query.date,
    fixtureId: query.fixture_id,
    season: query.season,
    leagueId: query.league_id_override,
    bookmakerId: query.bookmaker_id,
  });

  return c.json(envelope(c.get("requestId"), evaluation));
});

export { app as picksRoutes };
