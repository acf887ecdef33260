/**
 * API-SPORTS endpoint map
 *
 * Each league belongs to one sport family with its own host and API version.
 */

import type { League } from "@picks/types";

export type SportFamily = "basketball" | "american-football" | "football";

export const LEAGUE_FAMILY: Record<League, SportFamily> = {
  nba: "basketball",
  ncaab: "basketball",
  nfl: "american-football",
  ncaaf: "american-football",
  soccer: "football",
};

/** Default competition ids; soccer callers usually pass their own (EPL=39, MLS=253) */
export const LEAGUE_IDS: Record<League, number> = {
  nba: 12,
  ncaab: 7,
  nfl: 1,
  ncaaf: 2,
  soccer: 39,
};

export const DEFAULT_BASES: Record<SportFamily, string> = {
  basketball: "https://v1.basketball.api-sports.io",
  "american-football": "https://v1.american-football.api-sports.io",
  football: "https://v3.football.api-sports.io",
};

export type ApiSportsOperation =
  | "fixtures_by_date"
  | "fixtures_range"
  | "fixtures_by_season"
  | "odds"
  | "injuries"
  | "standings"
  | "team_statistics"
  | "players";

export interface OperationSpec {
  path: string;
  required: readonly string[];
  optional: readonly string[];
}

const FIXTURE_FILTERS = ["league", "season", "timezone", "page"] as const;

function gamesOperations(
  gamesPath: "/games" | "/fixtures",
  oddsParam: "game" | "fixture"
): Record<"fixtures_by_date" | "fixtures_range" | "fixtures_by_season" | "odds" | "standings" | "team_statistics" | "players", OperationSpec> {
  return {
    fixtures_by_date: { path: gamesPath, required: ["date"], optional: FIXTURE_FILTERS },
    fixtures_range: { path: gamesPath, required: ["from", "to"], optional: FIXTURE_FILTERS },
    fixtures_by_season: { path: gamesPath, required: ["league", "season"], optional: ["timezone", "page"] },
    odds: { path: "/odds", required: [oddsParam], optional: ["bookmaker", "bet", "page"] },
    standings: { path: "/standings", required: ["league", "season"], optional: [] },
    team_statistics: { path: "/teams/statistics", required: ["league", "season"], optional: ["team"] },
    players: { path: "/players", required: ["season"], optional: ["team", "id", "page"] },
  };
}

/**
 * Operations called per league. Basketball has no injuries endpoint.
 */
export const OPERATIONS: Record<League, Partial<Record<ApiSportsOperation, OperationSpec>>> = {
  nba: gamesOperations("/games", "game"),
  ncaab: gamesOperations("/games", "game"),
  nfl: {
    ...gamesOperations("/games", "game"),
    injuries: { path: "/injuries", required: [], optional: ["team", "player"] },
  },
  ncaaf: {
    ...gamesOperations("/games", "game"),
    injuries: { path: "/injuries", required: [], optional: ["team", "player"] },
  },
  soccer: {
    ...gamesOperations("/fixtures", "fixture"),
    fixtures_by_date: {
      path: "/fixtures",
      required: ["date"],
      optional: [...FIXTURE_FILTERS, "team"],
    },
    fixtures_range: {
      path: "/fixtures",
      required: ["from", "to"],
      optional: [...FIXTURE_FILTERS, "team"],
    },
    injuries: { path: "/injuries", required: ["league", "season"], optional: ["team", "player"] },
  },
};

/** Query parameter carrying the fixture id on `/odds` */
export function oddsParamFor(league: League): "game" | "fixture" {
  return LEAGUE_FAMILY[league] === "football" ? "fixture" : "game";
}
