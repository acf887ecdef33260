/**
 * Team ratings from finished fixtures
 */

import type { Fixture, TeamForm, TeamRef } from "@picks/types";
import type { LeagueModelParams } from "./params";

const round2 = (value: number) => Math.round(value * 100) / 100;

function sameTeam(a: TeamRef, b: TeamRef): boolean {
  if (a.id !== null && b.id !== null) return a.id === b.id;
  return a.name === b.name;
}

export function emptyForm(): TeamForm {
  return { games: 0, off: 0, def: 0, net: 0 };
}

/**
 * Mean points for and against over a team's finished games
 */
export function computeEfficiency(fixtures: readonly Fixture[], team: TeamRef): TeamForm {
  let games = 0;
  let scored = 0;
  let allowed = 0;

  for (const fixture of fixtures) {
    if (fixture.status !== "finished") continue;
    if (fixture.homeScore === null || fixture.awayScore === null) continue;

    if (sameTeam(fixture.home, team)) {
      scored += fixture.homeScore;
      allowed += fixture.awayScore;
    } else if (sameTeam(fixture.away, team)) {
      scored += fixture.awayScore;
      allowed += fixture.homeScore;
    } else {
      continue;
    }
    games++;
  }

  if (games === 0) return emptyForm();

  const off = round2(scored / games);
  const def = round2(allowed / games);
  return { games, off, def, net: round2(off - def) };
}

/**
 * Blend a team's form with `priorGames` games at the league baseline
 */
export function shrinkForm(form: TeamForm, params: LeagueModelParams): TeamForm {
  const weight = form.games + params.priorGames;
  if (weight === 0) {
    return { games: 0, off: params.baseline, def: params.baseline, net: 0 };
  }
  const off = (form.games * form.off + params.priorGames * params.baseline) / weight;
  const def = (form.games * form.def + params.priorGames * params.baseline) / weight;
  return { games: form.games, off, def, net: off - def };
}

/**
 * Shrunk form for both sides of a fixture
 */
export function buildTeamForms(
  history: readonly Fixture[],
  fixture: Fixture,
  params: LeagueModelParams
): { homeForm: TeamForm; awayForm: TeamForm } {
  return {
    homeForm: shrinkForm(computeEfficiency(history, fixture.home), params),
    awayForm: shrinkForm(computeEfficiency(history, fixture.away), params),
  };
}
