/**
 * Fixture resolution by team names
 */

import type { Fixture, ResolveCandidate, ResolveResult } from "@picks/types";

const MAX_CANDIDATES = 5;

export const RESOLVE_REASONS = {
  noFixtures: "No fixtures found for date.",
  highConfidence: "High-confidence team match.",
  lowConfidence: "Low confidence; confirm selection.",
  singleTeam: "Single-team match.",
  notEnoughInfo: "Not enough info; confirm selection.",
} as const;

/** Lowercase alphanumerics only */
export function normalizeName(name: string | null | undefined): string {
  return name ? name.toLowerCase().replace(/[^a-z0-9]/g, "") : "";
}

/** +2 for an exact name match, +1 when the wanted name is contained */
function nameScore(wanted: string, actual: string): number {
  if (!wanted) return 0;
  if (wanted === actual) return 2;
  return actual.includes(wanted) ? 1 : 0;
}

export function scoreFixture(fixture: Fixture, home: string, away: string): number {
  return (
    nameScore(home, normalizeName(fixture.home.name)) +
    nameScore(away, normalizeName(fixture.away.name))
  );
}

/**
 * Pick the fixture matching the given team names.
 * With both names a score of 3 is required; with one name a score of 1.
 */
export function resolveFromFixtures(
  fixtures: readonly Fixture[],
  home?: string,
  away?: string
): ResolveResult {
  if (fixtures.length === 0) {
    return { fixtureId: null, candidates: [], pickedReason: RESOLVE_REASONS.noFixtures };
  }

  const wantHome = normalizeName(home);
  const wantAway = normalizeName(away);

  const scored: ResolveCandidate[] = fixtures.map((fixture) => ({
    fixtureId: fixture.fixtureId,
    date: fixture.date,
    home: fixture.home.name,
    away: fixture.away.name,
    score: scoreFixture(fixture, wantHome, wantAway),
  }));
  // Array.prototype.sort is stable: ties keep provider order
  scored.sort((a, b) => b.score - a.score);

  const best = scored[0];
  const candidates = scored.slice(0, MAX_CANDIDATES);

  if (wantHome && wantAway) {
    return best.score >= 3
      ? { fixtureId: best.fixtureId, candidates, pickedReason: RESOLVE_REASONS.highConfidence }
      : { fixtureId: null, candidates, pickedReason: RESOLVE_REASONS.lowConfidence };
  }
  return best.score >= 1
    ? { fixtureId: best.fixtureId, candidates, pickedReason: RESOLVE_REASONS.singleTeam }
    : { fixtureId: null, candidates, pickedReason: RESOLVE_REASONS.notEnoughInfo };
}
