/**
 * Request validation for the data endpoints
 */

import { LEAGUES } from "@picks/types";
import type { League } from "@picks/types";
import { OPERATIONS, oddsParamFor } from "../api-sports/endpoints";
import { ValidationErrors } from "../errors";

export type DataOperation = "injuries" | "odds";

function isLeague(value: string): value is League {
  return LEAGUES.some((league) => league === value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "" && value !== 0;
}

/**
 * Params a caller may forward for an upstream operation. Paging and the
 * fixture id on `/odds` are filled in by the provider.
 */
export function allowedParams(league: League, operation: DataOperation): readonly string[] {
  const spec = OPERATIONS[league][operation];
  if (!spec) return [];
  const supplied = new Set(["page", oddsParamFor(league)]);
  return [...spec.required, ...spec.optional].filter((key) => !supplied.has(key));
}

/**
 * Exact match against the supported leagues
 */
export function validateLeague(input: string): League {
  if (!isLeague(input)) {
    throw ValidationErrors.invalidLeague(input, [...LEAGUES].sort());
  }
  return input;
}

/**
 * Reject params the league/operation does not forward upstream
 */
export function rejectUnknownParams(
  league: League,
  operation: DataOperation,
  params: Record<string, unknown>
): void {
  const allowed = allowedParams(league, operation);
  const unknown = Object.keys(params)
    .filter((key) => params[key] !== undefined && !allowed.includes(key))
    .sort();
  if (unknown.length > 0) {
    throw ValidationErrors.unknownParams(operation, unknown, [...allowed].sort());
  }
}

export function ensureRequiredParams(
  operation: string,
  required: readonly string[],
  params: Record<string, unknown>,
  hint?: string
): void {
  const missing = required.filter((key) => !isPresent(params[key])).sort();
  if (missing.length > 0) {
    throw ValidationErrors.missingParams(operation, missing, hint);
  }
}
