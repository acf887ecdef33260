/**
 * API-SPORTS payload schemas
 *
 * Upstream payloads are loose; schemas accept what the three sport families
 * send and pass unknown fields through.
 */

import { z } from "zod";
import type { CacheStore } from "../cache";
import type { Logger } from "../logger";
import type { SportFamily } from "./endpoints";

// ============================================================================
// Envelope
// ============================================================================

export const envelopeSchema = z
  .object({
    get: z.string().optional(),
    parameters: z.unknown().optional(),
    /** `[]` when fine, `{ token: "..." }` style map on errors */
    errors: z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]).optional(),
    results: z.number().optional(),
    paging: z
      .object({
        current: z.coerce.number().optional(),
        total: z.coerce.number().optional(),
      })
      .nullish(),
    response: z.unknown().optional(),
  })
  .passthrough();

export type ApiSportsEnvelope = z.infer<typeof envelopeSchema>;

/** `response` as a list; object-valued responses (team statistics) yield [] */
export function responseItems(envelope: ApiSportsEnvelope): unknown[] {
  return Array.isArray(envelope.response) ? envelope.response : [];
}

// ============================================================================
// Fixtures
// ============================================================================

const numericId = z.union([z.number(), z.string().regex(/^\d+$/)]).transform(Number);

const statusSchema = z
  .object({
    short: z.string().nullish(),
    long: z.string().nullish(),
  })
  .passthrough();

export const rawTeamSchema = z
  .object({
    id: numericId.nullish(),
    name: z.string().nullish(),
    code: z.string().nullish(),
  })
  .passthrough();

export type RawTeam = z.infer<typeof rawTeamSchema>;

const teamsSchema = z
  .object({
    home: rawTeamSchema.nullish(),
    away: rawTeamSchema.nullish(),
  })
  .passthrough();

const scoresSchema = z
  .object({
    home: z.unknown().optional(),
    away: z.unknown().optional(),
  })
  .passthrough();

export const basketballGameSchema = z
  .object({
    id: numericId,
    date: z.string().nullish(),
    status: statusSchema.nullish(),
    teams: teamsSchema.nullish(),
    scores: scoresSchema.nullish(),
  })
  .passthrough();

export const americanFootballGameSchema = z
  .object({
    game: z
      .object({
        id: numericId,
        date: z
          .union([
            z.string(),
            z
              .object({
                date: z.string().nullish(),
                time: z.string().nullish(),
                timestamp: z.number().nullish(),
              })
              .passthrough(),
          ])
          .nullish(),
        status: statusSchema.nullish(),
      })
      .passthrough(),
    teams: teamsSchema.nullish(),
    scores: scoresSchema.nullish(),
  })
  .passthrough();

export const soccerFixtureSchema = z
  .object({
    fixture: z
      .object({
        id: numericId,
        date: z.string().nullish(),
        status: statusSchema.nullish(),
      })
      .passthrough(),
    teams: teamsSchema.nullish(),
    goals: scoresSchema.nullish(),
  })
  .passthrough();

// ============================================================================
// Odds
// ============================================================================

export const rawOddValueSchema = z
  .object({
    value: z.union([z.string(), z.number()]).nullish(),
    odd: z.union([z.string(), z.number()]).nullish(),
    handicap: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

export const rawBetSchema = z
  .object({
    id: numericId.nullish(),
    name: z.string().nullish(),
    values: z.array(rawOddValueSchema).nullish(),
  })
  .passthrough();

export const rawBookmakerSchema = z
  .object({
    id: numericId.nullish(),
    name: z.string().nullish(),
    bets: z.array(rawBetSchema).nullish(),
  })
  .passthrough();

export const rawOddsNodeSchema = z
  .object({
    bookmakers: z.array(rawBookmakerSchema).nullish(),
  })
  .passthrough();

export type RawOddValue = z.infer<typeof rawOddValueSchema>;
export type RawBet = z.infer<typeof rawBetSchema>;
export type RawBookmaker = z.infer<typeof rawBookmakerSchema>;

// ============================================================================
// Client
// ============================================================================

export type QueryParams = Record<string, string | number | undefined>;

export interface ApiSportsClientConfig {
  apiKey: string;
  bases?: Partial<Record<SportFamily, string>>;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Retries after the first attempt for 429/502/503/504 and network errors */
  maxRetries?: number;
  /** First retry delay; doubles per attempt */
  backoffMs?: number;
  /** Client-side throttle */
  requestsPerMinute?: number;
  cache?: CacheStore;
  cacheTtlSeconds?: number;
  logger?: Logger;
}

export interface FixtureQuery {
  date?: string;
  from?: string;
  to?: string;
  season?: string | number;
  /** Competition id override */
  leagueId?: number;
  timezone?: string;
  /** Stop after this many fixtures */
  limit?: number;
}
