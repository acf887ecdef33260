/**
 * Shared zod schemas for query validation
 */

import { z } from "zod";
import { BET_TYPES, LEAGUES } from "@picks/types";
import type { BetType } from "@picks/types";
import { parseIsoDate } from "./dates";

/**
 * Calendar date in YYYY-MM-DD form
 */
export const isoDateSchema = z
  .string()
  .trim()
  .refine((value) => parseIsoDate(value) !== null, {
    message: "Expected a date in YYYY-MM-DD format",
  });

export const leagueSchema = z.string().trim().toLowerCase().pipe(z.enum(LEAGUES));

export const seasonSchema = z
  .string()
  .trim()
  .regex(/^\d{4}(-\d{4})?$/, "Expected a season like 2024 or 2024-2025");

export const positiveIntSchema = z.coerce.number().int().positive();

function isBetType(value: string): value is BetType {
  return BET_TYPES.some((betType) => betType === value);
}

/**
 * Comma-separated bet types, e.g. "moneyline,spread"
 */
export const betTypesSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const parts = value
      .split(",")
      .map((part) => part.trim().toLowerCase())
      .filter((part) => part !== "");
    const betTypes: BetType[] = [];
    for (const part of parts) {
      if (!isBetType(part)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown bet type "${part}". Expected one of: ${BET_TYPES.join(", ")}`,
        });
        return z.NEVER;
      }
      if (!betTypes.includes(part)) betTypes.push(part);
    }
    return betTypes;
  });

/**
 * Validate date range
 */
export const dateRangeSchema = z
  .object({
    start: isoDateSchema,
    end: isoDateSchema,
  })
  .refine((data) => data.end >= data.start, {
    message: "End date must not be before start date",
  });

/**
 * Accepts "true"/"false"/"1"/"0"
 */
export const booleanQuerySchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");
