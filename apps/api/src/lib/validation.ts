/**
 * Query validation
 *
 * zValidator bound to the query target. Failures are thrown as
 * VALIDATION_FAILED so the error handler renders them like every other error.
 */

import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { ZodError, ZodSchema } from "zod";
import {
  booleanQuerySchema,
  isoDateSchema,
  positiveIntSchema,
  seasonSchema,
  ValidationErrors,
} from "@picks/core";

export function fieldErrors(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "query";
    fields[key] ??= issue.message;
  }
  return fields;
}

export const validateQuery = <T extends ZodSchema>(schema: T) =>
  zValidator("query", schema, (result) => {
    if (!result.success) {
      throw ValidationErrors.failed(fieldErrors(result.error));
    }
  });

// ============================================================================
// Shared query fields
// ============================================================================

/** League as typed by the caller; checked against the supported leagues in the route */
export const leagueField = z.string().trim().toLowerCase();

export const dateField = isoDateSchema;

/** Season as a number or a span, e.g. 2024 or 2024-2025 */
export const seasonField = seasonSchema.optional();

export const idField = positiveIntSchema;

export const flagField = booleanQuerySchema.optional();
