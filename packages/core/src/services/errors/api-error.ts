/**
 * PicksApiError - Custom error class for the picks service.
 *
 * Wraps catalog error codes with runtime details and provides a structured
 * JSON response format suitable for API consumers.
 */

import type { ErrorResponse } from "@picks/types";
import {
  ErrorCodes,
  getErrorByCode,
  getHttpStatus,
  isRetryable,
  type ErrorCodeKey,
  type ErrorEntry,
  type ErrorHttpStatus,
} from "./catalog";

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class PicksApiError extends Error {
  /** The catalog error code key. */
  public readonly errorCode: ErrorCodeKey;

  /** The catalog entry for this error. */
  public readonly entry: ErrorEntry;

  /** Optional structured details to include in the response. */
  public readonly details?: Record<string, unknown>;

  /** The original error that caused this one, if any. */
  public override readonly cause?: Error;

  /** Timestamp of error creation (ms since epoch). */
  public readonly timestamp: number;

  constructor(
    errorCode: ErrorCodeKey,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    const entry = ErrorCodes[errorCode];
    super(entry.message);

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "PicksApiError";
    this.errorCode = errorCode;
    this.entry = entry;
    this.details = details;
    this.cause = cause;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PicksApiError);
    }
  }

  /** Numeric error code. */
  get code(): number {
    return this.entry.code;
  }

  /** HTTP status code. */
  get status(): ErrorHttpStatus {
    return getHttpStatus(this.errorCode);
  }

  /** Whether the client should retry. */
  get retryable(): boolean {
    return isRetryable(this.errorCode);
  }

  /**
   * Build the structured API response object.
   *
   * @param requestId - Correlation ID from the request context.
   */
  toResponse(requestId: string): ErrorResponse {
    const details = this.details ? sanitizeDetails(this.details) : {};
    return {
      success: false,
      error: {
        code: this.entry.code,
        key: this.errorCode,
        message: this.entry.message,
        status: this.entry.status,
        retryable: this.entry.retryable,
        ...(Object.keys(details).length > 0 ? { details } : {}),
      },
      timestamp: new Date(this.timestamp).toISOString(),
      requestId,
    };
  }

  /**
   * Build a log-friendly object for structured logging.
   * Includes the stack trace and cause for debugging.
   */
  toLog(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      status: this.entry.status,
      message: this.message,
      retryable: this.entry.retryable,
      details: this.details,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
      stack: this.stack,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      status: this.entry.status,
      message: this.message,
      retryable: this.entry.retryable,
      details: this.details,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }
}

/** Keys that should never appear in API error responses. */
const SENSITIVE_KEYS = new Set([
  "password",
  "secret",
  "token",
  "authorization",
  "cookie",
  "api_key",
  "apikey",
  "apisports_key",
  "x-apisports-key",
]);

/**
 * Strip internal (`_`-prefixed) and sensitive fields from details before
 * including them in an API response.
 */
function sanitizeDetails(details: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    if (key.startsWith("_")) continue;
    if (SENSITIVE_KEYS.has(key.toLowerCase())) continue;
    sanitized[key] = value;
  }
  return sanitized;
}

// ---------------------------------------------------------------------------
// Factory helpers
// ---------------------------------------------------------------------------

export function isPicksApiError(error: unknown): error is PicksApiError {
  return error instanceof PicksApiError;
}

/**
 * Wrap an unknown error as a PicksApiError.
 * PicksApiErrors pass through; anything else becomes SYSTEM_INTERNAL_ERROR.
 */
export function toPicksApiError(error: unknown): PicksApiError {
  if (isPicksApiError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PicksApiError(
      "SYSTEM_INTERNAL_ERROR",
      { _originalMessage: error.message },
      error,
    );
  }

  return new PicksApiError("SYSTEM_INTERNAL_ERROR", {
    _originalMessage: String(error),
  });
}

/**
 * Create a PicksApiError by numeric code.
 * Throws if the code is not found in the catalog.
 */
export function createErrorByCode(
  code: number,
  details?: Record<string, unknown>,
  cause?: Error,
): PicksApiError {
  const entry = getErrorByCode(code);
  if (!entry) {
    throw new Error(`Unknown error code: ${code}`);
  }
  return new PicksApiError(entry.key, details, cause);
}

// ---------------------------------------------------------------------------
// Domain-specific factory functions
// ---------------------------------------------------------------------------

export const ValidationErrors = {
  failed: (fields: Record<string, string>) =>
    new PicksApiError("VALIDATION_FAILED", { fields }),
  invalidLeague: (input: string, expected: readonly string[]) =>
    new PicksApiError("VALIDATION_INVALID_LEAGUE", { input, expected: [...expected] }),
  unknownParams: (operation: string, unknown: string[], allowed: string[]) =>
    new PicksApiError("VALIDATION_UNKNOWN_PARAMS", { operation, unknown, allowed }),
  missingParams: (operation: string, missing: string[], hint?: string) =>
    new PicksApiError("VALIDATION_MISSING_PARAMS", {
      operation,
      missing,
      ...(hint ? { hint } : {}),
    }),
  invalidDateRange: (startDate: string, endDate: string, reason: string) =>
    new PicksApiError("VALIDATION_INVALID_DATE_RANGE", { startDate, endDate, reason }),
  notSupported: (operation: string, league: string, reason?: string) =>
    new PicksApiError("FEATURE_NOT_SUPPORTED", {
      operation,
      league,
      ...(reason ? { reason } : {}),
    }),
} as const;

export const ProviderErrors = {
  http: (status: number, path: string, cause?: Error) =>
    new PicksApiError("PROVIDER_HTTP_ERROR", { providerStatus: status, path }, cause),
  malformed: (status: number, path: string, cause?: Error) =>
    new PicksApiError("PROVIDER_HTTP_ERROR", { providerStatus: status, path, malformed: true }, cause),
  network: (path: string, cause?: Error) =>
    new PicksApiError("PROVIDER_HTTP_ERROR", { path, network: true }, cause),
  rejected: (path: string, errors: Record<string, string>) =>
    new PicksApiError("PROVIDER_REJECTED", { path, errors }),
  rateLimited: (path: string) =>
    new PicksApiError("PROVIDER_RATE_LIMITED", { path }),
  timeout: (path: string, timeoutMs: number) =>
    new PicksApiError("PROVIDER_TIMEOUT", { path, timeoutMs }),
} as const;

export const ConfigErrors = {
  missingApiKey: () => new PicksApiError("CONFIG_MISSING_API_KEY"),
  invalid: (fields: Record<string, string>) =>
    new PicksApiError("CONFIG_INVALID", { fields }),
} as const;

export const SystemErrors = {
  internal: (cause?: Error) =>
    new PicksApiError("SYSTEM_INTERNAL_ERROR", undefined, cause),
  notFound: (path: string) =>
    new PicksApiError("SYSTEM_NOT_FOUND", { path }),
  fixtureNotFound: (league: string, fixtureId: number, date: string) =>
    new PicksApiError("SYSTEM_NOT_FOUND", { league, fixtureId, date }),
  rateLimited: (retryAfterMs: number) =>
    new PicksApiError("SYSTEM_RATE_LIMITED", { retryAfterMs }),
} as const;
