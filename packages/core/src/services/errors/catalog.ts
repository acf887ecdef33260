/**
 * Picks API Error Catalog
 *
 * Centralized error definitions. Each error has a unique numeric code,
 * an HTTP status and a user-facing message.
 *
 * Code ranges:
 *   1xxx - Request validation
 *   2xxx - Upstream sports data provider
 *   3xxx - Configuration
 *   9xxx - System & Infrastructure
 */

// ---------------------------------------------------------------------------
// Error entry shape
// ---------------------------------------------------------------------------

export interface ErrorEntry {
  /** Unique numeric error code. */
  readonly code: number;
  /** HTTP status code to return in API responses. */
  readonly status: number;
  /** User-facing message (safe to display in UI). */
  readonly message: string;
  /** Whether this error should be retried by the client. */
  readonly retryable: boolean;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const ErrorCodes = {
  // ==========================================================================
  // 1xxx - Request validation
  // ==========================================================================
  VALIDATION_FAILED: {
    code: 1001,
    status: 422,
    message: "The request parameters are invalid.",
    retryable: false,
  },
  VALIDATION_INVALID_LEAGUE: {
    code: 1002,
    status: 422,
    message: "Invalid league.",
    retryable: false,
  },
  VALIDATION_UNKNOWN_PARAMS: {
    code: 1003,
    status: 422,
    message: "Unknown query parameter(s) for operation.",
    retryable: false,
  },
  VALIDATION_MISSING_PARAMS: {
    code: 1004,
    status: 422,
    message: "Missing required parameter(s).",
    retryable: false,
  },
  VALIDATION_INVALID_DATE_RANGE: {
    code: 1005,
    status: 422,
    message: "The date range is invalid.",
    retryable: false,
  },
  FEATURE_NOT_SUPPORTED: {
    code: 1006,
    status: 501,
    message: "This operation is not supported for the requested league.",
    retryable: false,
  },

  // ==========================================================================
  // 2xxx - Upstream provider
  // ==========================================================================
  PROVIDER_HTTP_ERROR: {
    code: 2001,
    status: 502,
    message: "The sports data provider returned an error.",
    retryable: true,
  },
  PROVIDER_REJECTED: {
    code: 2002,
    status: 502,
    message: "The sports data provider rejected the request.",
    retryable: false,
  },
  PROVIDER_RATE_LIMITED: {
    code: 2003,
    status: 429,
    message: "The sports data provider rate limit was reached. Please retry shortly.",
    retryable: true,
  },
  PROVIDER_TIMEOUT: {
    code: 2004,
    status: 504,
    message: "The sports data provider did not respond in time.",
    retryable: true,
  },

  // ==========================================================================
  // 3xxx - Configuration
  // ==========================================================================
  CONFIG_MISSING_API_KEY: {
    code: 3001,
    status: 500,
    message: "APISPORTS_KEY missing",
    retryable: false,
  },
  CONFIG_INVALID: {
    code: 3002,
    status: 500,
    message: "The service configuration is invalid.",
    retryable: false,
  },

  // ==========================================================================
  // 9xxx - System
  // ==========================================================================
  SYSTEM_NOT_FOUND: {
    code: 9001,
    status: 404,
    message: "The requested resource was not found.",
    retryable: false,
  },
  SYSTEM_RATE_LIMITED: {
    code: 9002,
    status: 429,
    message: "Rate limit exceeded. Please try again later.",
    retryable: true,
  },
  SYSTEM_INTERNAL_ERROR: {
    code: 9003,
    status: 500,
    message: "An unexpected error occurred.",
    retryable: true,
  },
} as const satisfies Record<string, ErrorEntry>;

// ---------------------------------------------------------------------------
// Derived types
// ---------------------------------------------------------------------------

/** Union of all error code keys. */
export type ErrorCodeKey = keyof typeof ErrorCodes;

/** Union of all numeric error codes. */
export type NumericErrorCode = (typeof ErrorCodes)[ErrorCodeKey]["code"];

/** Union of all HTTP status codes used in the catalog. */
export type ErrorHttpStatus = (typeof ErrorCodes)[ErrorCodeKey]["status"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isErrorCodeKey(key: string): key is ErrorCodeKey {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, key);
}

const ERROR_CODE_KEYS: ErrorCodeKey[] = Object.keys(ErrorCodes).filter(isErrorCodeKey);

/** Lookup an error entry by its numeric code. */
export function getErrorByCode(code: number): (ErrorEntry & { key: ErrorCodeKey }) | undefined {
  for (const key of ERROR_CODE_KEYS) {
    const entry = ErrorCodes[key];
    if (entry.code === code) {
      return { ...entry, key };
    }
  }
  return undefined;
}

/** Get all error codes in a specific domain (by code range). */
export function getErrorsByDomain(
  domain: "validation" | "provider" | "config" | "system",
): Array<ErrorEntry & { key: ErrorCodeKey }> {
  const ranges: Record<typeof domain, [number, number]> = {
    validation: [1000, 1999],
    provider: [2000, 2999],
    config: [3000, 3999],
    system: [9000, 9999],
  };

  const [min, max] = ranges[domain];
  return ERROR_CODE_KEYS.filter((key) => {
    const { code } = ErrorCodes[key];
    return code >= min && code <= max;
  }).map((key) => ({ ...ErrorCodes[key], key }));
}

/** Check if an error code key is retryable. */
export function isRetryable(errorCode: ErrorCodeKey): boolean {
  return ErrorCodes[errorCode].retryable;
}

/** Get the HTTP status for an error code key. */
export function getHttpStatus(errorCode: ErrorCodeKey): ErrorHttpStatus {
  return ErrorCodes[errorCode].status;
}
