/**
 * API Response Types
 * Standard envelopes returned by the picks API
 */

/** Standard API response wrapper */
export interface ApiResponse<T> {
  success: true;
  data: T;
  timestamp: string;
  requestId: string;
}

/** Error response */
export interface ErrorResponse {
  success: false;
  error: ApiError;
  timestamp: string;
  requestId: string;
}

/** API error details */
export interface ApiError {
  /** Numeric catalog code */
  code: number;
  /** Machine-readable key, e.g. "VALIDATION_INVALID_LEAGUE" */
  key: string;
  message: string;
  status: number;
  retryable: boolean;
  details?: Record<string, unknown>;
}
