/**
 * API Error Catalog & Error Handling
 *
 * - Error catalog covering validation, provider, configuration and system errors
 * - Type-safe error construction with PicksApiError
 * - Domain-specific factory functions
 */

export {
  ErrorCodes,
  getErrorByCode,
  getErrorsByDomain,
  isErrorCodeKey,
  isRetryable,
  getHttpStatus,
  type ErrorEntry,
  type ErrorCodeKey,
  type NumericErrorCode,
  type ErrorHttpStatus,
} from "./catalog";

export {
  PicksApiError,
  isPicksApiError,
  toPicksApiError,
  createErrorByCode,
  ValidationErrors,
  ProviderErrors,
  ConfigErrors,
  SystemErrors,
} from "./api-error";
