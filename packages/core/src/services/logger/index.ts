/**
 * Logger Service
 *
 * Structured logging with correlation ID tracking, sensitive field
 * redaction, and HTTP request/response logging.
 *
 * @example
 * ```typescript
 * import { getLogger } from '@picks/core/services/logger';
 *
 * const logger = getLogger().child({ league: 'nba' });
 * logger.info('Slate built', { fixtures: 9 });
 * logger.error('Odds lookup failed', { error, fixtureId: 1234 });
 * ```
 *
 * @example Middleware usage with Hono
 * ```typescript
 * app.use('*', createLoggingMiddleware({ getRequestId: (c) => c.get('requestId') }));
 * app.use('*', createLoggerContextMiddleware());
 * ```
 */

export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  generateCorrelationId,
  withCorrelationId,
  getCorrelationId,
  correlationStore,
  isLogLevel,
  redactRecord,
} from "./logger";

export {
  createLoggingMiddleware,
  createLoggerContextMiddleware,
  createRequestLogger,
  getRequestLogger,
  withTiming,
} from "./middleware";
export type { LoggingMiddlewareOptions } from "./middleware";

export type {
  Logger,
  LogLevel,
  LogContext,
  LoggerConfig,
  LogEntry,
  ErrorContext,
  HttpRequestContext,
  HttpResponseContext,
  PerformanceContext,
  ExternalServiceContext,
  CorrelationStore,
} from "./types";

export { DEFAULT_REDACT_FIELDS } from "./types";
