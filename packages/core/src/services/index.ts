/**
 * Core services
 *
 * - Logger: structured logging with correlation ids
 * - Errors: error catalog and PicksApiError
 * - Cache: in-memory and Upstash response caches
 * - API-SPORTS: client, parsing and sports data providers
 * - Odds: price conversion, market classification and normalization
 * - Picks: score models, Picks Engine, slates and backtests
 * - Data: injuries, history, odds, resolution and listings
 */

export * as logger from "./logger";
export {
  createLogger,
  getLogger,
  initLogger,
  withCorrelationId,
  getCorrelationId,
  createLoggingMiddleware,
  createLoggerContextMiddleware,
  getRequestLogger,
  withTiming,
} from "./logger";
export type { Logger, LogLevel, LogContext, LoggerConfig } from "./logger";

export * from "./errors";
export * from "./cache";
export * from "./api-sports";
export * from "./odds";
export * from "./picks";
export * from "./data";
