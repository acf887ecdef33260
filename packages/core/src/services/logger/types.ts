/**
 * Logger Types
 *
 * Type definitions for the structured logging system.
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Base context included with every log entry
 */
export interface LogContext {
  /** Unique identifier for tracing requests across services */
  correlationId?: string;
  /** Request identifier */
  requestId?: string;
  /** Service name */
  service?: string;
  /** Environment (development, test, production) */
  environment?: string;
  /** Version of the application */
  version?: string;
  /** Hostname of the server */
  hostname?: string;
  /** League the operation runs for */
  league?: string;
  /** Additional custom fields */
  [key: string]: unknown;
}

/**
 * HTTP request context for request logging
 */
export interface HttpRequestContext {
  method: string;
  path: string;
  url?: string;
  /** Query parameters (sanitized) */
  query?: Record<string, string>;
  /** Request headers (sanitized) */
  headers?: Record<string, string>;
  ip?: string;
  userAgent?: string;
}

/**
 * HTTP response context for response logging
 */
export interface HttpResponseContext {
  statusCode: number;
  /** Response time in milliseconds */
  responseTime: number;
  headers?: Record<string, string>;
  /** Response size in bytes */
  contentLength?: number;
}

/**
 * Error context for error logging
 */
export interface ErrorContext {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
}

/**
 * Performance timing context
 */
export interface PerformanceContext {
  operation: string;
  /** Duration in milliseconds */
  duration: number;
  startTime?: number;
  endTime?: number;
  success?: boolean;
}

/**
 * Upstream provider call context
 */
export interface ExternalServiceContext {
  /** Provider name */
  service: string;
  /** Endpoint/path called */
  endpoint?: string;
  /** Request duration in milliseconds */
  duration?: number;
  statusCode?: number;
  success?: boolean;
  /** Retry attempt number */
  retryAttempt?: number;
  /** Served from cache */
  cached?: boolean;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  serviceName: string;
  environment: string;
  version?: string;
  /** Pretty print logs (development only) */
  prettyPrint?: boolean;
  timestamp?: boolean;
  /** Fields to redact from logs */
  redactFields?: string[];
  defaultContext?: LogContext;
}

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;
  fatal(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;

  /** Create a child logger with additional context */
  child(context: LogContext): Logger;

  timing(context: PerformanceContext & LogContext): void;

  httpRequest(request: HttpRequestContext, context?: LogContext): void;

  httpResponse(
    request: HttpRequestContext,
    response: HttpResponseContext,
    context?: LogContext
  ): void;

  /** Log an upstream provider call */
  externalService(context: ExternalServiceContext & LogContext): void;

  flush(): Promise<void>;
}

/**
 * Correlation ID store for async context tracking
 */
export interface CorrelationStore {
  get(): string | undefined;
  run<T>(correlationId: string, fn: () => T): T;
}

/**
 * Default sensitive fields to redact
 */
export const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "apiKey",
  "api_key",
  "apisportsKey",
  "apisports_key",
  "x-apisports-key",
  "APISPORTS_KEY",
  "accessToken",
  "access_token",
  "token",
  "authorization",
  "Authorization",
  "cookie",
  "UPSTASH_REDIS_REST_TOKEN",
];

/**
 * Log entry structure (for JSON output)
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  environment: string;
  version?: string;
  hostname?: string;
  correlationId?: string;
  requestId?: string;
  error?: ErrorContext;
  request?: HttpRequestContext;
  response?: HttpResponseContext;
  performance?: PerformanceContext;
  externalService?: ExternalServiceContext;
  [key: string]: unknown;
}
