/**
 * HTTP Request Logging Middleware
 *
 * Hono middleware for logging requests and responses with correlation ID
 * tracking and timing.
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import {
  getLogger,
  generateCorrelationId,
  withCorrelationId,
  getCorrelationId,
} from "./logger";
import type {
  Logger,
  HttpRequestContext,
  HttpResponseContext,
  LogContext,
} from "./types";

declare module "hono" {
  interface ContextVariableMap {
    logger: Logger;
    requestId: string;
  }
}

export interface LoggingMiddlewareOptions {
  /** Custom logger instance */
  logger?: Logger;
  /** Path prefixes to exclude from logging */
  excludePaths?: string[];
  /** Skip logging for health checks */
  skipHealthChecks?: boolean;
  getCorrelationId?: (c: Context) => string | undefined;
  getRequestId?: (c: Context) => string | undefined;
}

const HEALTH_PATHS = new Set(["/health", "/api/v1/ping"]);

const ALLOWED_HEADERS = [
  "content-type",
  "content-length",
  "accept",
  "user-agent",
  "x-request-id",
  "x-correlation-id",
  "x-forwarded-for",
  "x-real-ip",
];

function extractRequestContext(c: Context): HttpRequestContext {
  const url = new URL(c.req.url);

  const query: Record<string, string> = {};
  url.searchParams.forEach((value, key) => {
    query[key] = value;
  });

  const headers: Record<string, string> = {};
  for (const header of ALLOWED_HEADERS) {
    const value = c.req.header(header);
    if (value) {
      headers[header] = value;
    }
  }

  const ip =
    c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
    c.req.header("x-real-ip") ||
    "unknown";

  return {
    method: c.req.method,
    path: url.pathname,
    url: url.href,
    query: Object.keys(query).length > 0 ? query : undefined,
    headers,
    ip,
    userAgent: c.req.header("user-agent"),
  };
}

/**
 * Create HTTP request logging middleware for Hono
 */
export function createLoggingMiddleware(
  options: LoggingMiddlewareOptions = {}
): MiddlewareHandler {
  const { excludePaths = [], skipHealthChecks = true } = options;

  return async (c: Context, next: Next) => {
    const logger = options.logger || getLogger();
    const path = new URL(c.req.url).pathname;
    if (excludePaths.some((p) => path.startsWith(p))) {
      return next();
    }
    if (skipHealthChecks && HEALTH_PATHS.has(path)) {
      return next();
    }

    const correlationId =
      options.getCorrelationId?.(c) ||
      c.req.header("x-correlation-id") ||
      generateCorrelationId();

    c.header("X-Correlation-ID", correlationId);

    return withCorrelationId(correlationId, async () => {
      const startTime = performance.now();
      const requestContext = extractRequestContext(c);
      const requestId = options.getRequestId?.(c) || c.req.header("x-request-id");

      const logContext: LogContext = { correlationId, requestId };

      logger.httpRequest(requestContext, logContext);

      let responseError: Error | undefined;
      try {
        await next();
      } catch (error) {
        responseError = error instanceof Error ? error : new Error(String(error));
        throw error;
      } finally {
        const responseTime = Math.round((performance.now() - startTime) * 100) / 100;

        const responseContext: HttpResponseContext = {
          statusCode: c.res.status,
          responseTime,
          contentLength: parseInt(c.res.headers.get("content-length") || "0", 10),
        };

        logger.httpResponse(requestContext, responseContext, {
          ...logContext,
          ...(responseError && { error: responseError }),
        });
      }
    });
  };
}

/**
 * Create a child logger for a specific request
 */
export function createRequestLogger(c: Context, baseLogger?: Logger): Logger {
  const logger = baseLogger || getLogger();
  const correlationId = getCorrelationId() || c.req.header("x-correlation-id");
  const requestId = c.get("requestId") || c.req.header("x-request-id");

  return logger.child({ correlationId, requestId });
}

/**
 * Middleware to attach a request-scoped logger to the context
 */
export function createLoggerContextMiddleware(logger?: Logger): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    c.set("logger", createRequestLogger(c, logger));
    await next();
  };
}

export function getRequestLogger(c: Context): Logger {
  return c.get("logger") || getLogger();
}

/**
 * Run an async operation and log its duration
 */
export async function withTiming<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const startTime = performance.now();
  let success = true;

  try {
    return await fn();
  } catch (error) {
    success = false;
    throw error;
  } finally {
    const endTime = performance.now();
    logger.timing({
      operation,
      duration: Math.round((endTime - startTime) * 100) / 100,
      startTime,
      endTime,
      success,
      ...context,
    });
  }
}
