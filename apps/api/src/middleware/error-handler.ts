import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { SystemErrors, ValidationErrors, getRequestLogger, toPicksApiError } from "@picks/core";
import type { PicksApiError } from "@picks/core";
import type { Env } from "../index";
import { captureException } from "../lib/sentry";

function requestIdOf(c: Context<Env>): string {
  return c.get("requestId") ?? "unknown";
}

/**
 * Framework exceptions mapped onto the catalog
 */
function fromHttpException(error: HTTPException, path: string): PicksApiError {
  if (error.status === 404) return SystemErrors.notFound(path);
  if (error.status >= 400 && error.status < 500) {
    return ValidationErrors.failed({ request: error.message || "Bad request" });
  }
  return SystemErrors.internal(error);
}

export const errorHandler: ErrorHandler<Env> = (err, c) => {
  const apiError =
    err instanceof HTTPException ? fromHttpException(err, c.req.path) : toPicksApiError(err);
  const requestId = requestIdOf(c);
  const logger = getRequestLogger(c);

  if (apiError.status >= 500) {
    logger.error("Request failed", {
      requestId,
      path: c.req.path,
      errorCode: apiError.code,
      error: err,
    });
    captureException(err, {
      requestId,
      path: c.req.path,
      method: c.req.method,
      errorCode: apiError.code,
    });
  } else {
    logger.warn("Request rejected", {
      requestId,
      path: c.req.path,
      errorCode: apiError.code,
      status: apiError.status,
    });
  }

  if (apiError.errorCode === "SYSTEM_RATE_LIMITED") {
    const retryAfterMs = apiError.details?.retryAfterMs;
    if (typeof retryAfterMs === "number") {
      c.header("Retry-After", String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
    }
  }

  return c.json(apiError.toResponse(requestId), apiError.status);
};

export const notFoundHandler: NotFoundHandler<Env> = (c) => {
  const error = SystemErrors.notFound(c.req.path);
  return c.json(error.toResponse(requestIdOf(c)), error.status);
};
