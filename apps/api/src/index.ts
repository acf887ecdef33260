/**
 * Picks API
 *
 * Hono app serving picks, backtests, data lookups and vendor listings.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { timing } from "hono/timing";
import { createLoggerContextMiddleware, createLoggingMiddleware } from "@picks/core";
import type { Logger } from "@picks/core";

import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { createRateLimitMiddleware } from "./middleware/rate-limit";
import { requestIdMiddleware } from "./middleware/request-id";
import { backtestRoutes } from "./routes/backtest";
import { dataRoutes } from "./routes/data";
import { healthRoutes } from "./routes/health";
import { picksRoutes } from "./routes/picks";
import { vendorRoutes } from "./routes/vendor";

// Types
export type Env = {
  Variables: {
    requestId: string;
    logger: Logger;
  };
};

const HEALTH_PATHS = ["/", "/health", "/api/v1/ping"];

const app = new Hono<Env>();

// Global middleware
app.use("*", timing());
app.use("*", secureHeaders());
app.use(
  "*",
  cors({
    origin: "*",
    allowMethods: ["GET", "HEAD", "OPTIONS"],
    allowHeaders: ["Content-Type", "X-Request-ID", "X-Correlation-ID"],
    exposeHeaders: [
      "X-Request-ID",
      "X-Correlation-ID",
      "X-RateLimit-Limit",
      "X-RateLimit-Remaining",
      "Retry-After",
    ],
    maxAge: 86400,
  })
);
app.use("*", requestIdMiddleware);
app.use("*", createLoggingMiddleware({ getRequestId: (c) => c.get("requestId") }));
app.use("*", createLoggerContextMiddleware());

// Rate limiting (Upstash; off when not configured)
app.use("*", createRateLimitMiddleware("default", { skipPaths: [...HEALTH_PATHS, "/backtest"] }));
app.use("/backtest", createRateLimitMiddleware("backtest"));

// Routes
app.route("/", healthRoutes);
app.route("/picks", picksRoutes);
app.route("/backtest", backtestRoutes);
app.route("/data", dataRoutes);
app.route("/vendor", vendorRoutes);

app.notFound(notFoundHandler);
app.onError(errorHandler);

export { app };
