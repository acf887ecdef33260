import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import { SystemErrors, getLogger } from "@picks/core";
import type { AppConfig } from "@picks/core";
import type { Env } from "../index";
import { getServices } from "../lib/services";

export type RateLimitTier = "default" | "backtest";

export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/** The part of Upstash's Ratelimit the middleware calls */
export interface RateLimiter {
  limit(identifier: string): Promise<RateLimitResult>;
}

export type RateLimiters = Record<RateLimitTier, RateLimiter>;

export interface RateLimitOptions {
  /** Limiters to use instead of the Upstash ones built from config */
  limiters?: RateLimiters;
  /** Config to read; defaults to the service container's */
  config?: Pick<AppConfig, "upstash" | "nodeEnv" | "trustProxy">;
  /** Exact paths the limiter does not count */
  skipPaths?: readonly string[];
}

let upstashLimiters: RateLimiters | null | undefined;

function createUpstashLimiters(config: Pick<AppConfig, "upstash" | "nodeEnv">): RateLimiters | null {
  if (!config.upstash) {
    if (config.nodeEnv === "production") {
      getLogger().warn("Upstash is not configured in production; rate limiting is disabled");
    }
    return null;
  }

  const redis = new Redis({ url: config.upstash.url, token: config.upstash.token });
  return {
    // Slates and lookups: 60 requests per minute
    default: new Ratelimit({
      redis,
      limiter: Ratelimit.slidingWindow(60, "1 m"),
      prefix: "picks:ratelimit:default",
    }),
    // Backtests replay whole date ranges upstream: 5 per minute
    backtest: new Ratelimit({
      redis,
      limiter: Ratelimit.slidingWindow(5, "1 m"),
      prefix: "picks:ratelimit:backtest",
    }),
  };
}

function limitersFor(config: Pick<AppConfig, "upstash" | "nodeEnv">): RateLimiters | null {
  if (upstashLimiters === undefined) {
    upstashLimiters = createUpstashLimiters(config);
  }
  return upstashLimiters;
}

/**
 * Proxy headers are only trusted when TRUST_PROXY is set
 */
export function clientIdentifier(c: Context<Env>, trustProxy: boolean): string {
  if (!trustProxy) return "ip:unknown";
  const ip =
    c.req.header("CF-Connecting-IP") ??
    c.req.header("X-Forwarded-For")?.split(",")[0]?.trim() ??
    c.req.header("X-Real-IP");
  return ip ? `ip:${ip}` : "ip:unknown";
}

export function createRateLimitMiddleware(tier: RateLimitTier, options: RateLimitOptions = {}) {
  const skipPaths = new Set(options.skipPaths ?? []);

  return createMiddleware<Env>(async (c, next) => {
    if (skipPaths.has(c.req.path)) {
      await next();
      return;
    }

    const config = options.config ?? getServices().config;
    if (config.nodeEnv === "development" && !options.limiters) {
      await next();
      return;
    }

    const limiters = options.limiters ?? limitersFor(config);
    if (!limiters) {
      await next();
      return;
    }

    const identifier = clientIdentifier(c, config.trustProxy);

    let result: RateLimitResult;
    try {
      result = await limiters[tier].limit(identifier);
    } catch (error) {
      // Fail open: the limiter store being down must not take the API with it
      getLogger().error("Rate limit check failed, allowing through", {
        tier,
        identifier,
        path: c.req.path,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      await next();
      return;
    }

    c.header("X-RateLimit-Limit", result.limit.toString());
    c.header("X-RateLimit-Remaining", result.remaining.toString());
    c.header("X-RateLimit-Reset", result.reset.toString());

    if (!result.success) {
      const retryAfterMs = Math.max(0, result.reset - Date.now());
      const error = SystemErrors.rateLimited(retryAfterMs);
      c.header("Retry-After", Math.max(1, Math.ceil(retryAfterMs / 1000)).toString());
      return c.json(error.toResponse(c.get("requestId")), error.status);
    }

    await next();
  });
}

export function resetRateLimiters(): void {
  upstashLimiters = undefined;
}
