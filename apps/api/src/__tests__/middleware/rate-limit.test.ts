import { describe, it, expect, vi, afterEach } from "vitest";
import { Hono } from "hono";
import type { Env } from "../../index";
import { errorHandler } from "../../middleware/error-handler";
import {
  createRateLimitMiddleware,
  resetRateLimiters,
  type RateLimitOptions,
  type RateLimitResult,
  type RateLimiters,
} from "../../middleware/rate-limit";
import { requestIdMiddleware } from "../../middleware/request-id";
import { at } from "../helpers";

/**
 * Rate Limit Middleware Tests
 */

const NOW = Date.parse("2025-01-15T12:00:00Z");

type Config = NonNullable<RateLimitOptions["config"]>;

const testConfig: Config = { upstash: null, nodeEnv: "test", trustProxy: true };

function fakeLimiters(result: Partial<RateLimitResult> = {}) {
  const limit = vi.fn(async (_identifier: string): Promise<RateLimitResult> => ({
    success: true,
    limit: 60,
    remaining: 59,
    reset: NOW + 60_000,
    ...result,
  }));
  const limiters: RateLimiters = { default: { limit }, backtest: { limit } };
  return { limiters, limit };
}

function createApp(options: RateLimitOptions) {
  const app = new Hono<Env>();
  app.use("*", requestIdMiddleware);
  app.use("*", createRateLimitMiddleware("default", { skipPaths: ["/health"], ...options }));
  app.get("/picks", (c) => c.json({ ok: true }));
  app.get("/health", (c) => c.json({ status: "ok" }));
  app.onError(errorHandler);
  return app;
}

afterEach(() => {
  vi.useRealTimers();
  resetRateLimiters();
});

describe("createRateLimitMiddleware", () => {
  it("sets rate limit headers and keys on the forwarded client ip", async () => {
    const { limiters, limit } = fakeLimiters();
    const app = createApp({ limiters, config: testConfig });

    const res = await app.request("/picks", {
      headers: { "X-Forwarded-For": "203.0.113.7, 10.0.0.1" },
    });

    expect(res.status).toBe(200);
    expect(limit).toHaveBeenCalledWith("ip:203.0.113.7");
    expect(res.headers.get("X-RateLimit-Limit")).toBe("60");
    expect(res.headers.get("X-RateLimit-Remaining")).toBe("59");
    expect(res.headers.get("X-RateLimit-Reset")).toBe(String(NOW + 60_000));
  });

  it("ignores proxy headers unless TRUST_PROXY is set", async () => {
    const { limiters, limit } = fakeLimiters();
    const app = createApp({ limiters, config: { ...testConfig, trustProxy: false } });

    await app.request("/picks", { headers: { "X-Forwarded-For": "203.0.113.7" } });

    expect(limit).toHaveBeenCalledWith("ip:unknown");
  });

  it("answers 429 with Retry-After once the window is spent", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
    const { limiters } = fakeLimiters({ success: false, remaining: 0, reset: NOW + 30_000 });
    const app = createApp({ limiters, config: testConfig });

    const res = await app.request("/picks");
    const body = await res.json();

    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBe("30");
    expect(res.headers.get("X-RateLimit-Remaining")).toBe("0");
    expect(at(body, "error")).toMatchObject({
      code: 9002,
      key: "SYSTEM_RATE_LIMITED",
      retryable: true,
      details: { retryAfterMs: 30_000 },
    });
    expect(at(body, "requestId")).toBe(res.headers.get("X-Request-ID"));
  });

  it("lets requests through when the limiter store fails", async () => {
    const limit = vi.fn(async (): Promise<RateLimitResult> => {
      throw new Error("connection refused");
    });
    const app = createApp({
      limiters: { default: { limit }, backtest: { limit } },
      config: testConfig,
    });

    const res = await app.request("/picks");

    expect(res.status).toBe(200);
    expect(res.headers.get("X-RateLimit-Limit")).toBeNull();
  });

  it("does not count skipped paths", async () => {
    const { limiters, limit } = fakeLimiters();
    const app = createApp({ limiters, config: testConfig });

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(limit).not.toHaveBeenCalled();
  });

  it("is off when Upstash is not configured", async () => {
    const app = createApp({ config: testConfig });

    const res = await app.request("/picks");

    expect(res.status).toBe(200);
    expect(res.headers.get("X-RateLimit-Limit")).toBeNull();
  });
});
