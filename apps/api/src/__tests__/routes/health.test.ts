import { describe, it, expect, vi } from "vitest";
import type { Services } from "../../lib/services";
import { UUID_PATTERN, createTestServices } from "../helpers";

/**
 * Health Routes Tests
 *
 * Banner, health checks and the not-found envelope
 */

const services: Services = createTestServices();

vi.mock("../../lib/services", () => ({
  getServices: () => services,
}));

// Import after mocks are set up
const { app } = await import("../../index");

// ===========================================================================
// Health checks
// ===========================================================================

describe("service health checks", () => {
  it("serves the banner at the root", async () => {
    const res = await app.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ service: "picks-api" });
    expect(res.headers.get("X-Request-ID")).toMatch(UUID_PATTERN);
  });

  it("answers HEAD at the root without a body", async () => {
    const res = await app.request("/", { method: "HEAD" });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("");
  });

  it("reports health", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("answers ping", async () => {
    const res = await app.request("/api/v1/ping");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ pong: true });
  });

  it("issues a fresh request id per request", async () => {
    const first = await app.request("/health");
    const second = await app.request("/health", { headers: { "X-Request-ID": "client-chosen" } });

    expect(second.headers.get("X-Request-ID")).toMatch(UUID_PATTERN);
    expect(second.headers.get("X-Request-ID")).not.toBe(first.headers.get("X-Request-ID"));
  });
});

// ===========================================================================
// Not found
// ===========================================================================

describe("unknown routes", () => {
  it("returns the SYSTEM_NOT_FOUND envelope with the request id", async () => {
    const res = await app.request("/nope");
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body).toEqual({
      success: false,
      error: {
        code: 9001,
        key: "SYSTEM_NOT_FOUND",
        message: "The requested resource was not found.",
        status: 404,
        retryable: false,
        details: { path: "/nope" },
      },
      timestamp: expect.any(String),
      requestId: res.headers.get("X-Request-ID"),
    });
  });
});
