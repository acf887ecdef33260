import { describe, it, expect, vi, beforeEach } from "vitest";
import type { MockInstance } from "vitest";
import {
  createLogger,
  getCorrelationId,
  redactRecord,
  withCorrelationId,
  type LoggerConfig,
} from "../../services/logger";

/**
 * Logger Tests
 */

const config: LoggerConfig = {
  level: "info",
  serviceName: "picks-api",
  environment: "test",
  version: "1.0.0",
  prettyPrint: false,
};

function entryAt(spy: MockInstance<typeof console.log>, index = 0): Record<string, unknown> {
  const output: unknown = spy.mock.calls[index]?.[0];
  return JSON.parse(String(output));
}

describe("createLogger", () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("writes JSON entries at or above the configured level", () => {
    const logger = createLogger(config);
    logger.debug("hidden");
    logger.info("Slate built", { league: "nba", fixtures: 3 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(entryAt(logSpy)).toMatchObject({
      level: "info",
      message: "Slate built",
      service: "picks-api",
      environment: "test",
      version: "1.0.0",
      league: "nba",
      fixtures: 3,
    });
  });

  it("redacts credentials", () => {
    createLogger(config).info("Calling provider", { apiKey: "test-secret", path: "/games" });

    const entry = entryAt(logSpy);
    expect(entry.apiKey).toBe("[REDACTED]");
    expect(entry.path).toBe("/games");
  });

  it("sends errors to stderr with the error formatted", () => {
    createLogger(config).error("Request failed", { error: new Error("boom") });

    expect(logSpy).not.toHaveBeenCalled();
    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: "error",
      message: "Request failed",
      error: { name: "Error", message: "boom" },
    });
  });

  it("merges child context", () => {
    createLogger(config).child({ service: "picks" }).child({ league: "nfl" }).warn("Slow");
    expect(entryAt(logSpy)).toMatchObject({ service: "picks", league: "nfl", level: "warn" });
  });

  it("tags entries with the active correlation id", () => {
    const logger = createLogger(config);
    withCorrelationId("corr-1", () => {
      expect(getCorrelationId()).toBe("corr-1");
      logger.info("inside");
    });
    logger.info("outside");

    expect(entryAt(logSpy, 0).correlationId).toBe("corr-1");
    expect(entryAt(logSpy, 1).correlationId).toBeUndefined();
  });

  it("logs upstream failures at warn", () => {
    createLogger(config).externalService({
      service: "api-sports",
      endpoint: "/odds",
      statusCode: 500,
      success: false,
    });
    expect(entryAt(logSpy)).toMatchObject({
      level: "warn",
      message: "External Service: api-sports /odds",
    });
  });
});

describe("redactRecord", () => {
  it("redacts nested fields by substring and marks cycles", () => {
    const headers: Record<string, unknown> = { "x-apisports-key": "test-secret", accept: "json" };
    const record: Record<string, unknown> = { request: { headers }, accessTokens: ["a"] };
    record.self = record;

    expect(redactRecord(record)).toEqual({
      request: { headers: { "x-apisports-key": "[REDACTED]", accept: "json" } },
      accessTokens: "[REDACTED]",
      self: { circular: "[Circular]" },
    });
  });
});
