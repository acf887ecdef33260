import { describe, it, expect } from "vitest";
import {
  ErrorCodes,
  PicksApiError,
  ProviderErrors,
  ValidationErrors,
  createErrorByCode,
  getErrorByCode,
  getErrorsByDomain,
  getHttpStatus,
  isPicksApiError,
  isRetryable,
  toPicksApiError,
} from "../../services/errors";

/**
 * Error Catalog Tests
 */

describe("error catalog", () => {
  it("keeps numeric codes unique", () => {
    const codes = Object.values(ErrorCodes).map((entry) => entry.code);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it("looks entries up by numeric code", () => {
    expect(getErrorByCode(1002)).toMatchObject({ key: "VALIDATION_INVALID_LEAGUE", status: 422 });
    expect(getErrorByCode(4242)).toBeUndefined();
  });

  it("groups entries by code range", () => {
    expect(getErrorsByDomain("provider").map((entry) => entry.key)).toEqual([
      "PROVIDER_HTTP_ERROR",
      "PROVIDER_REJECTED",
      "PROVIDER_RATE_LIMITED",
      "PROVIDER_TIMEOUT",
    ]);
  });
});

describe("catalog lookups", () => {
  it("reads status and retryability by key", () => {
    expect(getHttpStatus("PROVIDER_TIMEOUT")).toBe(504);
    expect(isRetryable("PROVIDER_TIMEOUT")).toBe(true);
    expect(getHttpStatus("PROVIDER_REJECTED")).toBe(502);
    expect(isRetryable("PROVIDER_REJECTED")).toBe(false);
  });
});

describe("PicksApiError", () => {
  it("takes message, status and code from the catalog", () => {
    const error = new PicksApiError("FEATURE_NOT_SUPPORTED", { league: "nba" });
    expect(error).toBeInstanceOf(Error);
    expect(isPicksApiError(error)).toBe(true);
    expect(error.message).toBe("This operation is not supported for the requested league.");
    expect(error.status).toBe(501);
    expect(error.code).toBe(1006);
    expect(error.retryable).toBe(false);
  });

  it("drops internal and sensitive details from responses", () => {
    const error = new PicksApiError("SYSTEM_INTERNAL_ERROR", {
      path: "/games",
      _originalMessage: "boom",
      token: "test-secret",
    });
    const response = error.toResponse("req-1");

    expect(response.success).toBe(false);
    expect(response.requestId).toBe("req-1");
    expect(response.error).toEqual({
      code: 9003,
      key: "SYSTEM_INTERNAL_ERROR",
      message: "An unexpected error occurred.",
      status: 500,
      retryable: true,
      details: { path: "/games" },
    });
  });

  it("omits empty details", () => {
    const response = new PicksApiError("CONFIG_MISSING_API_KEY").toResponse("req-2");
    expect(response.error.details).toBeUndefined();
    expect(response.error.message).toBe("APISPORTS_KEY missing");
  });
});

describe("error factories", () => {
  it("wraps unknown errors as internal errors", () => {
    const cause = new Error("socket hang up");
    const wrapped = toPicksApiError(cause);
    expect(wrapped.errorCode).toBe("SYSTEM_INTERNAL_ERROR");
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.details).toEqual({ _originalMessage: "socket hang up" });

    expect(toPicksApiError("plain").details).toEqual({ _originalMessage: "plain" });
  });

  it("passes PicksApiErrors through", () => {
    const error = ProviderErrors.rateLimited("/games");
    expect(toPicksApiError(error)).toBe(error);
  });

  it("builds errors by numeric code", () => {
    expect(createErrorByCode(2004, { path: "/odds" }).errorCode).toBe("PROVIDER_TIMEOUT");
    expect(() => createErrorByCode(1)).toThrow("Unknown error code: 1");
  });

  it("only adds hints when given", () => {
    expect(ValidationErrors.missingParams("injuries", ["team"]).details).toEqual({
      operation: "injuries",
      missing: ["team"],
    });
    expect(ValidationErrors.missingParams("injuries", ["team"], "Pass a team.").details).toEqual({
      operation: "injuries",
      missing: ["team"],
      hint: "Pass a team.",
    });
  });
});
