import { describe, it, expect } from "vitest";
import { z } from "zod";
import { fieldErrors, flagField, leagueField, seasonField } from "../../lib/validation";

/**
 * Query Validation Tests
 */

describe("fieldErrors", () => {
  it("keys the first message of each field by its path", () => {
    const schema = z.object({
      date: z.string(),
      limit: z.coerce.number().int().min(1).max(10),
      nested: z.object({ id: z.number() }),
    });
    const result = schema.safeParse({ limit: "50", nested: { id: "x" } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(fieldErrors(result.error)).toEqual({
      date: "Required",
      limit: "Number must be less than or equal to 10",
      "nested.id": "Expected number, received string",
    });
  });

  it("files object-level issues under query", () => {
    const schema = z.object({}).refine(() => false, { message: "Nothing matched" });
    const result = schema.safeParse({});

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(fieldErrors(result.error)).toEqual({ query: "Nothing matched" });
  });
});

describe("shared fields", () => {
  it("lowercases and trims leagues", () => {
    expect(leagueField.parse("  Soccer ")).toBe("soccer");
  });

  it("accepts single-year and spanning seasons", () => {
    expect(seasonField.parse("2024")).toBe("2024");
    expect(seasonField.parse("2024-2025")).toBe("2024-2025");
    expect(seasonField.parse(undefined)).toBeUndefined();
    expect(seasonField.safeParse("24-25").success).toBe(false);
  });

  it("reads boolean flags", () => {
    expect(flagField.parse("1")).toBe(true);
    expect(flagField.parse("false")).toBe(false);
    expect(flagField.safeParse("yes").success).toBe(false);
  });
});
