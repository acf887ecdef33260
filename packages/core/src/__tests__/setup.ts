/**
 * Global Test Setup
 * Configuration and utilities for all tests
 */

import { vi, beforeEach, afterAll } from "vitest";
import type { Logger } from "../services/logger";

// ============================================================================
// Environment
// ============================================================================

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "fatal";

// ============================================================================
// Global Mocks
// ============================================================================

// Mock fetch globally
const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal("fetch", mockFetch);

// ============================================================================
// Test Utilities
// ============================================================================

export function createMockFetchResponse<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function resetFetchMock() {
  mockFetch.mockReset();
}

/**
 * Logger whose methods are spies; `child` returns the same logger
 */
export function createMockLogger(): Logger {
  const logger: Logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
    timing: vi.fn(),
    httpRequest: vi.fn(),
    httpResponse: vi.fn(),
    externalService: vi.fn(),
    flush: vi.fn(async () => {}),
  };
  return logger;
}

// ============================================================================
// Test Hooks
// ============================================================================

beforeEach(() => {
  vi.clearAllMocks();
  resetFetchMock();
});

afterAll(() => {
  vi.restoreAllMocks();
});

export { mockFetch };
