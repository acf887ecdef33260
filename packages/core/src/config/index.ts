/**
 * Service configuration
 *
 * Reads the process environment once, validates it with zod and exposes a
 * typed, memoized config object.
 */

import { z } from "zod";
import { LEAGUES } from "@picks/types";
import type { League, SportsProviderName } from "@picks/types";
import { ConfigErrors } from "../services/errors";
import type { LogLevel } from "../services/logger/types";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  APISPORTS_KEY: optionalString,
  SPORTS_PROVIDER: z.enum(["apisports", "mock"]).default("apisports"),
  DEFAULT_LEAGUE: z.enum(LEAGUES).default("nba"),
  DEFAULT_MARKET: z.string().default("us"),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(120),
  CACHE_MAX_ITEMS: z.coerce.number().int().positive().default(1000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .optional(),
  APISPORTS_BASE_BASKETBALL: z.string().url().default("https://v1.basketball.api-sports.io"),
  APISPORTS_BASE_AMERICAN_FOOTBALL: z
    .string()
    .url()
    .default("https://v1.american-football.api-sports.io"),
  APISPORTS_BASE_FOOTBALL: z.string().url().default("https://v3.football.api-sports.io"),
  APISPORTS_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  APISPORTS_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  APISPORTS_BACKOFF_MS: z.coerce.number().int().nonnegative().default(750),
  APISPORTS_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().optional(),
  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  SENTRY_DSN: optionalString,
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  TRUST_PROXY: booleanFlag,
});

export interface ApiSportsConfig {
  apiKey: string | undefined;
  bases: {
    basketball: string;
    americanFootball: string;
    football: string;
  };
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  requestsPerMinute: number | undefined;
}

export interface AppConfig {
  provider: SportsProviderName;
  defaultLeague: League;
  defaultMarket: string;
  cache: {
    ttlSeconds: number;
    maxItems: number;
  };
  logLevel: LogLevel | undefined;
  apiSports: ApiSportsConfig;
  upstash: { url: string; token: string } | null;
  sentryDsn: string | undefined;
  port: number;
  nodeEnv: "development" | "production" | "test";
  trustProxy: boolean;
}

/**
 * Validate an environment map and build the config.
 * Throws CONFIG_MISSING_API_KEY when the live provider is selected without a key.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fields[issue.path.join(".")] = issue.message;
    }
    throw ConfigErrors.invalid(fields);
  }

  const e = parsed.data;
  if (e.SPORTS_PROVIDER === "apisports" && !e.APISPORTS_KEY) {
    throw ConfigErrors.missingApiKey();
  }

  return {
    provider: e.SPORTS_PROVIDER,
    defaultLeague: e.DEFAULT_LEAGUE,
    defaultMarket: e.DEFAULT_MARKET,
    cache: {
      ttlSeconds: e.CACHE_TTL_SECONDS,
      maxItems: e.CACHE_MAX_ITEMS,
    },
    logLevel: e.LOG_LEVEL,
    apiSports: {
      apiKey: e.APISPORTS_KEY,
      bases: {
        basketball: e.APISPORTS_BASE_BASKETBALL,
        americanFootball: e.APISPORTS_BASE_AMERICAN_FOOTBALL,
        football: e.APISPORTS_BASE_FOOTBALL,
      },
      timeoutMs: e.APISPORTS_TIMEOUT_MS,
      maxRetries: e.APISPORTS_MAX_RETRIES,
      backoffMs: e.APISPORTS_BACKOFF_MS,
      requestsPerMinute: e.APISPORTS_REQUESTS_PER_MINUTE,
    },
    upstash:
      e.UPSTASH_REDIS_REST_URL && e.UPSTASH_REDIS_REST_TOKEN
        ? { url: e.UPSTASH_REDIS_REST_URL, token: e.UPSTASH_REDIS_REST_TOKEN }
        : null,
    sentryDsn: e.SENTRY_DSN,
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    trustProxy: e.TRUST_PROXY,
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
