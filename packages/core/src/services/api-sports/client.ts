/**
 * API-SPORTS Client
 * GET-only client for the basketball, american-football and football APIs
 */

import type { League } from "@picks/types";
import { cacheKey, type CacheStore } from "../cache";
import {
  PicksApiError,
  ProviderErrors,
  ValidationErrors,
} from "../errors";
import { getLogger, type Logger } from "../logger";
import {
  DEFAULT_BASES,
  LEAGUE_FAMILY,
  LEAGUE_IDS,
  OPERATIONS,
  oddsParamFor,
  type ApiSportsOperation,
  type SportFamily,
} from "./endpoints";
import {
  envelopeSchema,
  responseItems,
  type ApiSportsClientConfig,
  type ApiSportsEnvelope,
  type QueryParams,
} from "./types";

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);
const SERVICE = "api-sports";

// ============================================================================
// Rate Limiter
// ============================================================================

/** Sliding one-minute window */
class RateLimiter {
  private requests: number[] = [];

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number = 60000
  ) {}

  async acquire(): Promise<void> {
    const now = Date.now();
    this.requests = this.requests.filter((t) => t > now - this.windowMs);

    if (this.requests.length >= this.maxRequests) {
      const waitTime = this.requests[0] + this.windowMs - now;
      await sleep(waitTime);
      return this.acquire();
    }

    this.requests.push(now);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Error codes reported inside a 200 body, flattened to strings */
function envelopeErrors(envelope: ApiSportsEnvelope): Record<string, string> | null {
  const { errors } = envelope;
  if (!errors) return null;
  const entries = Array.isArray(errors)
    ? errors.map((value, index): [string, unknown] => [String(index), value])
    : Object.entries(errors);
  if (entries.length === 0) return null;

  const flattened: Record<string, string> = {};
  for (const [key, value] of entries) {
    flattened[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return flattened;
}

// ============================================================================
// Client
// ============================================================================

export class ApiSportsClient {
  private readonly apiKey: string;
  private readonly bases: Record<SportFamily, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly cache: CacheStore | null;
  private readonly cacheTtlSeconds: number | undefined;
  private readonly rateLimiter: RateLimiter | null;
  private readonly logger: Logger;

  constructor(config: ApiSportsClientConfig) {
    this.apiKey = config.apiKey;
    this.bases = { ...DEFAULT_BASES, ...config.bases };
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.maxRetries = config.maxRetries ?? 2;
    this.backoffMs = config.backoffMs ?? 750;
    this.cache = config.cache ?? null;
    this.cacheTtlSeconds = config.cacheTtlSeconds;
    this.rateLimiter = config.requestsPerMinute
      ? new RateLimiter(config.requestsPerMinute)
      : null;
    this.logger = config.logger ?? getLogger().child({ service: SERVICE });
  }

  baseFor(league: League): string {
    return this.bases[LEAGUE_FAMILY[league]];
  }

  // ==========================================================================
  // HTTP Request Handler
  // ==========================================================================

  /**
   * Call an operation for a league after checking its required params.
   */
  async call(
    league: League,
    operation: ApiSportsOperation,
    params: QueryParams
  ): Promise<ApiSportsEnvelope> {
    const spec = OPERATIONS[league][operation];
    if (!spec) {
      throw ValidationErrors.notSupported(operation, league);
    }
    const missing = spec.required.filter(
      (key) => params[key] === undefined || params[key] === ""
    );
    if (missing.length > 0) {
      throw ValidationErrors.missingParams(operation, missing);
    }
    return this.get(`${this.baseFor(league)}${spec.path}`, params);
  }

  /**
   * GET a URL, serving from the cache when possible.
   */
  async get(url: string, params: QueryParams = {}): Promise<ApiSportsEnvelope> {
    const key = cacheKey(url, params);
    const hit = await this.readCache(key);
    const parsed = hit === null ? null : envelopeSchema.safeParse(hit);
    if (parsed?.success) {
      this.logger.externalService({ service: SERVICE, endpoint: url, cached: true, success: true });
      return parsed.data;
    }

    const envelope = await this.fetchWithRetry(url, params);
    await this.writeCache(key, envelope);
    return envelope;
  }

  // Cache failures fall through to the provider

  private async readCache(key: string): Promise<unknown> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger.warn("Cache read failed", {
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async writeCache(key: string, envelope: ApiSportsEnvelope): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, envelope, this.cacheTtlSeconds);
    } catch (error) {
      this.logger.warn("Cache write failed", {
        errorMessage: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private buildUrl(url: string, params: QueryParams): string {
    const target = new URL(url);
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") {
        target.searchParams.set(name, String(value));
      }
    }
    return target.toString();
  }

  private async fetchWithRetry(url: string, params: QueryParams): Promise<ApiSportsEnvelope> {
    const target = this.buildUrl(url, params);
    const path = new URL(url).pathname;
    let lastError: PicksApiError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (this.rateLimiter) {
        await this.rateLimiter.acquire();
      }

      const startTime = performance.now();
      let response: Response;
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        response = await fetch(target, {
          method: "GET",
          headers: {
            Accept: "application/json",
            "x-apisports-key": this.apiKey,
          },
          signal: controller.signal,
        });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        lastError =
          cause.name === "AbortError"
            ? ProviderErrors.timeout(path, this.timeoutMs)
            : ProviderErrors.network(path, cause);
        this.logger.externalService({
          service: SERVICE,
          endpoint: path,
          success: false,
          retryAttempt: attempt,
          duration: Math.round(performance.now() - startTime),
        });
        if (attempt < this.maxRetries) {
          await this.backoff(attempt, path, cause.message);
        }
        continue;
      } finally {
        clearTimeout(timeoutId);
      }

      this.logger.externalService({
        service: SERVICE,
        endpoint: path,
        statusCode: response.status,
        success: response.ok,
        retryAttempt: attempt,
        duration: Math.round(performance.now() - startTime),
      });

      if (RETRYABLE_STATUSES.has(response.status)) {
        lastError =
          response.status === 429
            ? ProviderErrors.rateLimited(path)
            : ProviderErrors.http(response.status, path);
        if (attempt < this.maxRetries) {
          await this.backoff(attempt, path, `HTTP ${response.status}`);
        }
        continue;
      }

      // Other 4xx/5xx are not retried
      if (!response.ok) {
        const body = await response.text();
        throw ProviderErrors.http(response.status, path, new Error(body.slice(0, 500)));
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw ProviderErrors.malformed(response.status, path, cause);
      }

      const parsed = envelopeSchema.safeParse(body);
      if (!parsed.success) {
        throw ProviderErrors.malformed(response.status, path, parsed.error);
      }

      const errors = envelopeErrors(parsed.data);
      if (errors) {
        throw ProviderErrors.rejected(path, errors);
      }
      return parsed.data;
    }

    throw lastError ?? ProviderErrors.http(0, path);
  }

  private async backoff(attempt: number, path: string, reason: string): Promise<void> {
    const waitTime = this.backoffMs * Math.pow(2, attempt);
    this.logger.warn(`Request failed, retrying in ${waitTime}ms`, {
      endpoint: path,
      attempt,
      reason,
    });
    await sleep(waitTime);
  }

  // ==========================================================================
  // API Methods
  // ==========================================================================

  async fixturesByDate(
    league: League,
    date: string,
    options: { season?: string; leagueId?: number; timezone?: string; page?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "fixtures_by_date", {
      league: options.leagueId ?? LEAGUE_IDS[league],
      date,
      season: options.season,
      timezone: options.timezone,
      page: options.page,
    });
  }

  async fixturesRange(
    league: League,
    from: string,
    to: string,
    options: { season?: string; leagueId?: number; timezone?: string; page?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "fixtures_range", {
      league: options.leagueId ?? LEAGUE_IDS[league],
      from,
      to,
      season: options.season,
      timezone: options.timezone,
      page: options.page,
    });
  }

  async fixturesBySeason(
    league: League,
    season: string,
    options: { leagueId?: number; timezone?: string; page?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "fixtures_by_season", {
      league: options.leagueId ?? LEAGUE_IDS[league],
      season,
      timezone: options.timezone,
      page: options.page,
    });
  }

  /**
   * Follow `paging.current/total` and concatenate `response` lists.
   * Stops early once `limit` items are collected.
   */
  async allPages(
    fetchPage: (page: number) => Promise<ApiSportsEnvelope>,
    limit?: number
  ): Promise<unknown[]> {
    const items: unknown[] = [];
    let page = 1;

    for (;;) {
      const envelope = await fetchPage(page);
      const data = responseItems(envelope);
      items.push(...data);
      if (limit !== undefined && items.length >= limit) {
        return items.slice(0, limit);
      }

      const current = envelope.paging?.current ?? page;
      const total = envelope.paging?.total ?? page;
      if (current >= total || data.length === 0) {
        break;
      }
      page += 1;
    }

    return items;
  }

  async oddsForFixture(
    league: League,
    fixtureId: number,
    options: { bookmaker?: number; bet?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "odds", {
      [oddsParamFor(league)]: fixtureId,
      bookmaker: options.bookmaker,
      bet: options.bet,
    });
  }

  async standings(league: League, season: string, leagueId?: number): Promise<ApiSportsEnvelope> {
    return this.call(league, "standings", {
      league: leagueId ?? LEAGUE_IDS[league],
      season,
    });
  }

  async teamStatistics(
    league: League,
    season: string,
    teamId?: number,
    leagueId?: number
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "team_statistics", {
      league: leagueId ?? LEAGUE_IDS[league],
      season,
      team: teamId,
    });
  }

  async players(
    league: League,
    season: string,
    options: { team?: number; player?: number; page?: number } = {}
  ): Promise<ApiSportsEnvelope> {
    return this.call(league, "players", {
      season,
      team: options.team,
      id: options.player,
      page: options.page ?? 1,
    });
  }

  async injuries(league: League, params: QueryParams): Promise<ApiSportsEnvelope> {
    return this.call(league, "injuries", params);
  }
}
