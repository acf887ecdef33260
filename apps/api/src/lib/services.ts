/**
 * Service container
 *
 * Builds the config, response cache, sports data provider and the services
 * on top of it once per process.
 */

import {
  BacktestService,
  DataService,
  PicksService,
  createCache,
  createSportsProvider,
  getConfig,
  initLogger,
} from "@picks/core";
import type { AppConfig, CacheStore, SportsDataProvider } from "@picks/core";

export interface Services {
  config: AppConfig;
  cache: CacheStore;
  provider: SportsDataProvider;
  data: DataService;
  picks: PicksService;
  backtest: BacktestService;
}

let services: Services | null = null;

export function buildServices(config: AppConfig): Services {
  const cache = createCache(config);
  const provider = createSportsProvider(config, cache);
  const picks = new PicksService({ provider });
  return {
    config,
    cache,
    provider,
    data: new DataService({
      provider,
      apiKeyConfigured: Boolean(config.apiSports.apiKey),
    }),
    picks,
    backtest: new BacktestService(picks),
  };
}

export function getServices(): Services {
  if (!services) {
    const config = getConfig();
    initLogger({
      serviceName: "picks-api",
      environment: config.nodeEnv,
      ...(config.logLevel ? { level: config.logLevel } : {}),
    });
    services = buildServices(config);
  }
  return services;
}

export function resetServices(): void {
  services = null;
}
