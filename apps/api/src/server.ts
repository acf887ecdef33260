/**
 * Node entry point
 */

import { serve } from "@hono/node-server";
import { getLogger, toPicksApiError } from "@picks/core";
import { app } from "./index";
import { getServices, type Services } from "./lib/services";
import { initSentry, Sentry } from "./lib/sentry";

function loadServices(): Services {
  try {
    return getServices();
  } catch (error) {
    const apiError = toPicksApiError(error);
    getLogger().fatal("Service failed to start", {
      errorCode: apiError.code,
      details: apiError.details,
      error: apiError,
    });
    process.exit(1);
  }
}

const { config } = loadServices();
initSentry(config);

const logger = getLogger().child({ service: "server" });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("Picks API listening", {
    port: info.port,
    provider: config.provider,
    environment: config.nodeEnv,
  });
});

function shutdown(signal: string): void {
  logger.info("Shutting down", { signal });
  server.close(() => {
    void Sentry.close(2000)
      .then(() => logger.flush())
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
