import * as Sentry from "@sentry/node";
import { getLogger } from "@picks/core";
import type { AppConfig } from "@picks/core";

let enabled = false;

export function initSentry(config: Pick<AppConfig, "sentryDsn" | "nodeEnv">): boolean {
  const logger = getLogger();

  if (!config.sentryDsn) {
    logger.warn("Sentry DSN not configured, error tracking disabled");
    enabled = false;
    return false;
  }

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    tracesSampleRate: config.nodeEnv === "production" ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers["x-apisports-key"];
        delete event.request.headers["authorization"];
        delete event.request.headers["cookie"];
      }
      return event;
    },
  });

  enabled = true;
  logger.info("Sentry initialized", { environment: config.nodeEnv });
  return true;
}

export function isSentryEnabled(): boolean {
  return enabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!enabled) {
    getLogger().error("Error captured (Sentry disabled)", {
      ...context,
      error: error instanceof Error ? error : new Error(String(error)),
    });
    return;
  }

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

export function captureMessage(message: string, level: "info" | "warning" | "error" = "info"): void {
  if (!enabled) {
    const logLevel = level === "warning" ? "warn" : level;
    getLogger()[logLevel](message, { source: "sentry-fallback" });
    return;
  }

  Sentry.captureMessage(message, level);
}

export { Sentry };
