/**
 * Structured Logger
 *
 * JSON output for log aggregation, correlation ID tracking across requests,
 * sensitive field redaction and request/response logging.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import type {
  Logger,
  LoggerConfig,
  LogContext,
  LogLevel,
  HttpRequestContext,
  HttpResponseContext,
  ErrorContext,
  PerformanceContext,
  ExternalServiceContext,
  CorrelationStore,
  LogEntry,
} from "./types";
import { DEFAULT_REDACT_FIELDS } from "./types";

const correlationStorage = new AsyncLocalStorage<string>();

export const correlationStore: CorrelationStore = {
  get(): string | undefined {
    return correlationStorage.getStore();
  },
  run<T>(correlationId: string, fn: () => T): T {
    return correlationStorage.run(correlationId, fn);
  },
};

/**
 * Log level numeric values for comparison
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function getHostname(): string {
  return process.env.HOSTNAME || hostname() || "unknown";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactValue(value: unknown, redactFields: string[], seen: WeakSet<object>): unknown {
  if (Array.isArray(value)) {
    if (seen.has(value)) return "[Circular]";
    seen.add(value);
    return value.map((item) => redactValue(item, redactFields, seen));
  }
  if (isRecord(value)) {
    return redactRecord(value, redactFields, seen);
  }
  return value;
}

/**
 * Copy a record, replacing sensitive fields with "[REDACTED]"
 */
export function redactRecord(
  obj: Record<string, unknown>,
  redactFields: string[] = DEFAULT_REDACT_FIELDS,
  seen: WeakSet<object> = new WeakSet()
): Record<string, unknown> {
  if (seen.has(obj)) {
    return { circular: "[Circular]" };
  }
  seen.add(obj);

  const lowered = redactFields.map((field) => field.toLowerCase());
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const shouldRedact = lowered.some(
      (field) => lowerKey === field || lowerKey.includes(field)
    );
    result[key] = shouldRedact ? "[REDACTED]" : redactValue(value, redactFields, seen);
  }
  return result;
}

function redactStrings(
  values: Record<string, string> | undefined,
  redactFields: string[]
): Record<string, string> | undefined {
  if (!values) return undefined;
  const lowered = redactFields.map((field) => field.toLowerCase());
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    const lowerKey = key.toLowerCase();
    result[key] = lowered.some((field) => lowerKey === field || lowerKey.includes(field))
      ? "[REDACTED]"
      : value;
  }
  return result;
}

function sanitizeRequest(
  request: HttpRequestContext,
  redactFields: string[]
): HttpRequestContext {
  return {
    ...request,
    query: redactStrings(request.query, redactFields),
    headers: redactStrings(request.headers, redactFields),
  };
}

function formatError(error: Error | ErrorContext): ErrorContext {
  if (error instanceof Error) {
    const code =
      "code" in error && (typeof error.code === "string" || typeof error.code === "number")
        ? error.code
        : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
      cause: error.cause,
    };
  }
  return error;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  config: LoggerConfig,
  context?: LogContext,
  additionalFields?: Record<string, unknown>
): LogEntry {
  const correlationId = correlationStorage.getStore() || context?.correlationId;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: config.serviceName,
    environment: config.environment,
    version: config.version,
    hostname: getHostname(),
    ...(correlationId && { correlationId }),
    ...(context?.requestId && { requestId: context.requestId }),
    ...additionalFields,
  };

  if (context) {
    const { correlationId: _c, requestId: _r, ...rest } = context;
    Object.assign(entry, rest);
  }

  return entry;
}

const BASE_KEYS = new Set([
  "level",
  "message",
  "timestamp",
  "service",
  "environment",
  "version",
  "hostname",
]);

const COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

function outputLog(entry: LogEntry, config: LoggerConfig): void {
  const redacted = redactRecord(entry, config.redactFields || DEFAULT_REDACT_FIELDS);
  const toStderr = entry.level === "error" || entry.level === "fatal";

  let output: string;
  if (config.prettyPrint) {
    const reset = "\x1b[0m";
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);
    output = `${COLORS[entry.level]}[${time}] ${level}${reset} ${entry.message}`;

    const contextObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(redacted)) {
      if (!BASE_KEYS.has(key) && value !== undefined) {
        contextObj[key] = value;
      }
    }
    if (Object.keys(contextObj).length > 0) {
      output += ` ${JSON.stringify(contextObj, null, 2)}`;
    }
  } else {
    output = JSON.stringify(redacted);
  }

  if (toStderr) {
    console.error(output);
  } else {
    console.log(output);
  }
}

function shouldLog(level: LogLevel, configLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[configLevel];
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const redactFields = config.redactFields || DEFAULT_REDACT_FIELDS;

  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    additionalFields?: Record<string, unknown>
  ): void => {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const mergedContext = {
      ...config.defaultContext,
      ...context,
    };

    outputLog(createLogEntry(level, message, config, mergedContext, additionalFields), config);
  };

  const logger: Logger = {
    trace(message, context) {
      log("trace", message, context);
    },

    debug(message, context) {
      log("debug", message, context);
    },

    info(message, context) {
      log("info", message, context);
    },

    warn(message, context) {
      log("warn", message, context);
    },

    error(message, context) {
      const { error, ...rest } = context || {};
      log("error", message, rest, error ? { error: formatError(error) } : {});
    },

    fatal(message, context) {
      const { error, ...rest } = context || {};
      log("fatal", message, rest, error ? { error: formatError(error) } : {});
    },

    child(additionalContext: LogContext): Logger {
      return createLogger({
        ...config,
        defaultContext: {
          ...config.defaultContext,
          ...additionalContext,
        },
      });
    },

    timing(context: PerformanceContext & LogContext): void {
      const { operation, duration, startTime, endTime, success, ...rest } = context;
      log("info", `Performance: ${operation}`, rest, {
        performance: { operation, duration, startTime, endTime, success },
      });
    },

    httpRequest(request: HttpRequestContext, context?: LogContext): void {
      log("info", `HTTP Request: ${request.method} ${request.path}`, context, {
        request: sanitizeRequest(request, redactFields),
      });
    },

    httpResponse(
      request: HttpRequestContext,
      response: HttpResponseContext,
      context?: LogContext
    ): void {
      const level: LogLevel =
        response.statusCode >= 500
          ? "error"
          : response.statusCode >= 400
            ? "warn"
            : "info";

      log(
        level,
        `HTTP Response: ${request.method} ${request.path} ${response.statusCode} ${response.responseTime}ms`,
        context,
        {
          request: sanitizeRequest(request, redactFields),
          response,
        }
      );
    },

    externalService(context: ExternalServiceContext & LogContext): void {
      const { service, endpoint, duration, statusCode, success, retryAttempt, cached, ...rest } =
        context;

      const level: LogLevel =
        success === false ? "warn" : statusCode && statusCode >= 400 ? "warn" : "debug";

      log(level, `External Service: ${service} ${endpoint || ""}`, rest, {
        externalService: {
          service,
          endpoint,
          duration,
          statusCode,
          success,
          retryAttempt,
          cached,
        },
      });
    },

    async flush(): Promise<void> {
      // console output is unbuffered
    },
  };

  return logger;
}

export function getDefaultLoggerConfig(): LoggerConfig {
  const environment = process.env.NODE_ENV || "development";
  const isDevelopment = environment === "development";
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();

  return {
    level: isLogLevel(envLevel)
      ? envLevel
      : environment === "test"
        ? "warn"
        : isDevelopment
          ? "debug"
          : "info",
    serviceName: process.env.SERVICE_NAME || "picks-api",
    environment,
    version: process.env.APP_VERSION || process.env.npm_package_version || "0.0.0",
    prettyPrint: isDevelopment,
    timestamp: true,
    redactFields: DEFAULT_REDACT_FIELDS,
  };
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(getDefaultLoggerConfig());
  }
  return defaultLogger;
}

/**
 * Initialize the default logger with custom config
 */
export function initLogger(config: Partial<LoggerConfig>): Logger {
  defaultLogger = createLogger({
    ...getDefaultLoggerConfig(),
    ...config,
  });
  return defaultLogger;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Run a function with correlation ID tracking
 */
export function withCorrelationId<T>(correlationId: string, fn: () => T): T {
  return correlationStorage.run(correlationId, fn);
}

export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
