/**
 * Structured Logger
 *
 * JSON lines for log aggregation, coloured output in development,
 * correlation ID tracking across one engine call, and sensitive field
 * redaction.
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { hostname } from "os";
import type {
  Logger,
  LoggerConfig,
  LogContext,
  LogLevel,
  ErrorContext,
  PerformanceContext,
  LogEntry,
} from "./types";
import { DEFAULT_REDACT_FIELDS } from "./types";

type ErrorLogContext = LogContext & { error?: Error | ErrorContext };

const correlationStorage = new AsyncLocalStorage<string>();

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

function getHostname(): string {
  return process.env.HOSTNAME || hostname() || "unknown";
}

/**
 * Deep clone, redact sensitive fields and stringify bigints
 */
function redactSensitiveFields(
  value: unknown,
  redactFields: Set<string>,
  seen = new WeakSet<object>()
): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value === null || typeof value !== "object") {
    return value;
  }

  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item, redactFields, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = redactFields.has(key.toLowerCase())
      ? "[REDACTED]"
      : redactSensitiveFields(nested, redactFields, seen);
  }
  return result;
}

function formatError(error: Error | ErrorContext): ErrorContext {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code: typeof code === "string" || typeof code === "number" ? code : undefined,
      cause: error.cause,
    };
  }
  return error;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  config: LoggerConfig,
  context: LogContext,
  additionalFields?: Record<string, unknown>
): LogEntry {
  const { correlationId: contextCorrelationId, ...rest } = context;
  const correlationId = correlationStorage.getStore() || contextCorrelationId;

  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: config.serviceName,
    environment: config.environment,
    version: config.version,
    hostname: getHostname(),
    ...(correlationId ? { correlationId } : {}),
    ...rest,
    ...additionalFields,
  };
}

const BASE_FIELDS = new Set([
  "level",
  "message",
  "timestamp",
  "service",
  "environment",
  "version",
  "hostname",
]);

function outputLog(entry: LogEntry, config: LoggerConfig): void {
  const redactFields = new Set(
    (config.redactFields || DEFAULT_REDACT_FIELDS).map((f) => f.toLowerCase())
  );
  const redacted = redactSensitiveFields(entry, redactFields);
  const isError = entry.level === "error" || entry.level === "fatal";

  let output: string;
  if (config.prettyPrint) {
    const colors: Record<LogLevel, string> = {
      trace: "\x1b[90m",
      debug: "\x1b[36m",
      info: "\x1b[32m",
      warn: "\x1b[33m",
      error: "\x1b[31m",
      fatal: "\x1b[35m",
    };
    const reset = "\x1b[0m";
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);

    output = `${colors[entry.level]}[${time}] ${level}${reset} ${entry.message}`;

    if (redacted !== null && typeof redacted === "object") {
      const contextObj: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(redacted)) {
        if (!BASE_FIELDS.has(key)) contextObj[key] = value;
      }
      if (Object.keys(contextObj).length > 0) {
        output += ` ${JSON.stringify(contextObj, null, 2)}`;
      }
    }
  } else {
    output = JSON.stringify(redacted);
  }

  if (isError) {
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
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    additionalFields?: Record<string, unknown>
  ): void => {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const entry = createLogEntry(
      level,
      message,
      config,
      { ...config.defaultContext, ...context },
      additionalFields
    );
    outputLog(entry, config);
  };

  return {
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
      const { error, ...rest }: ErrorLogContext = context ?? {};
      log("error", message, rest, error ? { error: formatError(error) } : {});
    },

    fatal(message, context) {
      const { error, ...rest }: ErrorLogContext = context ?? {};
      log("fatal", message, rest, error ? { error: formatError(error) } : {});
    },

    child(additionalContext) {
      return createLogger({
        ...config,
        defaultContext: {
          ...config.defaultContext,
          ...additionalContext,
        },
      });
    },

    timing(context: PerformanceContext & LogContext) {
      const { operation, duration, success, ...rest } = context;
      log("debug", `Performance: ${operation}`, rest, {
        performance: { operation, duration, success },
      });
    },
  };
}

/**
 * Default logger configuration
 */
export function getDefaultLoggerConfig(): LoggerConfig {
  const environment = process.env.NODE_ENV || "development";
  const isDevelopment = environment === "development";
  const envLevel = process.env.LOG_LEVEL;

  return {
    level: isLogLevel(envLevel) ? envLevel : isDevelopment ? "debug" : "info",
    serviceName: process.env.SERVICE_NAME || "escrow-raffle",
    environment,
    version: process.env.APP_VERSION || process.env.npm_package_version || "0.0.0",
    prettyPrint: isDevelopment,
    redactFields: DEFAULT_REDACT_FIELDS,
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
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
