/**
 * Logger Types
 *
 * Type definitions for the structured logging system.
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Base context included with every log entry
 */
export interface LogContext {
  /** Identifier tying together every log line of one engine call */
  correlationId?: string;
  /** Raffle the entry concerns */
  raffleId?: number;
  /** Calling identity */
  caller?: string;
  /** Additional custom fields */
  [key: string]: unknown;
}

/**
 * Error context for error logging
 */
export interface ErrorContext {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
}

/**
 * Performance timing context
 */
export interface PerformanceContext {
  /** Operation name */
  operation: string;
  /** Duration in milliseconds */
  duration: number;
  /** Whether the operation succeeded */
  success?: boolean;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service name for log context */
  serviceName: string;
  /** Environment name */
  environment: string;
  /** Application version */
  version?: string;
  /** Whether to pretty print logs (development only) */
  prettyPrint?: boolean;
  /** Fields to redact from logs */
  redactFields?: string[];
  /** Additional default context */
  defaultContext?: LogContext;
}

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;
  fatal(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;

  /** Create a child logger with additional context */
  child(context: LogContext): Logger;

  /** Log performance timing */
  timing(context: PerformanceContext & LogContext): void;
}

/**
 * Default sensitive fields to redact (matched case-insensitively, exact key)
 */
export const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "apiKey",
  "api_key",
  "accessToken",
  "refreshToken",
  "authorization",
  "mnemonic",
  "seedPhrase",
  "privateKey",
  "private_key",
  "secretKey",
  "signature",
];

/**
 * Log entry structure (for JSON output)
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  environment: string;
  version?: string;
  hostname?: string;
  correlationId?: string;
  error?: ErrorContext;
  performance?: PerformanceContext;
  [key: string]: unknown;
}
