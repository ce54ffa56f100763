/**
 * Logger Service
 *
 * Structured logging with correlation ID tracking and sensitive field
 * redaction.
 *
 * @example
 * ```typescript
 * import { getLogger, initLogger } from '@raffle/core';
 *
 * initLogger({ level: 'debug', serviceName: 'raffle-engine' });
 *
 * const logger = getLogger().child({ raffleId: 7 });
 * logger.info('Entry accepted', { caller: '0xabc...', ticketCount: 3 });
 * ```
 */

export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  isLogLevel,
  generateCorrelationId,
  withCorrelationId,
  getCorrelationId,
} from "./logger";

export type {
  Logger,
  LogLevel,
  LogContext,
  LoggerConfig,
  LogEntry,
  ErrorContext,
  PerformanceContext,
} from "./types";

export { DEFAULT_REDACT_FIELDS } from "./types";
