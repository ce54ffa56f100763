/**
 * Raffle Error Catalog & Error Handling
 *
 * - Error catalog keyed by machine-readable code, grouped by kind
 * - RaffleError carrying catalog entry, details and cause
 * - Domain-specific factory functions for common failures
 */

// Error catalog
export {
  ErrorCodes,
  ERROR_KINDS,
  getErrorByCode,
  getErrorsByKind,
  isRetryable,
  type ErrorEntry,
  type ErrorKind,
  type ErrorCodeKey,
  type NumericErrorCode,
} from "./catalog";

// Error class & utilities
export {
  RaffleError,
  isRaffleError,
  toRaffleError,
  AccessErrors,
  RaffleErrors,
  CustodyErrors,
  SystemErrors,
} from "./raffle-error";
