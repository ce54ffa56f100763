/**
 * RaffleError - error class for the escrow raffle engine.
 *
 * Wraps catalog error codes with runtime details. Every rejected operation
 * surfaces one of these synchronously to the caller.
 */

import { ErrorCodes, type ErrorCodeKey, type ErrorEntry, type ErrorKind } from "./catalog";

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class RaffleError extends Error {
  /** The catalog error code key. */
  public readonly errorCode: ErrorCodeKey;

  /** The catalog entry for this error. */
  public readonly entry: ErrorEntry;

  /** Optional structured details (ids, amounts, addresses). */
  public readonly details?: Record<string, unknown>;

  /** The original error that caused this one, if any. */
  public override readonly cause?: Error;

  /** Timestamp of error creation (ms since epoch). */
  public readonly timestamp: number;

  constructor(
    errorCode: ErrorCodeKey,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    const entry = ErrorCodes[errorCode];
    super(entry.message);

    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "RaffleError";
    this.errorCode = errorCode;
    this.entry = entry;
    this.details = details;
    this.cause = cause;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RaffleError);
    }
  }

  /** Numeric error code. */
  get code(): number {
    return this.entry.code;
  }

  /** Failure category. */
  get kind(): ErrorKind {
    return this.entry.kind;
  }

  get retryable(): boolean {
    return this.entry.retryable;
  }

  /**
   * Build a log-friendly object for structured logging.
   * Includes the stack trace and cause for debugging.
   */
  toLog(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      kind: this.entry.kind,
      message: this.message,
      retryable: this.entry.retryable,
      details: serializeDetails(this.details),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
      stack: this.stack,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }

  /**
   * Create a JSON representation (used by JSON.stringify).
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      kind: this.entry.kind,
      message: this.message,
      retryable: this.entry.retryable,
      details: serializeDetails(this.details),
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }
}

/** bigint amounts are not JSON-serializable; render them as decimal strings. */
function serializeDetails(
  details: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  if (!details) return undefined;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an unknown error is a RaffleError.
 */
export function isRaffleError(error: unknown): error is RaffleError {
  return error instanceof RaffleError;
}

/**
 * Wrap an unknown error as a RaffleError.
 * If the error is already a RaffleError, return it as-is.
 */
export function toRaffleError(error: unknown): RaffleError {
  if (isRaffleError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new RaffleError(
      "SYSTEM_INTERNAL_ERROR",
      { originalMessage: error.message },
      error,
    );
  }

  return new RaffleError("SYSTEM_INTERNAL_ERROR", {
    originalMessage: String(error),
  });
}

// ---------------------------------------------------------------------------
// Domain-specific factory functions for common errors
// ---------------------------------------------------------------------------

export const AccessErrors = {
  notOperator: (caller: string) =>
    new RaffleError("ACCESS_NOT_OPERATOR", { caller }),
  notWinner: (raffleId: number, caller: string) =>
    new RaffleError("ACCESS_NOT_WINNER", { raffleId, caller }),
  invalidOperator: () => new RaffleError("ACCESS_INVALID_OPERATOR"),
  reentrantCall: (operation: string, heldBy: string) =>
    new RaffleError("ACCESS_REENTRANT_CALL", { operation, heldBy }),
} as const;

export const RaffleErrors = {
  notFound: (raffleId: number) =>
    new RaffleError("RAFFLE_NOT_FOUND", { raffleId }),
  invalidPrize: () => new RaffleError("RAFFLE_INVALID_PRIZE"),
  endInPast: (endTimestamp: number, now: number) =>
    new RaffleError("RAFFLE_END_IN_PAST", { endTimestamp, now }),
  invalidInput: (fields: Record<string, string>) =>
    new RaffleError("RAFFLE_INVALID_INPUT", { fields }),
  ended: (raffleId: number, endTimestamp: number, now: number) =>
    new RaffleError("RAFFLE_ENDED", { raffleId, endTimestamp, now }),
  zeroTickets: (raffleId: number) =>
    new RaffleError("RAFFLE_ZERO_TICKETS", { raffleId }),
  capacityExceeded: (raffleId: number, requested: number, sold: number, maxEntries: number) =>
    new RaffleError("RAFFLE_CAPACITY_EXCEEDED", { raffleId, requested, sold, maxEntries }),
  userLimitReached: (raffleId: number, held: number, requested: number, limit: number) =>
    new RaffleError("RAFFLE_USER_LIMIT_REACHED", { raffleId, held, requested, limit }),
  noEntries: (raffleId: number) =>
    new RaffleError("RAFFLE_NO_ENTRIES", { raffleId }),
  winnerAlreadyDrawn: (raffleId: number, winner: string | null) =>
    new RaffleError("RAFFLE_WINNER_ALREADY_DRAWN", { raffleId, winner }),
  closeWindow: (raffleId: number, endTimestamp: number, now: number) =>
    new RaffleError("RAFFLE_CLOSE_WINDOW", { raffleId, endTimestamp, now }),
  alreadyClosed: (raffleId: number) =>
    new RaffleError("RAFFLE_ALREADY_CLOSED", { raffleId }),
  notEnded: (raffleId: number, endTimestamp: number, now: number) =>
    new RaffleError("RAFFLE_NOT_ENDED", { raffleId, endTimestamp, now }),
  noWinner: (raffleId: number) =>
    new RaffleError("RAFFLE_NO_WINNER", { raffleId }),
  alreadyClaimed: (raffleId: number) =>
    new RaffleError("RAFFLE_ALREADY_CLAIMED", { raffleId }),
} as const;

export const CustodyErrors = {
  notOwner: (collection: string, tokenId: bigint, from: string, owner: string | null) =>
    new RaffleError("CUSTODY_NOT_OWNER", { collection, tokenId, from, owner }),
  insufficientAllowance: (asset: string, owner: string, required: bigint, approved: bigint) =>
    new RaffleError("CUSTODY_INSUFFICIENT_ALLOWANCE", { asset, owner, required, approved }),
  insufficientBalance: (asset: string, holder: string, required: bigint, available: bigint) =>
    new RaffleError("CUSTODY_INSUFFICIENT_BALANCE", { asset, holder, required, available }),
  invalidAsset: () => new RaffleError("CUSTODY_INVALID_ASSET"),
  invalidAmount: (amount: bigint) =>
    new RaffleError("CUSTODY_INVALID_AMOUNT", { amount }),
} as const;

export const SystemErrors = {
  internal: (cause?: Error) =>
    new RaffleError("SYSTEM_INTERNAL_ERROR", undefined, cause),
  invalidConfig: (issues: Record<string, string>) =>
    new RaffleError("SYSTEM_INVALID_CONFIG", { issues }),
} as const;
