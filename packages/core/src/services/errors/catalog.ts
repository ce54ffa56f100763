/**
 * Raffle Error Catalog
 *
 * Centralized error definitions for the escrow raffle engine. Each error has
 * a unique numeric code, an error kind, and a caller-facing message.
 *
 * Code ranges:
 *   1xxx - Access control & re-entrancy
 *   2xxx - Raffle lifecycle
 *   3xxx - Custody & treasury
 *   9xxx - System & configuration
 */

// ---------------------------------------------------------------------------
// Error kinds
// ---------------------------------------------------------------------------

export const ERROR_KINDS = [
  "Unauthorized",
  "NotFound",
  "InvalidReference",
  "TemporalViolation",
  "CapacityExceeded",
  "InsufficientAuthorization",
  "OwnershipMismatch",
  "InvalidArgument",
  "InvalidState",
  "InsufficientBalance",
  "ReentrantCall",
  "Configuration",
  "Internal",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

// ---------------------------------------------------------------------------
// Error entry shape
// ---------------------------------------------------------------------------

export interface ErrorEntry {
  /** Unique numeric error code. */
  readonly code: number;
  /** Category the failure belongs to. */
  readonly kind: ErrorKind;
  /** Caller-facing message. */
  readonly message: string;
  /** Whether repeating the same call later could succeed. */
  readonly retryable: boolean;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const ErrorCodes = {
  // ==========================================================================
  // 1xxx - Access control & re-entrancy
  // ==========================================================================
  ACCESS_NOT_OPERATOR: {
    code: 1001,
    kind: "Unauthorized",
    message: "Caller is not the operator.",
    retryable: false,
  },
  ACCESS_NOT_WINNER: {
    code: 1002,
    kind: "Unauthorized",
    message: "Only the drawn winner can claim this prize.",
    retryable: false,
  },
  ACCESS_INVALID_OPERATOR: {
    code: 1003,
    kind: "InvalidReference",
    message: "New operator cannot be the zero address.",
    retryable: false,
  },
  ACCESS_REENTRANT_CALL: {
    code: 1004,
    kind: "ReentrantCall",
    message: "Reentrant call rejected.",
    retryable: false,
  },

  // ==========================================================================
  // 2xxx - Raffle lifecycle
  // ==========================================================================
  RAFFLE_NOT_FOUND: {
    code: 2001,
    kind: "NotFound",
    message: "Raffle does not exist.",
    retryable: false,
  },
  RAFFLE_INVALID_PRIZE: {
    code: 2002,
    kind: "InvalidReference",
    message: "Prize collection cannot be the zero address.",
    retryable: false,
  },
  RAFFLE_END_IN_PAST: {
    code: 2003,
    kind: "InvalidArgument",
    message: "End time must be in the future.",
    retryable: false,
  },
  RAFFLE_INVALID_INPUT: {
    code: 2004,
    kind: "InvalidArgument",
    message: "Raffle parameters are invalid.",
    retryable: false,
  },
  RAFFLE_ENDED: {
    code: 2005,
    kind: "TemporalViolation",
    message: "Raffle has ended.",
    retryable: false,
  },
  RAFFLE_ZERO_TICKETS: {
    code: 2006,
    kind: "InvalidArgument",
    message: "Ticket count must be greater than zero.",
    retryable: false,
  },
  RAFFLE_CAPACITY_EXCEEDED: {
    code: 2007,
    kind: "CapacityExceeded",
    message: "Not enough tickets left.",
    retryable: false,
  },
  RAFFLE_USER_LIMIT_REACHED: {
    code: 2008,
    kind: "CapacityExceeded",
    message: "Ticket limit per participant reached.",
    retryable: false,
  },
  RAFFLE_NO_ENTRIES: {
    code: 2009,
    kind: "InvalidState",
    message: "No participants in the raffle.",
    retryable: true,
  },
  RAFFLE_WINNER_ALREADY_DRAWN: {
    code: 2010,
    kind: "InvalidState",
    message: "A winner has already been drawn for this raffle.",
    retryable: false,
  },
  RAFFLE_CLOSE_WINDOW: {
    code: 2011,
    kind: "TemporalViolation",
    message: "Raffle cannot be closed at this time.",
    retryable: true,
  },
  RAFFLE_ALREADY_CLOSED: {
    code: 2012,
    kind: "InvalidState",
    message: "Raffle is already closed.",
    retryable: false,
  },
  RAFFLE_NOT_ENDED: {
    code: 2013,
    kind: "TemporalViolation",
    message: "Raffle has not ended yet.",
    retryable: true,
  },
  RAFFLE_NO_WINNER: {
    code: 2014,
    kind: "InvalidState",
    message: "No winner has been drawn for this raffle.",
    retryable: true,
  },
  RAFFLE_ALREADY_CLAIMED: {
    code: 2015,
    kind: "InvalidState",
    message: "Prize has already been claimed.",
    retryable: false,
  },

  // ==========================================================================
  // 3xxx - Custody & treasury
  // ==========================================================================
  CUSTODY_NOT_OWNER: {
    code: 3001,
    kind: "OwnershipMismatch",
    message: "Transfer source does not own the asset.",
    retryable: false,
  },
  CUSTODY_INSUFFICIENT_ALLOWANCE: {
    code: 3002,
    kind: "InsufficientAuthorization",
    message: "Payment allowance is insufficient.",
    retryable: false,
  },
  CUSTODY_INSUFFICIENT_BALANCE: {
    code: 3003,
    kind: "InsufficientBalance",
    message: "Balance is insufficient for this transfer.",
    retryable: false,
  },
  CUSTODY_INVALID_ASSET: {
    code: 3004,
    kind: "InvalidReference",
    message: "Asset address cannot be the zero address.",
    retryable: false,
  },
  CUSTODY_INVALID_AMOUNT: {
    code: 3005,
    kind: "InvalidArgument",
    message: "Amount must be greater than zero.",
    retryable: false,
  },

  // ==========================================================================
  // 9xxx - System & configuration
  // ==========================================================================
  SYSTEM_INTERNAL_ERROR: {
    code: 9001,
    kind: "Internal",
    message: "An unexpected error occurred.",
    retryable: false,
  },
  SYSTEM_INVALID_CONFIG: {
    code: 9002,
    kind: "Configuration",
    message: "Configuration is invalid.",
    retryable: false,
  },
} as const satisfies Record<string, ErrorEntry>;

// ---------------------------------------------------------------------------
// Derived types
// ---------------------------------------------------------------------------

/** Union of all error code keys. */
export type ErrorCodeKey = keyof typeof ErrorCodes;

/** Union of all numeric error codes. */
export type NumericErrorCode = (typeof ErrorCodes)[ErrorCodeKey]["code"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function catalogEntries(): Array<[ErrorCodeKey, ErrorEntry]> {
  const keys = Object.keys(ErrorCodes).filter(
    (key): key is ErrorCodeKey => key in ErrorCodes,
  );
  return keys.map((key) => [key, ErrorCodes[key]]);
}

/** Lookup an error entry by its numeric code. */
export function getErrorByCode(code: number): (ErrorEntry & { key: ErrorCodeKey }) | undefined {
  for (const [key, entry] of catalogEntries()) {
    if (entry.code === code) {
      return { ...entry, key };
    }
  }
  return undefined;
}

/** Get all error codes of one kind. */
export function getErrorsByKind(kind: ErrorKind): Array<ErrorEntry & { key: ErrorCodeKey }> {
  return catalogEntries()
    .filter(([, entry]) => entry.kind === kind)
    .map(([key, entry]) => ({ ...entry, key }));
}

/** Check if an error code key is retryable. */
export function isRetryable(errorCode: ErrorCodeKey): boolean {
  return ErrorCodes[errorCode].retryable;
}
