/**
 * Error Catalog & RaffleError Tests
 */

import { describe, it, expect } from "vitest";
import {
  ErrorCodes,
  ERROR_KINDS,
  getErrorByCode,
  getErrorsByKind,
  isRetryable,
  type ErrorCodeKey,
} from "../catalog";
import {
  RaffleError,
  isRaffleError,
  toRaffleError,
  CustodyErrors,
  RaffleErrors,
  SystemErrors,
} from "../raffle-error";

const RANGE_PREFIX: Record<string, string> = {
  ACCESS: "1",
  RAFFLE: "2",
  CUSTODY: "3",
  SYSTEM: "9",
};

describe("Error catalog", () => {
  const entries = Object.entries(ErrorCodes);

  it("should use unique numeric codes", () => {
    const codes = entries.map(([, entry]) => entry.code);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it("should keep every code in its group range", () => {
    for (const [key, entry] of entries) {
      const group = key.split("_")[0];
      expect(String(entry.code).startsWith(RANGE_PREFIX[group])).toBe(true);
      expect(ERROR_KINDS).toContain(entry.kind);
    }
  });

  it("should look up entries by numeric code", () => {
    expect(getErrorByCode(2007)).toEqual({
      ...ErrorCodes.RAFFLE_CAPACITY_EXCEEDED,
      key: "RAFFLE_CAPACITY_EXCEEDED",
    });
    expect(getErrorByCode(4242)).toBeUndefined();
  });

  it("should group entries by kind", () => {
    expect(getErrorsByKind("ReentrantCall").map((e) => e.key)).toEqual(["ACCESS_REENTRANT_CALL"]);
    expect(getErrorsByKind("Unauthorized").map((e) => e.key)).toEqual([
      "ACCESS_NOT_OPERATOR",
      "ACCESS_NOT_WINNER",
    ]);
  });

  it("should flag only time and state waits as retryable", () => {
    const retryable: ErrorCodeKey[] = entries
      .map(([key]) => key)
      .filter((key): key is ErrorCodeKey => key in ErrorCodes)
      .filter((key) => isRetryable(key));
    expect(retryable.sort()).toEqual([
      "RAFFLE_CLOSE_WINDOW",
      "RAFFLE_NOT_ENDED",
      "RAFFLE_NO_ENTRIES",
      "RAFFLE_NO_WINNER",
    ]);
  });
});

describe("RaffleError", () => {
  it("should expose catalog fields", () => {
    const error = RaffleErrors.notFound(4);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(RaffleError);
    expect(error.name).toBe("RaffleError");
    expect(error.code).toBe(2001);
    expect(error.kind).toBe("NotFound");
    expect(error.retryable).toBe(false);
    expect(error.message).toBe(ErrorCodes.RAFFLE_NOT_FOUND.message);
    expect(error.details).toEqual({ raffleId: 4 });
  });

  it("should render bigint details as strings in JSON", () => {
    const error = CustodyErrors.insufficientAllowance("0xasset", "0xowner", 15n, 10n);

    const json = JSON.parse(JSON.stringify(error));

    expect(json).toMatchObject({
      name: "RaffleError",
      errorCode: "CUSTODY_INSUFFICIENT_ALLOWANCE",
      code: 3002,
      kind: "InsufficientAuthorization",
      retryable: false,
      details: { asset: "0xasset", owner: "0xowner", required: "15", approved: "10" },
    });
  });

  it("should include the cause in log output", () => {
    const error = SystemErrors.internal(new Error("disk on fire"));

    const log = error.toLog();

    expect(log.errorCode).toBe("SYSTEM_INTERNAL_ERROR");
    expect(log.cause).toMatchObject({ name: "Error", message: "disk on fire" });
  });

  it("should wrap unknown failures as internal errors", () => {
    const original = new Error("unexpected");
    const wrapped = toRaffleError(original);

    expect(wrapped.errorCode).toBe("SYSTEM_INTERNAL_ERROR");
    expect(wrapped.cause).toBe(original);
    expect(wrapped.details).toEqual({ originalMessage: "unexpected" });
    expect(toRaffleError("plain").details).toEqual({ originalMessage: "plain" });
  });

  it("should pass RaffleErrors through unchanged", () => {
    const error = RaffleErrors.zeroTickets(1);

    expect(toRaffleError(error)).toBe(error);
    expect(isRaffleError(error)).toBe(true);
    expect(isRaffleError(new Error("x"))).toBe(false);
  });
});
