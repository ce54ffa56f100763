/**
 * Input Validation Tests
 */

import { describe, it, expect } from "vitest";
import {
  MAX_RAFFLE_ENTRIES,
  parseAddress,
  parseCreateRaffleInput,
  parseTicketCount,
} from "../schemas";
import { expectRaffleError, raffleInput } from "./fixtures";

describe("parseCreateRaffleInput", () => {
  it("should accept valid parameters and checksum the collection", () => {
    const parsed = parseCreateRaffleInput(
      raffleInput({ prize: { collection: "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd", tokenId: 4n } }),
    );

    expect(parsed.prize.collection.toLowerCase()).toBe("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd");
    expect(parsed.prize.tokenId).toBe(4n);
    expect(parsed.entryCost).toBe(5n);
  });

  it("should key failures by field path", () => {
    const error = expectRaffleError(
      () =>
        parseCreateRaffleInput({
          ...raffleInput(),
          prize: { collection: "0x12", tokenId: 1n },
          entryCost: -1n,
        }),
      "RAFFLE_INVALID_INPUT",
    );

    expect(error.details).toEqual({
      fields: { "prize.collection": "Invalid address", entryCost: expect.any(String) },
    });
  });
});

describe("raffle capacity bound", () => {
  it("should accept a cap at the bound and reject one above it", () => {
    expect(parseCreateRaffleInput(raffleInput({ maxEntries: MAX_RAFFLE_ENTRIES })).maxEntries).toBe(
      1_000_000,
    );

    const error = expectRaffleError(
      () => parseCreateRaffleInput(raffleInput({ maxEntries: MAX_RAFFLE_ENTRIES + 1 })),
      "RAFFLE_INVALID_INPUT",
    );

    expect(error.details).toEqual({ fields: { maxEntries: "Must be at most 1000000" } });
  });
});

describe("parseAddress", () => {
  it("should name the offending field", () => {
    const error = expectRaffleError(() => parseAddress("0xnope", "caller"), "RAFFLE_INVALID_INPUT");

    expect(error.details).toEqual({ fields: { caller: "Invalid address" } });
  });
});

describe("parseTicketCount", () => {
  it("should pass through integers and reject the rest", () => {
    expect(parseTicketCount(3)).toBe(3);
    expectRaffleError(() => parseTicketCount(Number.NaN), "RAFFLE_INVALID_INPUT");
    expectRaffleError(() => parseTicketCount(2 ** 60), "RAFFLE_INVALID_INPUT");
  });
});
