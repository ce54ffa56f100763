/**
 * Entry Ledger Tests
 */

import { describe, it, expect } from "vitest";
import type { Raffle } from "@raffle/types";
import { recordFreeEntry, recordPaidEntry, requiredPayment, ticketsHeldBy } from "../ledger";
import { ALICE, BOB, PRIZE_COLLECTION, START } from "./fixtures";

function emptyRaffle(): Raffle {
  return {
    id: 1,
    prize: { collection: PRIZE_COLLECTION, tokenId: 1n },
    maxEntriesPerUser: 10,
    entryCost: 7n,
    maxEntries: 100,
    totalEntriesSold: 0,
    freeParticipants: [],
    ticketHolders: [],
    endTimestamp: START + 60,
    winner: null,
    isOpen: true,
    phase: "accepting",
    createdAt: START,
    claimedAt: null,
  };
}

describe("entry ledger", () => {
  it("should price tickets at entry cost times count", () => {
    expect(requiredPayment(emptyRaffle(), 3)).toBe(21n);
    expect(requiredPayment({ entryCost: 0n }, 5)).toBe(0n);
  });

  it("should append one slot per paid ticket", () => {
    const raffle = emptyRaffle();

    recordPaidEntry(raffle, ALICE, 2);
    recordPaidEntry(raffle, BOB, 1);

    expect(raffle.ticketHolders).toEqual([ALICE, ALICE, BOB]);
    expect(raffle.totalEntriesSold).toBe(3);
    expect(raffle.freeParticipants).toEqual([]);
  });

  it("should record free joins by participant", () => {
    const perTicket = emptyRaffle();
    const perCall = emptyRaffle();

    recordFreeEntry(perTicket, BOB, 3, "per-ticket");
    recordFreeEntry(perCall, BOB, 3, "per-call");

    expect(perTicket.ticketHolders).toEqual([BOB, BOB, BOB]);
    expect(perCall.ticketHolders).toEqual([BOB]);
    expect(perTicket.freeParticipants).toEqual([BOB]);
    expect(perCall.freeParticipants).toEqual([BOB]);
    expect(perCall.totalEntriesSold).toBe(3);
  });

  it("should count held slots ignoring address case", () => {
    const raffle = emptyRaffle();
    recordPaidEntry(raffle, ALICE, 2);

    expect(ticketsHeldBy(raffle, ALICE)).toBe(2);
    expect(ticketsHeldBy(raffle, BOB)).toBe(0);
  });
});
