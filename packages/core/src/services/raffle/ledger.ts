/**
 * Entry ledger operations over a raffle record.
 *
 * `ticketHolders` is the weighted draw pool and `freeParticipants` records
 * every free-track join. Both only ever grow.
 */

import type { Address, Raffle } from "@raffle/types";
import type { RafflePolicy } from "./policy";

/** Payment owed for `ticketCount` paid tickets. */
export function requiredPayment(raffle: Pick<Raffle, "entryCost">, ticketCount: number): bigint {
  return raffle.entryCost * BigInt(ticketCount);
}

export function recordPaidEntry(raffle: Raffle, participant: Address, ticketCount: number): void {
  appendSlots(raffle, participant, ticketCount);
  raffle.totalEntriesSold += ticketCount;
}

export function recordFreeEntry(
  raffle: Raffle,
  participant: Address,
  ticketCount: number,
  slots: RafflePolicy["freeTrackPoolSlots"],
): void {
  raffle.freeParticipants.push(participant);
  appendSlots(raffle, participant, slots === "per-ticket" ? ticketCount : 1);
  raffle.totalEntriesSold += ticketCount;
}

/** Draw pool slots held by `identity`. */
export function ticketsHeldBy(raffle: Pick<Raffle, "ticketHolders">, identity: Address): number {
  const needle = identity.toLowerCase();
  return raffle.ticketHolders.filter((holder) => holder.toLowerCase() === needle).length;
}

function appendSlots(raffle: Raffle, participant: Address, count: number): void {
  for (let i = 0; i < count; i++) {
    raffle.ticketHolders.push(participant);
  }
}
