/**
 * Raffle domain types shared across the escrow raffle workspace.
 * Covers raffle records, prize references, entry tracks, and emitted events.
 */

/** Checksummed 20-byte hex identity or asset address */
export type Address = `0x${string}`;

/** Non-fungible prize held in escrow */
export interface PrizeAssetRef {
  collection: Address;
  tokenId: bigint;
}

/** Lifecycle phase of a raffle, driven by the lifecycle machine */
export type RafflePhase = "accepting" | "drawn" | "claimed";

/** How an entry was admitted */
export type EntryTrack = "paid" | "free";

/** Raffle record */
export interface Raffle {
  id: number;
  prize: PrizeAssetRef;
  /** Declared cap per identity; only enforced under the corrected policy */
  maxEntriesPerUser: number;
  /** Price per paid ticket, in base units of the chosen payment asset */
  entryCost: bigint;
  maxEntries: number;
  totalEntriesSold: number;
  freeParticipants: Address[];
  /** Weighted draw pool */
  ticketHolders: Address[];
  /** Unix seconds; overwritten with the close time by endRaffle */
  endTimestamp: number;
  winner: Address | null;
  isOpen: boolean;
  phase: RafflePhase;
  createdAt: number;
  claimedAt: number | null;
}

/** Parameters accepted when creating a raffle */
export interface CreateRaffleInput {
  prize: PrizeAssetRef;
  maxEntriesPerUser: number;
  endTimestamp: number;
  entryCost: bigint;
  maxEntries: number;
}

/** Events raised by the raffle engine */
export type RaffleEvent =
  | { type: "raffle.created"; raffleId: number }
  | {
      type: "entry.submitted";
      raffleId: number;
      participant: Address;
      ticketCount: number;
      track: EntryTrack;
    }
  | {
      type: "winner.drawn";
      raffleId: number;
      winner: Address;
      totalEntriesSold: number;
    }
  | { type: "raffle.closed"; raffleId: number; closedAt: number }
  | { type: "prize.claimed"; raffleId: number; winner: Address }
  | {
      type: "treasury.withdrawn";
      asset: Address;
      amount: bigint;
      recipient: Address;
    };

export type RaffleEventType = RaffleEvent["type"];

/** An event as stored in the append-only log */
export type RecordedRaffleEvent = RaffleEvent & {
  sequence: number;
  timestamp: number;
};
