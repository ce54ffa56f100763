/**
 * Escrow Raffle - Shared TypeScript Types
 *
 * @example
 * import type { Raffle, RaffleEvent } from "@raffle/types";
 */

export type {
  Address,
  PrizeAssetRef,
  RafflePhase,
  EntryTrack,
  Raffle,
  CreateRaffleInput,
  RaffleEvent,
  RaffleEventType,
  RecordedRaffleEvent,
} from "./raffle";
