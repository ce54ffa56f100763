/**
 * Raffle registry.
 *
 * Owns the id counter, the raffle records, their lifecycle machines and the
 * list of active ids. The engine is its only writer.
 */

import type { CreateRaffleInput, Raffle } from "@raffle/types";
import { RaffleErrors } from "../errors";
import type { Checkpointable } from "../custody";
import {
  createRaffleMachine,
  type RaffleMachine,
  type RaffleMachineSnapshot,
} from "../state-machine";

interface SavedRaffle {
  record: Raffle;
  machine: RaffleMachineSnapshot;
}

/**
 * One open engine call. Records are saved the first time the call touches
 * them, so a frame holds only what that call (and its nested calls) read.
 */
export interface RegistryCheckpoint {
  lastId: number;
  activeCount: number;
  saved: Map<number, SavedRaffle>;
}

export function cloneRaffle(raffle: Raffle): Raffle {
  return {
    ...raffle,
    prize: { ...raffle.prize },
    freeParticipants: [...raffle.freeParticipants],
    ticketHolders: [...raffle.ticketHolders],
  };
}

export class RaffleRegistry implements Checkpointable<RegistryCheckpoint> {
  private lastId = 0;
  private readonly raffles = new Map<number, Raffle>();
  private readonly machines = new Map<number, RaffleMachine>();
  private readonly activeIds: number[] = [];
  private readonly frames: RegistryCheckpoint[] = [];
  private readonly now?: () => number;

  /** @param now clock for lifecycle history timestamps */
  constructor(now?: () => number) {
    this.now = now;
  }

  get size(): number {
    return this.raffles.size;
  }

  /** Allocate the next id (ids start at 1) and insert a fresh record. */
  register(input: CreateRaffleInput, createdAt: number): Raffle {
    this.lastId += 1;
    const id = this.lastId;

    const raffle: Raffle = {
      id,
      prize: { ...input.prize },
      maxEntriesPerUser: input.maxEntriesPerUser,
      entryCost: input.entryCost,
      maxEntries: input.maxEntries,
      totalEntriesSold: 0,
      freeParticipants: [],
      ticketHolders: [],
      endTimestamp: input.endTimestamp,
      winner: null,
      isOpen: true,
      phase: "accepting",
      createdAt,
      claimedAt: null,
    };

    const machine = createRaffleMachine(id, {
      now: this.now,
      onTransition: (_ctx, _event, _from, to) => {
        raffle.phase = to;
      },
    });

    this.raffles.set(id, raffle);
    this.machines.set(id, machine);
    this.activeIds.push(id);
    return raffle;
  }

  has(id: number): boolean {
    return this.raffles.has(id);
  }

  /** Live record; throws NotFound for unknown ids. */
  get(id: number): Raffle {
    const raffle = this.raffles.get(id);
    if (!raffle) {
      throw RaffleErrors.notFound(id);
    }
    this.touch(id);
    return raffle;
  }

  machine(id: number): RaffleMachine {
    const machine = this.machines.get(id);
    if (!machine) {
      throw RaffleErrors.notFound(id);
    }
    this.touch(id);
    return machine;
  }

  getActiveIds(): number[] {
    return [...this.activeIds];
  }

  checkpoint(): RegistryCheckpoint {
    const frame: RegistryCheckpoint = {
      lastId: this.lastId,
      activeCount: this.activeIds.length,
      saved: new Map(),
    };
    this.frames.push(frame);
    return frame;
  }

  commit(checkpoint: RegistryCheckpoint): void {
    this.close(checkpoint);
  }

  /**
   * Undo everything since the checkpoint. Records and machines are restored
   * in place, so references held by an enclosing call stay live.
   */
  rollback(checkpoint: RegistryCheckpoint): void {
    for (const [id, saved] of checkpoint.saved) {
      const raffle = this.raffles.get(id);
      if (raffle) {
        Object.assign(raffle, cloneRaffle(saved.record));
      }
      this.machines.get(id)?.restore(saved.machine);
    }
    for (let id = checkpoint.lastId + 1; id <= this.lastId; id++) {
      this.raffles.delete(id);
      this.machines.delete(id);
    }
    this.lastId = checkpoint.lastId;
    this.activeIds.length = checkpoint.activeCount;
    this.close(checkpoint);
  }

  private close(checkpoint: RegistryCheckpoint): void {
    const index = this.frames.lastIndexOf(checkpoint);
    if (index === -1) {
      throw new Error("Registry checkpoint is not open");
    }
    this.frames.length = index;
  }

  private touch(id: number): void {
    for (const frame of this.frames) {
      // raffles created after the frame opened are dropped on rollback
      if (id > frame.lastId || frame.saved.has(id)) continue;
      const raffle = this.raffles.get(id);
      const machine = this.machines.get(id);
      if (raffle && machine) {
        frame.saved.set(id, { record: cloneRaffle(raffle), machine: machine.serialize() });
      }
    }
  }
}
