/**
 * Append-only raffle event log.
 *
 * Events are appended while an engine call runs, dropped again if the call
 * reverts, and delivered to listeners only once the outermost call has
 * committed.
 */

import type { RaffleEvent, RecordedRaffleEvent } from "@raffle/types";
import type { Checkpointable } from "../custody";
import type { Logger } from "../logger";

export type RaffleEventListener = (event: RecordedRaffleEvent) => void;

export class RaffleEventLog implements Checkpointable<number> {
  private events: RecordedRaffleEvent[] = [];
  private delivered = 0;
  private readonly listeners = new Set<RaffleEventListener>();
  private readonly logger?: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger;
  }

  get size(): number {
    return this.events.length;
  }

  append(event: RaffleEvent, timestamp: number): RecordedRaffleEvent {
    const recorded: RecordedRaffleEvent = {
      ...event,
      sequence: this.events.length + 1,
      timestamp,
    };
    this.events.push(recorded);
    return recorded;
  }

  all(): readonly RecordedRaffleEvent[] {
    return [...this.events];
  }

  /** Subscribe to every committed event. Returns an unsubscribe function. */
  subscribe(listener: RaffleEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  checkpoint(): number {
    return this.events.length;
  }

  commit(): void {
    // events stay buffered until the outermost call flushes
  }

  rollback(checkpoint: number): void {
    this.events.length = checkpoint;
    this.delivered = Math.min(this.delivered, checkpoint);
  }

  /** Deliver events committed since the last flush. */
  flush(): void {
    while (this.delivered < this.events.length) {
      const event = this.events[this.delivered];
      this.delivered += 1;
      this.deliver(event);
    }
  }

  private deliver(event: RecordedRaffleEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        // Listener failures never revert committed state.
        this.logger?.error("Raffle event listener failed", {
          eventType: event.type,
          sequence: event.sequence,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
  }
}
