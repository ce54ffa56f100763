/**
 * Raffle lifecycle state machine.
 *
 * Tracks the draw/claim phase of a single raffle:
 *   accepting --DRAW--> drawn --CLAIM--> claimed
 *
 * Entry acceptance and closure are time-driven and live on the raffle
 * record; this machine owns the one-way winner and prize transitions.
 */

import {
  createStateMachine,
  type HookFn,
  type StateMachineConfig,
  type StateMachine,
} from "./machine";
import type { Address, RafflePhase } from "@raffle/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const RAFFLE_PHASES = ["accepting", "drawn", "claimed"] as const satisfies readonly RafflePhase[];

export const RAFFLE_EVENTS = ["DRAW", "CLAIM"] as const;

export type RaffleLifecycleEvent = (typeof RAFFLE_EVENTS)[number];

export interface RaffleLifecycleContext extends Record<string, unknown> {
  raffleId: number;
  ticketHolderCount: number;
  winner: Address | null;
  claimant: Address | null;
}

// ---------------------------------------------------------------------------
// Machine configuration
// ---------------------------------------------------------------------------

export interface RaffleMachineOptions {
  /** Clock for history timestamps. */
  now?: () => number;
  onTransition?: HookFn<RafflePhase, RaffleLifecycleEvent, RaffleLifecycleContext>;
}

function buildRaffleConfig(
  context: RaffleLifecycleContext,
  options: RaffleMachineOptions,
): StateMachineConfig<RafflePhase, RaffleLifecycleEvent, RaffleLifecycleContext> {
  return {
    id: `raffle:${context.raffleId}`,
    initial: "accepting",
    states: RAFFLE_PHASES,
    context,
    now: options.now,
    onTransition: options.onTransition,
    transitions: [
      {
        from: "accepting",
        to: "drawn",
        event: "DRAW",
        guard: (ctx) => ctx.ticketHolderCount > 0,
        guardDescription: "Draw pool must hold at least one ticket",
      },
      {
        from: "drawn",
        to: "claimed",
        event: "CLAIM",
        guard: (ctx) => ctx.winner !== null && ctx.claimant === ctx.winner,
        guardDescription: "Only the drawn winner can claim the prize",
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export type RaffleMachine = StateMachine<RafflePhase, RaffleLifecycleEvent, RaffleLifecycleContext>;

export type RaffleMachineSnapshot = ReturnType<RaffleMachine["serialize"]>;

/**
 * Create the lifecycle machine for a newly created raffle.
 *
 * @example
 * ```ts
 * const machine = createRaffleMachine(7, {
 *   now: chain.now,
 *   onTransition: (_ctx, _event, _from, to) => (raffle.phase = to),
 * });
 * machine.setContext({ ticketHolderCount: 12 });
 * machine.transition("DRAW");
 * ```
 */
export function createRaffleMachine(
  raffleId: number,
  options: RaffleMachineOptions = {},
): RaffleMachine {
  return createStateMachine(
    buildRaffleConfig({ raffleId, ticketHolderCount: 0, winner: null, claimant: null }, options),
  );
}

/** Once claimed, the escrowed prize has left custody. */
export function isTerminalRafflePhase(phase: RafflePhase): boolean {
  return phase === "claimed";
}

export function hasDrawnWinner(phase: RafflePhase): boolean {
  return phase === "drawn" || phase === "claimed";
}
