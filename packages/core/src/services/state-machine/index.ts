/**
 * State Machine Library
 *
 * Lightweight, type-safe state machines. The raffle lifecycle machine drives
 * the draw and claim phases of each raffle.
 */

export {
  createStateMachine,
  type StateMachine,
  type StateMachineConfig,
  type MachineSnapshot,
  type TransitionRecord,
  type TransitionResult,
  type TransitionSuccess,
  type TransitionDenied,
  type TransitionDef,
  type GuardFn,
  type HookFn,
} from "./machine";

export {
  createRaffleMachine,
  isTerminalRafflePhase,
  hasDrawnWinner,
  RAFFLE_PHASES,
  RAFFLE_EVENTS,
  type RaffleMachine,
  type RaffleMachineSnapshot,
  type RaffleMachineOptions,
  type RaffleLifecycleEvent,
  type RaffleLifecycleContext,
} from "./raffle-machine";
