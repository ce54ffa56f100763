/**
 * Lightweight, type-safe state machine.
 *
 * Deterministic state transitions with guard conditions, a transition hook,
 * and full transition history for audit. Transitions are synchronous so a
 * machine can take part in an all-or-nothing engine call.
 */

// ---------------------------------------------------------------------------
// Core types
// ---------------------------------------------------------------------------

/** A single recorded transition for audit trail / persistence. */
export interface TransitionRecord<TState extends string, TEvent extends string> {
  from: TState;
  to: TState;
  event: TEvent;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/** Guard predicate - must return true for the transition to proceed. */
export type GuardFn<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> = (context: TContext, event: TEvent, from: TState, to: TState) => boolean;

/** Side-effect hook signature. */
export type HookFn<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> = (
  context: TContext,
  event: TEvent,
  from: TState,
  to: TState,
  metadata?: Record<string, unknown>,
) => void;

/** Definition of a single allowed transition. */
export interface TransitionDef<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> {
  from: TState | TState[];
  to: TState;
  event: TEvent;
  guard?: GuardFn<TState, TEvent, TContext>;
  /** Human-readable description for documentation / error messages. */
  guardDescription?: string;
}

/** Full configuration required to create a state machine. */
export interface StateMachineConfig<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> {
  id: string;
  initial: TState;
  states: readonly TState[];
  context: TContext;
  transitions: TransitionDef<TState, TEvent, TContext>[];
  /** Fires after every successful transition. */
  onTransition?: HookFn<TState, TEvent, TContext>;
  /** Maximum number of history entries to retain in memory (default 1000). */
  maxHistorySize?: number;
  /** Clock used for history timestamps (default Date.now). */
  now?: () => number;
}

/** Serializable snapshot of machine state. */
export interface MachineSnapshot<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> {
  id: string;
  currentState: TState;
  context: TContext;
  history: TransitionRecord<TState, TEvent>[];
  createdAt: number;
  updatedAt: number;
}

/** Reason a transition was denied. */
export interface TransitionDenied<TState extends string, TEvent extends string> {
  ok: false;
  reason: "no_transition" | "guard_failed";
  from: TState;
  event: TEvent;
  guardDescription?: string;
}

export interface TransitionSuccess<TState extends string, TEvent extends string> {
  ok: true;
  from: TState;
  to: TState;
  event: TEvent;
}

export type TransitionResult<TState extends string, TEvent extends string> =
  | TransitionSuccess<TState, TEvent>
  | TransitionDenied<TState, TEvent>;

// ---------------------------------------------------------------------------
// State machine instance
// ---------------------------------------------------------------------------

export interface StateMachine<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
> {
  readonly id: string;

  getState(): TState;

  /** Update context without transitioning. */
  setContext(partial: Partial<TContext>): void;

  /**
   * Attempt a state transition.
   * Returns a discriminated union indicating success or failure reason.
   */
  transition(
    event: TEvent,
    metadata?: Record<string, unknown>,
  ): TransitionResult<TState, TEvent>;

  /** Check whether a transition is currently allowed (without executing it). */
  canTransition(event: TEvent): boolean;

  getHistory(): ReadonlyArray<TransitionRecord<TState, TEvent>>;

  serialize(): MachineSnapshot<TState, TEvent, TContext>;

  /** Restore state from a previously serialized snapshot. */
  restore(snapshot: MachineSnapshot<TState, TEvent, TContext>): void;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createStateMachine<
  TState extends string,
  TEvent extends string,
  TContext extends Record<string, unknown>,
>(config: StateMachineConfig<TState, TEvent, TContext>): StateMachine<TState, TEvent, TContext> {
  const { id, states, transitions, onTransition, maxHistorySize = 1000, now = Date.now } = config;

  if (!states.includes(config.initial)) {
    throw new Error(
      `[StateMachine:${id}] Initial state "${config.initial}" is not in the states list.`,
    );
  }

  // Map<fromState, Map<event, TransitionDef>>
  const transitionMap = new Map<TState, Map<TEvent, TransitionDef<TState, TEvent, TContext>>>();

  for (const t of transitions) {
    const froms = Array.isArray(t.from) ? t.from : [t.from];
    for (const from of froms) {
      let eventMap = transitionMap.get(from);
      if (!eventMap) {
        eventMap = new Map();
        transitionMap.set(from, eventMap);
      }
      if (eventMap.has(t.event)) {
        throw new Error(
          `[StateMachine:${id}] Duplicate transition: ${from} --${t.event}--> (already defined).`,
        );
      }
      eventMap.set(t.event, t);
    }
  }

  let currentState: TState = config.initial;
  let context: TContext = { ...config.context };
  let history: TransitionRecord<TState, TEvent>[] = [];
  const createdAt = now();
  let updatedAt = createdAt;

  // -- helpers --------------------------------------------------------------

  function findTransition(
    event: TEvent,
  ): TransitionDef<TState, TEvent, TContext> | undefined {
    return transitionMap.get(currentState)?.get(event);
  }

  function pruneHistory(): void {
    if (history.length > maxHistorySize) {
      history = history.slice(history.length - maxHistorySize);
    }
  }

  // -- public API -----------------------------------------------------------

  return {
    id,

    getState() {
      return currentState;
    },

    setContext(partial: Partial<TContext>) {
      context = { ...context, ...partial };
      updatedAt = now();
    },

    transition(event, metadata) {
      const from = currentState;
      const tDef = findTransition(event);
      if (!tDef) {
        return { ok: false, reason: "no_transition", from, event };
      }

      const to = tDef.to;
      if (tDef.guard && !tDef.guard(context, event, from, to)) {
        return {
          ok: false,
          reason: "guard_failed",
          from,
          event,
          guardDescription: tDef.guardDescription,
        };
      }

      currentState = to;
      updatedAt = now();
      history.push({ from, to, event, timestamp: updatedAt, metadata });
      pruneHistory();

      onTransition?.(context, event, from, to, metadata);

      return { ok: true, from, to, event };
    },

    canTransition(event) {
      const tDef = findTransition(event);
      if (!tDef) return false;
      return !tDef.guard || tDef.guard(context, event, currentState, tDef.to);
    },

    getHistory() {
      return Object.freeze([...history]);
    },

    serialize(): MachineSnapshot<TState, TEvent, TContext> {
      return {
        id,
        currentState,
        context: { ...context },
        history: [...history],
        createdAt,
        updatedAt,
      };
    },

    restore(snapshot) {
      if (snapshot.id !== id) {
        throw new Error(
          `[StateMachine:${id}] Cannot restore snapshot from machine "${snapshot.id}".`,
        );
      }
      if (!states.includes(snapshot.currentState)) {
        throw new Error(
          `[StateMachine:${id}] Snapshot state "${snapshot.currentState}" is not valid.`,
        );
      }
      currentState = snapshot.currentState;
      context = { ...snapshot.context };
      history = [...snapshot.history];
      updatedAt = snapshot.updatedAt;
    },
  };
}
