/**
 * Raffle Lifecycle Engine
 *
 * Drives each raffle through creation (prize escrow), entry, closure,
 * winner selection and prize claim. Every public mutating operation is
 * synchronous and all-or-nothing: registry, custody ledger and event log are
 * checkpointed before the call and restored if anything throws. Operations
 * that reach the custody gateway hold the re-entrancy lock for their whole
 * duration.
 */

import type {
  Address,
  CreateRaffleInput,
  EntryTrack,
  Raffle,
  RafflePhase,
  RecordedRaffleEvent,
} from "@raffle/types";
import { AccessErrors, RaffleErrors, CustodyErrors, SystemErrors, isRaffleError } from "../errors";
import {
  getLogger,
  generateCorrelationId,
  withCorrelationId,
  type Logger,
  type LogContext,
} from "../logger";
import type { AssetCustodyGateway, Checkpointable } from "../custody";
import { ReentrancyGuard, type OperatorGate } from "../access";
import { isZeroAddress, sameAddress, type ChainContext } from "../chain";
import {
  hasDrawnWinner,
  isTerminalRafflePhase,
  type RaffleLifecycleEvent,
  type TransitionRecord,
} from "../state-machine";
import { LEGACY_POLICY, hasCapacity, type RafflePolicy } from "./policy";
import { BlockHashRandomness, pickWinnerIndex, type RandomnessSource } from "./randomness";
import { RaffleEventLog, type RaffleEventListener } from "./events";
import { RaffleRegistry, cloneRaffle } from "./registry";
import { recordFreeEntry, recordPaidEntry, requiredPayment, ticketsHeldBy } from "./ledger";
import { Treasury } from "./treasury";
import { parseAddress, parseCreateRaffleInput, parseTicketCount } from "./schemas";

// ============================================================================
// Configuration
// ============================================================================

export interface RaffleEngineDeps<TCustodyCheckpoint> {
  custody: AssetCustodyGateway & Checkpointable<TCustodyCheckpoint>;
  access: OperatorGate;
  chain: ChainContext;
  /** Address under which the engine holds escrowed prizes and payments. */
  contractAddress: Address;
  /** Holding any amount of this asset grants free entry. */
  membershipAsset: Address;
  policy?: RafflePolicy;
  randomness?: RandomnessSource;
  guard?: ReentrancyGuard;
  registry?: RaffleRegistry;
  events?: RaffleEventLog;
  logger?: Logger;
}

interface ExecuteOptions {
  /** Hold the re-entrancy lock for the duration of the call. */
  guarded: boolean;
  context?: LogContext;
}

// ============================================================================
// Engine
// ============================================================================

export class RaffleEngine<TCustodyCheckpoint = unknown> {
  private readonly custody: AssetCustodyGateway & Checkpointable<TCustodyCheckpoint>;
  private readonly access: OperatorGate;
  private readonly chain: ChainContext;
  private readonly contractAddress: Address;
  private readonly membershipAsset: Address;
  private readonly policy: Readonly<RafflePolicy>;
  private readonly randomness: RandomnessSource;
  private readonly guard: ReentrancyGuard;
  private readonly registry: RaffleRegistry;
  private readonly events: RaffleEventLog;
  private readonly treasury: Treasury;
  private readonly logger: Logger;
  private depth = 0;

  constructor(deps: RaffleEngineDeps<TCustodyCheckpoint>) {
    this.custody = deps.custody;
    this.access = deps.access;
    this.chain = deps.chain;
    this.contractAddress = parseAddress(deps.contractAddress, "contractAddress");
    this.membershipAsset = parseAddress(deps.membershipAsset, "membershipAsset");
    this.policy = Object.freeze({ ...(deps.policy ?? LEGACY_POLICY) });
    this.randomness = deps.randomness ?? new BlockHashRandomness();
    this.guard = deps.guard ?? new ReentrancyGuard();
    this.logger = (deps.logger ?? getLogger()).child({ component: "raffle-engine" });
    this.registry = deps.registry ?? new RaffleRegistry(() => this.chain.now());
    this.events = deps.events ?? new RaffleEventLog({ logger: this.logger });
    this.treasury = new Treasury({
      custody: this.custody,
      access: this.access,
      custodyAddress: this.contractAddress,
      policy: this.policy,
    });
  }

  // ==========================================================================
  // Operator operations
  // ==========================================================================

  /**
   * Create a raffle and escrow its prize from the operator.
   * Returns the new raffle id.
   */
  createRaffle(caller: Address, input: CreateRaffleInput): number {
    const who = parseAddress(caller, "caller");

    return this.execute("createRaffle", who, { guarded: true }, () => {
      this.access.assertOperator(who);
      const params = parseCreateRaffleInput(input);
      if (isZeroAddress(params.prize.collection)) {
        throw RaffleErrors.invalidPrize();
      }

      const now = this.chain.now();
      if (params.endTimestamp <= now) {
        throw RaffleErrors.endInPast(params.endTimestamp, now);
      }

      const raffle = this.registry.register(params, now);
      this.custody.custodialTransfer(
        params.prize.collection,
        params.prize.tokenId,
        who,
        this.contractAddress,
      );

      this.events.append({ type: "raffle.created", raffleId: raffle.id }, now);
      return raffle.id;
    });
  }

  /**
   * Draw the winner from the ticket pool. The winner is fixed from then on;
   * the prize stays in custody until claimed.
   */
  selectWinner(caller: Address, raffleId: number): Address {
    const who = parseAddress(caller, "caller");

    return this.execute("selectWinner", who, { guarded: true, context: { raffleId } }, () => {
      this.access.assertOperator(who);
      const raffle = this.registry.get(raffleId);
      const machine = this.registry.machine(raffleId);

      machine.setContext({ ticketHolderCount: raffle.ticketHolders.length });
      if (!machine.canTransition("DRAW")) {
        if (hasDrawnWinner(machine.getState())) {
          throw RaffleErrors.winnerAlreadyDrawn(raffleId, raffle.winner);
        }
        throw RaffleErrors.noEntries(raffleId);
      }
      if (isZeroAddress(raffle.prize.collection)) {
        throw RaffleErrors.invalidPrize();
      }

      const now = this.chain.now();
      const poolSize = raffle.ticketHolders.length;
      const seed = this.randomness.seed({
        raffleId,
        previousBlockHash: this.chain.previousBlockHash(),
        timestamp: now,
        freeParticipantCount: raffle.freeParticipants.length,
        poolSize,
      });
      const index = pickWinnerIndex(seed, poolSize);
      const winner = raffle.ticketHolders[index];
      if (winner === undefined) {
        throw SystemErrors.internal(new Error(`Draw index ${index} outside pool of ${poolSize}`));
      }

      const result = machine.transition("DRAW", { winner, index });
      if (!result.ok) {
        throw RaffleErrors.noEntries(raffleId);
      }
      machine.setContext({ winner });
      raffle.winner = winner;

      if (this.policy.emitWinnerDrawn) {
        this.events.append(
          { type: "winner.drawn", raffleId, winner, totalEntriesSold: raffle.totalEntriesSold },
          now,
        );
      }
      return winner;
    });
  }

  /**
   * Withdraw `amount` of a fungible asset held in custody.
   * Returns the address that received the funds.
   */
  withdraw(caller: Address, asset: Address, amount: bigint): Address {
    const who = parseAddress(caller, "caller");
    const token = parseAddress(asset, "asset");

    return this.execute("withdraw", who, { guarded: true, context: { asset: token } }, () => {
      const withdrawal = this.treasury.withdraw(who, token, amount);
      this.events.append({ type: "treasury.withdrawn", ...withdrawal }, this.chain.now());
      return withdrawal.recipient;
    });
  }

  /** Hand the operator role to `next`. */
  transferOperator(caller: Address, next: Address): void {
    const who = parseAddress(caller, "caller");
    const nextOperator = parseAddress(next, "next");

    this.execute("transferOperator", who, { guarded: false }, () => {
      this.access.transferOperator(who, nextOperator);
    });
  }

  // ==========================================================================
  // Participant operations
  // ==========================================================================

  /**
   * Buy `ticketCount` tickets, or enter for free when the caller holds the
   * membership asset.
   */
  joinRaffle(caller: Address, raffleId: number, ticketCount: number, paymentAsset: Address): void {
    const who = parseAddress(caller, "caller");

    this.execute(
      "joinRaffle",
      who,
      { guarded: true, context: { raffleId, ticketCount } },
      () => {
        const raffle = this.registry.get(raffleId);
        const now = this.chain.now();

        if (!(now < raffle.endTimestamp)) {
          throw RaffleErrors.ended(raffleId, raffle.endTimestamp, now);
        }
        const count = parseTicketCount(ticketCount);
        if (count <= 0) {
          throw RaffleErrors.zeroTickets(raffleId);
        }
        if (!hasCapacity(this.policy, count, raffle.totalEntriesSold, raffle.maxEntries)) {
          throw RaffleErrors.capacityExceeded(
            raffleId,
            count,
            raffle.totalEntriesSold,
            raffle.maxEntries,
          );
        }
        if (this.policy.enforcePerUserCap) {
          const held = ticketsHeldBy(raffle, who);
          if (held + count > raffle.maxEntriesPerUser) {
            throw RaffleErrors.userLimitReached(raffleId, held, count, raffle.maxEntriesPerUser);
          }
        }

        let track: EntryTrack;
        if (this.isMembershipHolder(who)) {
          track = "free";
          recordFreeEntry(raffle, who, count, this.policy.freeTrackPoolSlots);
        } else {
          track = "paid";
          this.collectPayment(raffle, who, count, paymentAsset);
          recordPaidEntry(raffle, who, count);
        }

        this.events.append(
          { type: "entry.submitted", raffleId, participant: who, ticketCount: count, track },
          now,
        );
      },
    );
  }

  /**
   * Close a raffle to further entries by moving its end time to now.
   * Anyone may call this.
   */
  endRaffle(caller: Address, raffleId: number): void {
    const who = parseAddress(caller, "caller");

    this.execute("endRaffle", who, { guarded: false, context: { raffleId } }, () => {
      const raffle = this.registry.get(raffleId);
      const now = this.chain.now();

      if (this.policy.endRaffleTiming === "before-deadline") {
        if (raffle.endTimestamp < now) {
          throw RaffleErrors.closeWindow(raffleId, raffle.endTimestamp, now);
        }
      } else {
        if (!raffle.isOpen) {
          throw RaffleErrors.alreadyClosed(raffleId);
        }
        if (now < raffle.endTimestamp) {
          throw RaffleErrors.notEnded(raffleId, raffle.endTimestamp, now);
        }
      }

      raffle.endTimestamp = now;
      raffle.isOpen = false;
      this.events.append({ type: "raffle.closed", raffleId, closedAt: now }, now);
    });
  }

  /** Transfer the escrowed prize to the drawn winner. */
  claimPrize(caller: Address, raffleId: number): void {
    const who = parseAddress(caller, "caller");

    this.execute("claimPrize", who, { guarded: true, context: { raffleId } }, () => {
      const raffle = this.registry.get(raffleId);
      const machine = this.registry.machine(raffleId);
      const now = this.chain.now();

      if (now < raffle.endTimestamp) {
        throw RaffleErrors.notEnded(raffleId, raffle.endTimestamp, now);
      }
      const winnerMissing =
        this.policy.claimWinnerCheck === "free-participants"
          ? raffle.freeParticipants.length === 0
          : raffle.winner === null;
      if (winnerMissing) {
        throw RaffleErrors.noWinner(raffleId);
      }
      if (!sameAddress(who, raffle.winner)) {
        throw AccessErrors.notWinner(raffleId, who);
      }
      const firstClaim = !isTerminalRafflePhase(machine.getState());
      if (!firstClaim && this.policy.preventReclaim) {
        throw RaffleErrors.alreadyClaimed(raffleId);
      }
      if (firstClaim) {
        machine.setContext({ claimant: who });
        if (!machine.canTransition("CLAIM")) {
          throw AccessErrors.notWinner(raffleId, who);
        }
      }

      this.custody.custodialTransfer(
        raffle.prize.collection,
        raffle.prize.tokenId,
        this.contractAddress,
        who,
      );

      if (firstClaim) {
        machine.transition("CLAIM", { claimant: who });
      }
      raffle.claimedAt = now;

      this.events.append({ type: "prize.claimed", raffleId, winner: who }, now);
    });
  }

  // ==========================================================================
  // Read accessors
  // ==========================================================================

  /** Copy of the raffle record. */
  getRaffle(raffleId: number): Raffle {
    return cloneRaffle(this.registry.get(raffleId));
  }

  getActiveRaffleIds(): number[] {
    return this.registry.getActiveIds();
  }

  isRaffleOpen(raffleId: number): boolean {
    return this.registry.get(raffleId).isOpen;
  }

  isMembershipHolder(identity: Address): boolean {
    return this.custody.balanceOf(this.membershipAsset, identity) > 0n;
  }

  /** Custody balance of a fungible asset. */
  balanceOf(asset: Address): bigint {
    return this.treasury.balanceOf(parseAddress(asset, "asset"));
  }

  /** Draw pool slots held by `identity` in a raffle. */
  getTicketsOf(raffleId: number, identity: Address): number {
    return ticketsHeldBy(this.registry.get(raffleId), parseAddress(identity, "identity"));
  }

  /** Draw/claim transition audit trail of a raffle. */
  getRaffleHistory(raffleId: number): ReadonlyArray<TransitionRecord<RafflePhase, RaffleLifecycleEvent>> {
    return this.registry.machine(raffleId).getHistory();
  }

  getEvents(): readonly RecordedRaffleEvent[] {
    return this.events.all();
  }

  /** Subscribe to committed events. Returns an unsubscribe function. */
  onEvent(listener: RaffleEventListener): () => void {
    return this.events.subscribe(listener);
  }

  operator(): Address {
    return this.access.operator();
  }

  get activePolicy(): Readonly<RafflePolicy> {
    return this.policy;
  }

  get custodyAddress(): Address {
    return this.contractAddress;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private collectPayment(raffle: Raffle, payer: Address, count: number, paymentAsset: Address): void {
    const asset = parseAddress(paymentAsset, "paymentAsset");
    if (isZeroAddress(asset)) {
      throw CustodyErrors.invalidAsset();
    }

    const cost = requiredPayment(raffle, count);
    const approved = this.custody.allowance(asset, payer, this.contractAddress);
    if (approved < cost) {
      throw CustodyErrors.insufficientAllowance(asset, payer, cost, approved);
    }
    this.custody.transferFrom(asset, this.contractAddress, payer, this.contractAddress, cost);
  }

  /**
   * Run one operation as an indivisible unit. Nested calls (made from a
   * custody callback) share the outermost call's correlation id and only the
   * outermost call delivers events.
   */
  private execute<T>(
    operation: string,
    caller: Address,
    options: ExecuteOptions,
    fn: () => T,
  ): T {
    const outermost = this.depth === 0;
    const run = (): T => {
      const started = Date.now();
      const registryCheckpoint = this.registry.checkpoint();
      const custodyCheckpoint = this.custody.checkpoint();
      const eventsCheckpoint = this.events.checkpoint();
      const logContext: LogContext = { operation, caller, ...options.context };

      this.depth += 1;
      let result: T;
      try {
        result = options.guarded ? this.guard.run(operation, fn) : fn();
      } catch (error) {
        this.registry.rollback(registryCheckpoint);
        this.custody.rollback(custodyCheckpoint);
        this.events.rollback(eventsCheckpoint);

        if (isRaffleError(error)) {
          this.logger.warn(`${operation} rejected`, { ...logContext, failure: error.toLog() });
        } else {
          this.logger.error(`${operation} failed`, {
            ...logContext,
            error: error instanceof Error ? error : new Error(String(error)),
          });
        }
        throw error;
      } finally {
        this.depth -= 1;
      }
      this.registry.commit(registryCheckpoint);
      this.custody.commit(custodyCheckpoint);
      this.events.commit();

      if (outermost) {
        this.events.flush();
      }
      this.logger.info(`${operation} committed`, logContext);
      this.logger.timing({ operation, duration: Date.now() - started, success: true });
      return result;
    };

    return outermost ? withCorrelationId(generateCorrelationId(), run) : run();
  }
}
