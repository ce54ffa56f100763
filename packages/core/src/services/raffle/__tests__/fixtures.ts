/**
 * Shared fixtures for raffle engine tests
 */

import { expect } from "vitest";
import type { Address, CreateRaffleInput } from "@raffle/types";
import { toAddress } from "../../chain";
import type { CustodyHooks } from "../../custody";
import { createLogger } from "../../logger";
import { isRaffleError, type ErrorCodeKey, type RaffleError } from "../../errors";
import type { RaffleConfig } from "../../config";
import { createSimulatedRaffle, type SimulatedRaffle } from "../factory";
import { LEGACY_POLICY, type RafflePolicy } from "../policy";
import type { DrawInput, RandomnessSource } from "../randomness";

function addr(byte: string): Address {
  return toAddress(`0x${byte.repeat(20)}`);
}

export const OPERATOR = addr("10");
export const ALICE = addr("20");
export const BOB = addr("30");
export const CAROL = addr("40");
export const DAVE = addr("50");
export const PRIZE_COLLECTION = addr("60");
export const PAYMENT_TOKEN = addr("70");
export const MEMBERSHIP = addr("80");
export const CONTRACT = addr("90");
export const ZERO = toAddress("0x0000000000000000000000000000000000000000");

export const START = 1_700_000_000;
export const DURATION = 3_600;

export const silentLogger = createLogger({
  level: "fatal",
  serviceName: "raffle-test",
  environment: "test",
});

/** Returns a fixed seed and remembers what it was asked for. */
export class FixedRandomness implements RandomnessSource {
  public calls: DrawInput[] = [];

  constructor(public value: bigint) {}

  seed(input: DrawInput): bigint {
    this.calls.push(input);
    return this.value;
  }
}

export interface SetupOptions {
  policy?: RafflePolicy;
  randomness?: RandomnessSource;
  hooks?: CustodyHooks;
}

export function testConfig(policy: RafflePolicy = LEGACY_POLICY): RaffleConfig {
  return {
    environment: "test",
    logLevel: "fatal",
    serviceName: "raffle-test",
    policy,
    contractAddress: CONTRACT,
    membershipAsset: MEMBERSHIP,
    operator: OPERATOR,
  };
}

/** Engine at START with prize #1 minted to the operator. */
export function setup(options: SetupOptions = {}): SimulatedRaffle {
  const sim = createSimulatedRaffle({
    operator: OPERATOR,
    config: testConfig(options.policy),
    chain: { startTime: START },
    randomness: options.randomness ?? new FixedRandomness(0n),
    hooks: options.hooks,
    logger: silentLogger,
  });
  sim.custody.mintItem(PRIZE_COLLECTION, 1n, OPERATOR);
  return sim;
}

export function raffleInput(overrides: Partial<CreateRaffleInput> = {}): CreateRaffleInput {
  return {
    prize: { collection: PRIZE_COLLECTION, tokenId: 1n },
    maxEntriesPerUser: 100,
    endTimestamp: START + DURATION,
    entryCost: 5n,
    maxEntries: 10,
    ...overrides,
  };
}

/** Mint payment tokens to `who` and approve the engine for all of them. */
export function fund<T extends Pick<SimulatedRaffle, "custody">>(sim: T, who: Address, amount: bigint): void {
  sim.custody.mint(PAYMENT_TOKEN, who, amount);
  sim.custody.approve(PAYMENT_TOKEN, who, CONTRACT, amount);
}

/** Run `fn`, assert it throws the given catalog error, and return it. */
export function expectRaffleError(fn: () => unknown, code: ErrorCodeKey): RaffleError {
  let thrown: unknown;
  try {
    fn();
  } catch (error) {
    thrown = error;
  }
  expect(isRaffleError(thrown)).toBe(true);
  if (!isRaffleError(thrown)) {
    throw new Error("Expected a RaffleError");
  }
  expect(thrown.errorCode).toBe(code);
  return thrown;
}
