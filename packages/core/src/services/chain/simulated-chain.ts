/**
 * Simulated block clock.
 *
 * Supplies the timestamp and the hash of the most recent sealed block to the
 * raffle engine. Block hashes are derived deterministically from the block
 * number so draws can be reproduced in tests.
 */

import { ethers } from "ethers";

export interface ChainContext {
  /** Current block timestamp (unix seconds). */
  now(): number;
  /** Number of the block currently being built. */
  blockNumber(): number;
  /** Hash of the most recent sealed block (blockNumber - 1). */
  previousBlockHash(): string;
}

export interface SimulatedChainOptions {
  /** Timestamp of the first block (unix seconds, default: wall clock). */
  startTime?: number;
  startBlock?: number;
  /** Seconds added per mined block (default 12). */
  blockTime?: number;
  /** Salt mixed into every block hash (default "simulated"). */
  hashSalt?: string;
}

export class SimulatedChain implements ChainContext {
  private timestamp: number;
  private block: number;
  private readonly blockTime: number;
  private readonly hashSalt: string;

  constructor(options: SimulatedChainOptions = {}) {
    this.timestamp = options.startTime ?? Math.floor(Date.now() / 1000);
    this.block = options.startBlock ?? 1;
    this.blockTime = options.blockTime ?? 12;
    this.hashSalt = options.hashSalt ?? "simulated";

    if (this.block < 1) {
      throw new Error("startBlock must be at least 1");
    }
  }

  now(): number {
    return this.timestamp;
  }

  blockNumber(): number {
    return this.block;
  }

  previousBlockHash(): string {
    return this.blockHash(this.block - 1);
  }

  blockHash(blockNumber: number): string {
    return ethers.id(`${this.hashSalt}:${blockNumber}`);
  }

  /** Seal `count` blocks, advancing time by the block interval for each. */
  mine(count = 1): void {
    this.block += count;
    this.timestamp += count * this.blockTime;
  }

  /** Advance the clock by `seconds` and seal one block. */
  increaseTime(seconds: number): void {
    if (seconds < 0) {
      throw new Error("Cannot move time backwards");
    }
    this.timestamp += seconds;
    this.block += 1;
  }

  /** Jump to an absolute timestamp and seal one block. */
  setTime(timestamp: number): void {
    if (timestamp < this.timestamp) {
      throw new Error(`Timestamp ${timestamp} is before current time ${this.timestamp}`);
    }
    this.timestamp = timestamp;
    this.block += 1;
  }
}
