/**
 * Winner draw seed sources.
 *
 * The default source hashes public block data, so anyone who can see the
 * sealed block (the operator included) can predict the draw. It is kept
 * behind an interface so a VRF or commit-reveal source can replace it.
 */

import { ethers } from "ethers";

export interface DrawInput {
  raffleId: number;
  /** Hash of the most recent sealed block. */
  previousBlockHash: string;
  /** Current block timestamp (unix seconds). */
  timestamp: number;
  freeParticipantCount: number;
  poolSize: number;
}

export interface RandomnessSource {
  seed(input: DrawInput): bigint;
}

/**
 * keccak256(abi.encodePacked(previousBlockHash, timestamp, freeParticipantCount))
 */
export class BlockHashRandomness implements RandomnessSource {
  seed(input: DrawInput): bigint {
    const digest = ethers.solidityPackedKeccak256(
      ["bytes32", "uint256", "uint256"],
      [input.previousBlockHash, input.timestamp, input.freeParticipantCount],
    );
    return BigInt(digest);
  }
}

/** Reduce a seed to a position in the draw pool. */
export function pickWinnerIndex(seed: bigint, poolSize: number): number {
  if (poolSize <= 0) {
    throw new Error("Cannot draw from an empty pool");
  }
  return Number(seed % BigInt(poolSize));
}
