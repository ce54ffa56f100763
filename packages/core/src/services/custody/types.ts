/**
 * Asset Custody Gateway Types
 *
 * Boundary between the raffle engine and the asset-transfer primitives it
 * depends on: a non-fungible custodial transfer and a fungible
 * transfer-with-allowance.
 */

import type { Address } from "@raffle/types";

export interface AssetCustodyGateway {
  /** Current owner of a non-fungible item, or null if it was never minted. */
  ownerOf(collection: Address, tokenId: bigint): Address | null;

  /** Move a non-fungible item. Fails with OwnershipMismatch unless `from` owns it. */
  custodialTransfer(collection: Address, tokenId: bigint, from: Address, to: Address): void;

  /** Amount `spender` may pull from `owner`. */
  allowance(asset: Address, owner: Address, spender: Address): bigint;

  /**
   * Pull `amount` from `from` to `to` on behalf of `spender`, consuming the
   * allowance. Fails with InsufficientAuthorization when the allowance is short.
   */
  transferFrom(
    asset: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void;

  /** Move `amount` held by `from`. Fails with InsufficientBalance. */
  transfer(asset: Address, from: Address, to: Address, amount: bigint): void;

  /** Fungible balance, or the number of items held for a collection. */
  balanceOf(asset: Address, holder: Address): bigint;
}

/** Something whose state can be captured and restored around an atomic call. */
export interface Checkpointable<TCheckpoint> {
  checkpoint(): TCheckpoint;
  /** Close a checkpoint whose call succeeded. */
  commit(checkpoint: TCheckpoint): void;
  rollback(checkpoint: TCheckpoint): void;
}

export type AssetMovement =
  | {
      kind: "fungible";
      asset: Address;
      from: Address;
      to: Address;
      amount: bigint;
    }
  | {
      kind: "non_fungible";
      collection: Address;
      tokenId: bigint;
      from: Address;
      to: Address;
    };

/**
 * Callbacks fired after each movement. A receiving contract or a hooked
 * token can hand control to an untrusted party at exactly this point.
 */
export interface CustodyHooks {
  onTransfer?: (movement: AssetMovement) => void;
}
