/**
 * In-process custody ledger.
 *
 * Holds fungible balances, allowances and non-fungible ownership in memory.
 * Used by tests and local simulations as the engine's custody gateway.
 */

import type { Address } from "@raffle/types";
import { CustodyErrors } from "../errors";
import type { Logger } from "../logger";
import type {
  AssetCustodyGateway,
  AssetMovement,
  Checkpointable,
  CustodyHooks,
} from "./types";

export interface CustodyLedgerCheckpoint {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
  owners: Map<string, Address>;
}

export interface InMemoryCustodyLedgerOptions {
  hooks?: CustodyHooks;
  logger?: Logger;
}

function key(...parts: Array<string | bigint>): string {
  return parts.map((p) => (typeof p === "bigint" ? p.toString() : p.toLowerCase())).join(":");
}

export class InMemoryCustodyLedger
  implements AssetCustodyGateway, Checkpointable<CustodyLedgerCheckpoint>
{
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private owners = new Map<string, Address>();
  private hooks: CustodyHooks;
  private readonly logger?: Logger;

  constructor(options: InMemoryCustodyLedgerOptions = {}) {
    this.hooks = options.hooks ?? {};
    this.logger = options.logger;
  }

  /** Replace the transfer callbacks. */
  setHooks(hooks: CustodyHooks): void {
    this.hooks = hooks;
  }

  // ==========================================================================
  // Fixtures
  // ==========================================================================

  mint(asset: Address, to: Address, amount: bigint): void {
    this.credit(asset, to, amount);
  }

  mintItem(collection: Address, tokenId: bigint, to: Address): void {
    const itemKey = key(collection, tokenId);
    if (this.owners.has(itemKey)) {
      throw new Error(`Item ${tokenId} of ${collection} already minted`);
    }
    this.owners.set(itemKey, to);
  }

  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(key(asset, owner, spender), amount);
  }

  // ==========================================================================
  // AssetCustodyGateway
  // ==========================================================================

  ownerOf(collection: Address, tokenId: bigint): Address | null {
    return this.owners.get(key(collection, tokenId)) ?? null;
  }

  custodialTransfer(collection: Address, tokenId: bigint, from: Address, to: Address): void {
    const itemKey = key(collection, tokenId);
    const owner = this.owners.get(itemKey) ?? null;
    if (owner === null || owner.toLowerCase() !== from.toLowerCase()) {
      throw CustodyErrors.notOwner(collection, tokenId, from, owner);
    }
    this.owners.set(itemKey, to);
    this.notify({ kind: "non_fungible", collection, tokenId, from, to });
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(key(asset, owner, spender)) ?? 0n;
  }

  transferFrom(
    asset: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void {
    const approved = this.allowance(asset, from, spender);
    if (approved < amount) {
      throw CustodyErrors.insufficientAllowance(asset, from, amount, approved);
    }
    this.debit(asset, from, amount);
    this.allowances.set(key(asset, from, spender), approved - amount);
    this.credit(asset, to, amount);
    this.notify({ kind: "fungible", asset, from, to, amount });
  }

  transfer(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.debit(asset, from, amount);
    this.credit(asset, to, amount);
    this.notify({ kind: "fungible", asset, from, to, amount });
  }

  balanceOf(asset: Address, holder: Address): bigint {
    const fungible = this.balances.get(key(asset, holder)) ?? 0n;
    const prefix = `${asset.toLowerCase()}:`;
    let items = 0n;
    for (const [itemKey, owner] of this.owners) {
      if (itemKey.startsWith(prefix) && owner.toLowerCase() === holder.toLowerCase()) {
        items += 1n;
      }
    }
    return fungible + items;
  }

  // ==========================================================================
  // Checkpointable
  // ==========================================================================

  checkpoint(): CustodyLedgerCheckpoint {
    return {
      balances: new Map(this.balances),
      allowances: new Map(this.allowances),
      owners: new Map(this.owners),
    };
  }

  commit(): void {
    // checkpoints are full copies; nothing to release
  }

  rollback(checkpoint: CustodyLedgerCheckpoint): void {
    this.balances = new Map(checkpoint.balances);
    this.allowances = new Map(checkpoint.allowances);
    this.owners = new Map(checkpoint.owners);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private credit(asset: Address, holder: Address, amount: bigint): void {
    const balanceKey = key(asset, holder);
    this.balances.set(balanceKey, (this.balances.get(balanceKey) ?? 0n) + amount);
  }

  private debit(asset: Address, holder: Address, amount: bigint): void {
    const balanceKey = key(asset, holder);
    const available = this.balances.get(balanceKey) ?? 0n;
    if (available < amount) {
      throw CustodyErrors.insufficientBalance(asset, holder, amount, available);
    }
    this.balances.set(balanceKey, available - amount);
  }

  private notify(movement: AssetMovement): void {
    this.logger?.debug("Asset moved", { ...movement });
    this.hooks.onTransfer?.(movement);
  }
}
