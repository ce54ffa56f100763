/**
 * Treasury
 *
 * Operator-only withdrawal path over fungible assets accumulated in the
 * engine's custody, and read access to custody balances.
 */

import type { Address } from "@raffle/types";
import { CustodyErrors } from "../errors";
import type { AssetCustodyGateway } from "../custody";
import type { OperatorGate } from "../access";
import { isZeroAddress } from "../chain";
import type { RafflePolicy } from "./policy";

export interface TreasuryDeps {
  custody: AssetCustodyGateway;
  access: OperatorGate;
  /** Address under which the engine holds assets. */
  custodyAddress: Address;
  policy: Pick<RafflePolicy, "withdrawRecipient">;
}

export interface Withdrawal {
  asset: Address;
  amount: bigint;
  recipient: Address;
}

export class Treasury {
  constructor(private readonly deps: TreasuryDeps) {}

  balanceOf(asset: Address): bigint {
    return this.deps.custody.balanceOf(asset, this.deps.custodyAddress);
  }

  /**
   * Move `amount` of `asset` out of custody. Under the legacy policy the
   * recipient is the custody address itself, so balances do not change.
   */
  withdraw(caller: Address, asset: Address, amount: bigint): Withdrawal {
    const { custody, access, custodyAddress, policy } = this.deps;

    access.assertOperator(caller);
    if (isZeroAddress(asset)) {
      throw CustodyErrors.invalidAsset();
    }
    if (amount <= 0n) {
      throw CustodyErrors.invalidAmount(amount);
    }

    const recipient = policy.withdrawRecipient === "operator" ? access.operator() : custodyAddress;
    custody.transfer(asset, custodyAddress, recipient, amount);

    return { asset, amount, recipient };
  }
}
