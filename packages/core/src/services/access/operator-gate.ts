/**
 * Single-operator access gate.
 *
 * Restricts privileged raffle operations to exactly one identity. The
 * operator is fixed at construction and can hand over the role itself.
 */

import type { Address } from "@raffle/types";
import { AccessErrors } from "../errors";
import { isZeroAddress, sameAddress, toAddress } from "../chain";

export interface OperatorGate {
  operator(): Address;
  /** Throws Unauthorized unless `caller` is the current operator. */
  assertOperator(caller: Address): void;
  transferOperator(caller: Address, next: Address): void;
}

export class SingleOperatorGate implements OperatorGate {
  private current: Address;

  constructor(operator: Address) {
    if (isZeroAddress(operator)) {
      throw AccessErrors.invalidOperator();
    }
    this.current = toAddress(operator);
  }

  operator(): Address {
    return this.current;
  }

  assertOperator(caller: Address): void {
    if (!sameAddress(caller, this.current)) {
      throw AccessErrors.notOperator(caller);
    }
  }

  transferOperator(caller: Address, next: Address): void {
    this.assertOperator(caller);
    if (isZeroAddress(next)) {
      throw AccessErrors.invalidOperator();
    }
    this.current = toAddress(next);
  }
}
