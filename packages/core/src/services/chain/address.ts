/**
 * Address helpers shared by the custody ledger, access gate and engine.
 */

import { ethers } from "ethers";
import { z } from "zod";
import type { Address } from "@raffle/types";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

function isPrefixed(value: string): value is Address {
  return value.startsWith("0x");
}

/**
 * Normalise a hex address to its checksummed form.
 * Throws if the value is not a 20-byte hex address.
 */
export function toAddress(value: string): Address {
  const checksummed = ethers.getAddress(value);
  if (!isPrefixed(checksummed)) {
    throw new Error(`Invalid address: ${value}`);
  }
  return checksummed;
}

export function isZeroAddress(value: string): boolean {
  return ethers.isAddress(value) && toAddress(value) === ZERO_ADDRESS;
}

export function sameAddress(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/** zod schema accepting any-case hex addresses, producing the checksummed form */
export const AddressSchema = z
  .string()
  .refine((value) => ethers.isAddress(value), { message: "Invalid address" })
  .transform((value) => toAddress(value));
