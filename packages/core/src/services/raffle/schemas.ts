/**
 * Input validation for engine operations.
 */

import { z } from "zod";
import type { Address, CreateRaffleInput } from "@raffle/types";
import { RaffleErrors } from "../errors";
import { AddressSchema } from "../chain";

export const PrizeAssetRefSchema = z.object({
  collection: AddressSchema,
  tokenId: z.bigint().nonnegative(),
});

/** Each sold ticket can occupy a draw pool slot, so the cap bounds pool memory. */
export const MAX_RAFFLE_ENTRIES = 1_000_000;

export const CreateRaffleInputSchema = z.object({
  prize: PrizeAssetRefSchema,
  maxEntriesPerUser: z.number().int().nonnegative(),
  endTimestamp: z.number().int().nonnegative(),
  entryCost: z.bigint().nonnegative(),
  maxEntries: z
    .number()
    .int()
    .positive()
    .max(MAX_RAFFLE_ENTRIES, `Must be at most ${MAX_RAFFLE_ENTRIES}`),
});

function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "input";
    fields[path] ??= issue.message;
  }
  return fields;
}

/** Parse raffle creation parameters; throws InvalidArgument with per-field messages. */
export function parseCreateRaffleInput(input: unknown): CreateRaffleInput {
  const result = CreateRaffleInputSchema.safeParse(input);
  if (!result.success) {
    throw RaffleErrors.invalidInput(fieldErrors(result.error));
  }
  return result.data;
}

/** Normalise an identity or asset address; throws InvalidArgument naming the field. */
export function parseAddress(value: unknown, field: string): Address {
  const result = AddressSchema.safeParse(value);
  if (!result.success) {
    throw RaffleErrors.invalidInput({ [field]: "Invalid address" });
  }
  return result.data;
}

export function parseTicketCount(value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw RaffleErrors.invalidInput({ ticketCount: "Ticket count must be an integer" });
  }
  return value;
}
