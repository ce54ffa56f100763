/**
 * Raffle engine configuration.
 *
 * Read from environment variables and validated with zod. Policy presets
 * choose between the legacy contract behaviour and the corrected rules.
 */

import { z } from "zod";
import type { Address } from "@raffle/types";
import { SystemErrors } from "../errors";
import { AddressSchema, ZERO_ADDRESS } from "../chain";
import type { LogLevel } from "../logger";
import { POLICY_PRESETS, resolvePolicy, type RafflePolicy } from "../raffle/policy";

/** Custody address used when RAFFLE_CONTRACT_ADDRESS is unset. */
export const DEFAULT_CONTRACT_ADDRESS = "0x00000000000000000000000000000000000ca5e5";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const satisfies readonly LogLevel[];

export const RaffleEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SERVICE_NAME: z.string().min(1).default("escrow-raffle"),
  RAFFLE_POLICY: z.enum(POLICY_PRESETS).default("legacy"),
  RAFFLE_FREE_TRACK_SLOTS: z.enum(["per-ticket", "per-call"]).optional(),
  RAFFLE_CONTRACT_ADDRESS: AddressSchema.default(DEFAULT_CONTRACT_ADDRESS),
  RAFFLE_MEMBERSHIP_ASSET: AddressSchema.default(ZERO_ADDRESS),
  RAFFLE_OPERATOR_ADDRESS: AddressSchema.optional(),
});

export interface RaffleConfig {
  environment: "development" | "test" | "production";
  logLevel: LogLevel;
  serviceName: string;
  policy: RafflePolicy;
  contractAddress: Address;
  membershipAsset: Address;
  operator?: Address;
}

/**
 * Load and validate configuration.
 * Throws SYSTEM_INVALID_CONFIG listing every offending variable.
 */
export function loadRaffleConfig(
  env: Record<string, string | undefined> = process.env,
): RaffleConfig {
  const parsed = RaffleEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      issues[issue.path.join(".")] = issue.message;
    }
    throw SystemErrors.invalidConfig(issues);
  }

  const vars = parsed.data;
  const overrides: Partial<RafflePolicy> = vars.RAFFLE_FREE_TRACK_SLOTS
    ? { freeTrackPoolSlots: vars.RAFFLE_FREE_TRACK_SLOTS }
    : {};

  return {
    environment: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === "production" ? "info" : "debug"),
    serviceName: vars.SERVICE_NAME,
    policy: resolvePolicy(vars.RAFFLE_POLICY, overrides),
    contractAddress: vars.RAFFLE_CONTRACT_ADDRESS,
    membershipAsset: vars.RAFFLE_MEMBERSHIP_ASSET,
    operator: vars.RAFFLE_OPERATOR_ADDRESS,
  };
}
