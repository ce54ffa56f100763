/**
 * Raffle behaviour policy.
 *
 * The legacy preset reproduces the historical on-chain rules,
 * quirks included. The corrected preset applies the intended rule for each
 * of them. Every switch can be overridden on its own.
 */

import { z } from "zod";

export const RafflePolicySchema = z.object({
  /** before-deadline: endRaffle only while endTimestamp >= now. after-deadline: only once it has passed. */
  endRaffleTiming: z.enum(["before-deadline", "after-deadline"]),
  /** What claim inspects to decide a winner exists. */
  claimWinnerCheck: z.enum(["free-participants", "drawn-winner"]),
  /** Where withdrawn funds go: the engine's own custody address or the operator. */
  withdrawRecipient: z.enum(["custody", "operator"]),
  enforcePerUserCap: z.boolean(),
  /** exclusive: requested + sold < max. inclusive: requested + sold <= max. */
  capacityCheck: z.enum(["exclusive", "inclusive"]),
  preventReclaim: z.boolean(),
  emitWinnerDrawn: z.boolean(),
  /** Draw pool slots granted to a free-track join: one per call, or one per ticket. */
  freeTrackPoolSlots: z.enum(["per-ticket", "per-call"]),
});

export type RafflePolicy = z.infer<typeof RafflePolicySchema>;

export const POLICY_PRESETS = ["legacy", "corrected"] as const;

export type PolicyPreset = (typeof POLICY_PRESETS)[number];

export const LEGACY_POLICY: Readonly<RafflePolicy> = Object.freeze({
  endRaffleTiming: "before-deadline",
  claimWinnerCheck: "free-participants",
  withdrawRecipient: "custody",
  enforcePerUserCap: false,
  capacityCheck: "exclusive",
  preventReclaim: false,
  emitWinnerDrawn: false,
  freeTrackPoolSlots: "per-call",
});

export const CORRECTED_POLICY: Readonly<RafflePolicy> = Object.freeze({
  endRaffleTiming: "after-deadline",
  claimWinnerCheck: "drawn-winner",
  withdrawRecipient: "operator",
  enforcePerUserCap: true,
  capacityCheck: "inclusive",
  preventReclaim: true,
  emitWinnerDrawn: true,
  freeTrackPoolSlots: "per-call",
});

export function resolvePolicy(
  preset: PolicyPreset,
  overrides: Partial<RafflePolicy> = {},
): RafflePolicy {
  const base = preset === "legacy" ? LEGACY_POLICY : CORRECTED_POLICY;
  return RafflePolicySchema.parse({ ...base, ...overrides });
}

/** Whether `requested` more tickets fit under the raffle's cap. */
export function hasCapacity(
  policy: Pick<RafflePolicy, "capacityCheck">,
  requested: number,
  sold: number,
  maxEntries: number,
): boolean {
  const total = requested + sold;
  return policy.capacityCheck === "exclusive" ? total < maxEntries : total <= maxEntries;
}
