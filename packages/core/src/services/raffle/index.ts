/**
 * Escrow Raffle
 *
 * Custodial raffle lifecycle: prize escrow, paid and free entries, winner
 * draw, closure, prize claim and treasury withdrawals.
 */

export { RaffleEngine, type RaffleEngineDeps } from "./engine";
export { RaffleRegistry, cloneRaffle, type RegistryCheckpoint } from "./registry";
export {
  RaffleEventLog,
  type RaffleEventListener,
} from "./events";
export {
  recordPaidEntry,
  recordFreeEntry,
  requiredPayment,
  ticketsHeldBy,
} from "./ledger";
export { Treasury, type TreasuryDeps, type Withdrawal } from "./treasury";
export {
  BlockHashRandomness,
  pickWinnerIndex,
  type RandomnessSource,
  type DrawInput,
} from "./randomness";
export {
  LEGACY_POLICY,
  CORRECTED_POLICY,
  POLICY_PRESETS,
  RafflePolicySchema,
  resolvePolicy,
  hasCapacity,
  type RafflePolicy,
  type PolicyPreset,
} from "./policy";
export {
  CreateRaffleInputSchema,
  MAX_RAFFLE_ENTRIES,
  PrizeAssetRefSchema,
  parseCreateRaffleInput,
  parseAddress,
} from "./schemas";
export {
  createSimulatedRaffle,
  type SimulatedRaffle,
  type SimulatedRaffleOptions,
} from "./factory";
