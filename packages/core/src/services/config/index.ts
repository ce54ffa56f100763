export {
  loadRaffleConfig,
  RaffleEnvSchema,
  DEFAULT_CONTRACT_ADDRESS,
  type RaffleConfig,
} from "./config";
