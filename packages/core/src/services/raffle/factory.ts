/**
 * Engine wiring.
 *
 * Builds a raffle engine over the in-process custody ledger and simulated
 * chain from a loaded configuration.
 */

import type { Address } from "@raffle/types";
import { InMemoryCustodyLedger, type CustodyHooks, type CustodyLedgerCheckpoint } from "../custody";
import { SingleOperatorGate } from "../access";
import { SimulatedChain, type SimulatedChainOptions } from "../chain";
import { createLogger, getDefaultLoggerConfig, type Logger } from "../logger";
import { loadRaffleConfig, type RaffleConfig } from "../config";
import { RaffleEngine } from "./engine";
import type { RandomnessSource } from "./randomness";

export interface SimulatedRaffleOptions {
  /** Operator identity; falls back to RAFFLE_OPERATOR_ADDRESS. */
  operator?: Address;
  config?: RaffleConfig;
  chain?: SimulatedChainOptions;
  randomness?: RandomnessSource;
  hooks?: CustodyHooks;
  logger?: Logger;
}

export interface SimulatedRaffle {
  engine: RaffleEngine<CustodyLedgerCheckpoint>;
  custody: InMemoryCustodyLedger;
  chain: SimulatedChain;
  config: RaffleConfig;
}

export function createSimulatedRaffle(options: SimulatedRaffleOptions = {}): SimulatedRaffle {
  const config = options.config ?? loadRaffleConfig();
  const operator = options.operator ?? config.operator;
  if (!operator) {
    throw new Error("An operator address is required (option or RAFFLE_OPERATOR_ADDRESS)");
  }

  const logger =
    options.logger ??
    createLogger({
      ...getDefaultLoggerConfig(),
      level: config.logLevel,
      serviceName: config.serviceName,
      environment: config.environment,
    });

  const chain = new SimulatedChain(options.chain);
  const custody = new InMemoryCustodyLedger({ hooks: options.hooks, logger });
  const engine = new RaffleEngine({
    custody,
    access: new SingleOperatorGate(operator),
    chain,
    contractAddress: config.contractAddress,
    membershipAsset: config.membershipAsset,
    policy: config.policy,
    randomness: options.randomness,
    logger,
  });

  return { engine, custody, chain, config };
}
