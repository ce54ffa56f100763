/**
 * @raffle/core
 *
 * Raffle lifecycle engine and the services it is built on.
 */

export * from "./services/raffle";
export * from "./services/errors";
export * from "./services/custody";
export * from "./services/access";
export * from "./services/chain";
export * from "./services/config";
export * from "./services/state-machine";
export * from "./services/logger";
