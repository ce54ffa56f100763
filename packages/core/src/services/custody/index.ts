/**
 * Asset Custody
 *
 * Gateway interface for prize escrow and payment pulls, plus an in-process
 * ledger implementing it.
 */

export {
  InMemoryCustodyLedger,
  type CustodyLedgerCheckpoint,
  type InMemoryCustodyLedgerOptions,
} from "./in-memory-ledger";

export type {
  AssetCustodyGateway,
  AssetMovement,
  Checkpointable,
  CustodyHooks,
} from "./types";
