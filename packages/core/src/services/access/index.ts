export { SingleOperatorGate, type OperatorGate } from "./operator-gate";
export { ReentrancyGuard, type LockToken } from "./reentrancy-guard";
