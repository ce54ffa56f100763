export { SimulatedChain, type ChainContext, type SimulatedChainOptions } from "./simulated-chain";
export {
  ZERO_ADDRESS,
  AddressSchema,
  toAddress,
  isZeroAddress,
  sameAddress,
} from "./address";
