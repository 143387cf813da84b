/**
 * @kitty-wallet/chain — Chain access for the wallet.
 *
 * Provides:
 * - ChainClient, the contract the wallet consumes
 * - Canonical transaction encoding, signing payload and hashing
 * - DevChain, an in-process chain for tests and the demo
 *
 * @packageDocumentation
 */

export type { ChainClient, ChainMethod, ChainErrorCode } from "./types.js";
export { ChainError } from "./types.js";

export {
  transactionToJson,
  toCanonicalJson,
  signingPayload,
  transactionHash,
  outputRefsOf,
  createdOutputs,
} from "./codec.js";

export { DevChain } from "./dev-chain.js";
export type { DevChainOptions } from "./dev-chain.js";
