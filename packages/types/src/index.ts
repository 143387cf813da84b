/**
 * @kitty-wallet/types — Shared domain types for the wallet stack.
 *
 * These types are used across all wallet packages:
 * - Outputs, references and payloads (coins, kitties, tradable kitties)
 * - Transactions, blocks and the sync watermark
 * - Text codecs for references and keys
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Output types
export type {
  PublicKey,
  Hash256,
  OutputRef,
  Gender,
  KittyData,
  CoinPayload,
  KittyPayload,
  TradableKittyPayload,
  OutputPayload,
  OutputKind,
  NewOutput,
  Output,
  KittyOutput,
  CoinOutput,
} from "./output.js";

// Transaction types
export type {
  CheckerKind,
  TransactionInput,
  Transaction,
  UnsignedTransaction,
  SignedTransaction,
  BlockHeader,
  Block,
  SyncWatermark,
} from "./transaction.js";

// Codecs
export type { JsonValue } from "./codec.js";
export {
  U128_MAX,
  U32_MAX,
  normalizeHash256,
  isHash256,
  isPublicKey,
  isU128,
  outputRefToString,
  parseOutputRef,
  outputRefsEqual,
  compareOutputRefs,
  isOutputRef,
  payloadToJson,
  newOutputToJson,
  outputToJson,
} from "./codec.js";

// Runtime type guards
export {
  isOutputKind,
  isGender,
  isKittyData,
  isOutputPayload,
  isNewOutput,
  isOutput,
  isCheckerKind,
  isTransaction,
  isBlockHeader,
  isBlock,
  isCoinOutput,
  isKittyOutput,
} from "./guards.js";
