/**
 * @kitty-wallet/wallet — UTXO wallet core.
 *
 * Provides:
 * - Wallet: one method per wallet command over a ledger store, keystore
 *   and chain client
 * - SyncEngine: atomic, idempotent reconciliation with the chain
 * - InputSelector and TransactionBuilder
 * - Verifier: chain vs. local store cross-check
 * - Configuration and logging
 *
 * @packageDocumentation
 */

// Service
export {
  Wallet,
  openWallet,
  LEDGER_FILE_NAME,
  KEYSTORE_FILE_NAME,
  LEDGER_COMPACT_AFTER,
} from "./wallet.js";
export type {
  WalletOptions,
  WalletSetup,
  OpenWalletOptions,
  CommandOptions,
  SpendRequest,
  BuyRequest,
  BalanceReport,
} from "./wallet.js";

// Components
export { SyncEngine, DEFAULT_FINALITY_DEPTH } from "./sync.js";
export type {
  OwnerFilter,
  SyncOptions,
  SyncResult,
  SyncEngineOptions,
} from "./sync.js";
export { InputSelector } from "./selector.js";
export type { CoinSelection } from "./selector.js";
export { TransactionBuilder } from "./builder.js";
export type {
  BuiltTransaction,
  MintCoinsRequest,
  SpendCoinsRequest,
  MintKittyRequest,
  MintTradableKittyRequest,
  BreedKittyRequest,
  SetKittyPropertyRequest,
  BuyKittyRequest,
  TransactionBuilderOptions,
} from "./builder.js";
export { Verifier } from "./verifier.js";
export type { VerificationReport } from "./verifier.js";

// Errors
export { WalletError } from "./errors.js";
export type { WalletErrorCode } from "./errors.js";

// Ambient
export { ConfigSchema, loadConfig } from "./config.js";
export type { WalletConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
