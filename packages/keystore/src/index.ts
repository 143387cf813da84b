/**
 * @kitty-wallet/keystore — Wallet keys.
 *
 * Provides:
 * - Keystore: generate, insert, remove, list, unlock, sign
 * - verifySignature for checking redeemers
 *
 * @packageDocumentation
 */

export { Keystore } from "./keystore.js";
export type { KeystoreOptions } from "./keystore.js";
export { verifySignature, SEED_LENGTH } from "./ed25519.js";
export { KeystoreError } from "./types.js";
export type { KeystoreErrorCode, WalletKeyInfo } from "./types.js";
