/**
 * @kitty-wallet/keystore — Types and errors.
 */

import type { PublicKey } from "@kitty-wallet/types";

// ─── Key records ─────────────────────────────────────────────────────────

/**
 * Metadata of a stored key. Secret material never leaves the keystore.
 */
export interface WalletKeyInfo {
  readonly publicKey: PublicKey;
  /** True when the seed is wrapped with a password */
  readonly encrypted: boolean;
  readonly createdAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type KeystoreErrorCode =
  | "KEY_NOT_FOUND"
  | "LOCKED_OR_PASSWORD_REQUIRED"
  | "WRONG_PASSWORD"
  | "INVALID_SEED";

export class KeystoreError extends Error {
  constructor(
    public readonly code: KeystoreErrorCode,
    message: string,
    public readonly publicKey?: PublicKey,
  ) {
    super(message);
    this.name = "KeystoreError";
  }
}
