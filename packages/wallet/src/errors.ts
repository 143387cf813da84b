/**
 * @kitty-wallet/wallet — Errors.
 *
 * Errors raised by the wallet core itself. Rule violations from the
 * kitties package (KittyError), the keystore (KeystoreError) and the
 * store (StoreError) pass through unchanged.
 */

export type WalletErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "NOT_FOUND"
  | "INVALID_REQUEST"
  | "SYNC_IN_PROGRESS"
  | "SYNC_FAILED"
  | "SUBMISSION_FAILED"
  | "WALLET_CLOSED";

export class WalletError extends Error {
  constructor(
    public readonly code: WalletErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "WalletError";
  }
}
