/**
 * @kitty-wallet/kitties — Types, constants and errors.
 */

import type {
  KittyOutput,
  KittyPayload,
  PublicKey,
  TradableKittyPayload,
} from "@kitty-wallet/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Breedings a freshly minted kitty may take part in. */
export const INITIAL_FREE_BREEDINGS = 2;

export const MAX_NAME_LENGTH = 32;

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Source of 32 random bytes for new genetic codes.
 * Injected so tests can fix the DNA of minted kitties.
 */
export type RandomSource = () => Uint8Array;

/**
 * Live kitties of an owner carrying a name. The Local Ledger Store's
 * name index satisfies this.
 */
export type KittyLookup = (owner: PublicKey, name: string) => readonly KittyOutput[];

export type AnyKittyPayload = KittyPayload | TradableKittyPayload;

// ─── Errors ──────────────────────────────────────────────────────────────

export type KittyErrorCode =
  | "INVALID_NAME"
  | "INVALID_PRICE"
  | "NAME_COLLISION"
  | "INVALID_BREEDING_PAIR"
  | "NOT_OWNER"
  | "NOT_AVAILABLE_FOR_SALE"
  | "PRICE_CHANGED";

export class KittyError extends Error {
  constructor(
    public readonly code: KittyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "KittyError";
  }
}
