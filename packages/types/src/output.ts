/**
 * Output Types
 *
 * Ledger outputs and their payloads.
 *
 * Rules:
 * - All types are immutable (readonly)
 * - Amounts and prices are u128 values carried as bigint
 * - Kitty and tradable kitty share one name namespace per owner
 */

/** 256-bit public key, 64 lowercase hex characters. */
export type PublicKey = string;

/** 256-bit hash, 64 lowercase hex characters. */
export type Hash256 = string;

/**
 * Reference to an output on the ledger: the hash of the transaction that
 * created it plus its position among that transaction's outputs.
 */
export interface OutputRef {
  readonly txHash: Hash256;
  readonly index: number;
}

export type Gender = "male" | "female";

/**
 * Core kitty attributes shared by plain and tradable kitties.
 */
export interface KittyData {
  /** Unique among the owner's live kitties */
  readonly name: string;
  readonly gender: Gender;
  /** Genetic code, 64 hex characters */
  readonly dna: Hash256;
  /** Number of times this kitty has bred */
  readonly numBreedings: number;
  /** Breedings left before the kitty is exhausted */
  readonly freeBreedings: number;
}

export interface CoinPayload {
  readonly kind: "coin";
  readonly value: bigint;
}

export interface KittyPayload {
  readonly kind: "kitty";
  readonly kitty: KittyData;
}

export interface TradableKittyPayload {
  readonly kind: "tradable-kitty";
  readonly kitty: KittyData;
  readonly price: bigint;
  readonly isAvailableForSale: boolean;
}

export type OutputPayload = CoinPayload | KittyPayload | TradableKittyPayload;

export type OutputKind = OutputPayload["kind"];

/**
 * An output not yet placed on chain (no reference until its transaction
 * hash is known).
 */
export interface NewOutput {
  readonly owner: PublicKey;
  readonly payload: OutputPayload;
}

/**
 * An output that exists on chain.
 */
export interface Output extends NewOutput {
  readonly ref: OutputRef;
}

/**
 * An output whose payload is known to be a kitty of either kind.
 */
export interface KittyOutput extends Output {
  readonly payload: KittyPayload | TradableKittyPayload;
}

export interface CoinOutput extends Output {
  readonly payload: CoinPayload;
}
