/**
 * Transaction and Block Types
 *
 * A transaction consumes inputs and creates outputs. The checker names the
 * rule set the ledger applies to it. Redeemers carry the owner's signature
 * over the transaction's signing payload.
 */

import type { Hash256, NewOutput, OutputRef } from "./output.js";

export type CheckerKind =
  | "mint-coins"
  | "spend-coins"
  | "mint-kitty"
  | "mint-tradable-kitty"
  | "breed-kitty"
  | "breed-tradable-kitty"
  | "set-kitty-property"
  | "buy-kitty";

export interface TransactionInput {
  readonly outputRef: OutputRef;
  /** Hex signature; empty when no signature is attached */
  readonly redeemer: string;
}

export interface Transaction {
  readonly inputs: readonly TransactionInput[];
  readonly outputs: readonly NewOutput[];
  readonly checker: CheckerKind;
  /** Fresh entropy for transactions without inputs, so their hash never repeats */
  readonly nonce?: Hash256;
}

/**
 * A transaction whose inputs have not been signed yet.
 * Every redeemer is empty.
 */
export type UnsignedTransaction = Transaction;

/**
 * A transaction ready for submission.
 */
export type SignedTransaction = Transaction;

export interface BlockHeader {
  readonly height: number;
  readonly hash: Hash256;
  readonly parentHash: Hash256;
  /** Milliseconds since epoch */
  readonly timestamp: number;
}

export interface Block {
  readonly header: BlockHeader;
  readonly transactions: readonly SignedTransaction[];
}

/**
 * Sync position: the block up to which local state is known consistent
 * with the chain.
 */
export interface SyncWatermark {
  readonly height: number;
  readonly hash: Hash256;
}
