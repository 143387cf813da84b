/**
 * @kitty-wallet/chain — Chain client contract.
 *
 * What the wallet consumes from the remote ledger. Transport is the
 * implementation's business; the wallet only sees these calls.
 */

import type {
  Block,
  BlockHeader,
  Hash256,
  Output,
  OutputRef,
  SignedTransaction,
} from "@kitty-wallet/types";

export interface ChainClient {
  /** Header of the best block */
  getTip(): Promise<BlockHeader>;

  /**
   * Hash of the block at a height on the best chain.
   *
   * @returns undefined above the tip
   */
  getBlockHash(height: number): Promise<Hash256 | undefined>;

  /**
   * Full block at a height on the best chain.
   *
   * @returns undefined above the tip
   */
  getBlock(height: number): Promise<Block | undefined>;

  /**
   * An unspent output as the chain currently sees it.
   *
   * @returns undefined if the output was never created or is spent
   */
  getOutput(ref: OutputRef): Promise<Output | undefined>;

  /**
   * Hand a signed transaction to the chain.
   *
   * @returns The transaction hash
   * @throws ChainError SUBMISSION_REJECTED with the chain's reason
   */
  submit(transaction: SignedTransaction): Promise<Hash256>;

  /** Timestamp of the best block, milliseconds since epoch */
  latestTimestamp(): Promise<number>;
}

export type ChainMethod = keyof ChainClient;

// ─── Errors ──────────────────────────────────────────────────────────────

export type ChainErrorCode =
  | "SUBMISSION_REJECTED"
  | "UNKNOWN_BLOCK"
  | "UNAVAILABLE"
  | "MALFORMED_RESPONSE";

export class ChainError extends Error {
  constructor(
    public readonly code: ChainErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ChainError";
  }
}
