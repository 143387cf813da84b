/**
 * @kitty-wallet/chain — In-process development chain.
 *
 * A ChainClient that keeps its own blocks and UTXO set in memory. Used by
 * tests and the demo in place of a node:
 *
 * - submit() checks inputs and signatures and queues the transaction
 * - produceBlock() seals the queue into the next block
 * - rewind() drops blocks to simulate a reorg
 * - failNext() makes the next call to a method fail as if the node
 *   were unreachable
 *
 * It checks only what a wallet needs to see rejected; it is not a
 * ledger implementation.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { verifySignature } from "@kitty-wallet/keystore";
import type {
  Block,
  BlockHeader,
  Hash256,
  Output,
  OutputRef,
  SignedTransaction,
} from "@kitty-wallet/types";
import { outputRefToString } from "@kitty-wallet/types";
import { createdOutputs, signingPayload, transactionHash } from "./codec.js";
import type { ChainClient, ChainMethod } from "./types.js";
import { ChainError } from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface DevChainOptions {
  /** Timestamp of the genesis block (default: 2024-01-01T00:00:00Z) */
  readonly genesisTimestamp?: number;

  /** Milliseconds between blocks (default: 6000) */
  readonly blockTimeMs?: number;

  /** Verify redeemers against output owners (default: true) */
  readonly checkSignatures?: boolean;
}

const MINT_CHECKERS = new Set(["mint-coins", "mint-kitty", "mint-tradable-kitty"]);

const ZERO_HASH = "0".repeat(64);

interface PendingTransaction {
  readonly hash: Hash256;
  readonly transaction: SignedTransaction;
}

// =============================================================================
// Dev chain
// =============================================================================

export class DevChain implements ChainClient {
  private readonly _blocks: Block[] = [];
  private readonly _utxos = new Map<string, Output>();
  private readonly _pending: PendingTransaction[] = [];
  private readonly _faults = new Map<ChainMethod, string>();
  private readonly _genesisTimestamp: number;
  private readonly _blockTimeMs: number;
  private readonly _checkSignatures: boolean;

  /** Bumped on every rewind so replacement blocks get new hashes */
  private _fork = 0;

  constructor(options: DevChainOptions = {}) {
    this._genesisTimestamp = options.genesisTimestamp ?? Date.UTC(2024, 0, 1);
    this._blockTimeMs = options.blockTimeMs ?? 6000;
    this._checkSignatures = options.checkSignatures ?? true;
    this._blocks.push(this._seal([]));
  }

  // ─── Inspection ─────────────────────────────────────────────────────

  get height(): number {
    return this._blocks.length - 1;
  }

  get pendingCount(): number {
    return this._pending.length;
  }

  // ─── Fault injection ────────────────────────────────────────────────

  /**
   * Make the next call to `method` reject with ChainError UNAVAILABLE.
   */
  failNext(method: ChainMethod, message = `${method}: node unavailable`): void {
    this._faults.set(method, message);
  }

  // ─── ChainClient ────────────────────────────────────────────────────

  async getTip(): Promise<BlockHeader> {
    this._maybeFail("getTip");
    return this._tip().header;
  }

  async getBlockHash(height: number): Promise<Hash256 | undefined> {
    this._maybeFail("getBlockHash");
    return this._blocks[height]?.header.hash;
  }

  async getBlock(height: number): Promise<Block | undefined> {
    this._maybeFail("getBlock");
    return this._blocks[height];
  }

  async getOutput(ref: OutputRef): Promise<Output | undefined> {
    this._maybeFail("getOutput");
    return this._utxos.get(outputRefToString(ref));
  }

  async submit(transaction: SignedTransaction): Promise<Hash256> {
    this._maybeFail("submit");
    const hash = transactionHash(transaction);
    this._validate(transaction, hash);
    this._pending.push({ hash, transaction });
    return hash;
  }

  async latestTimestamp(): Promise<number> {
    this._maybeFail("latestTimestamp");
    return this._tip().header.timestamp;
  }

  // ─── Block production ───────────────────────────────────────────────

  /**
   * Seal every queued transaction into the next block and apply it.
   */
  produceBlock(): Block {
    const transactions = this._pending.splice(0).map((p) => p.transaction);
    const block = this._seal(transactions);
    this._blocks.push(block);
    this._apply(block);
    return block;
  }

  /**
   * Discard every block above `height`. Queued transactions are dropped
   * as well; blocks produced afterwards form a new branch.
   */
  rewind(height: number): void {
    if (!Number.isInteger(height) || height < 0 || height > this.height) {
      throw new ChainError("UNKNOWN_BLOCK", `Cannot rewind to height ${height}`);
    }
    this._blocks.splice(height + 1);
    this._pending.splice(0);
    this._fork += 1;

    this._utxos.clear();
    for (const block of this._blocks) {
      this._apply(block);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _maybeFail(method: ChainMethod): void {
    const message = this._faults.get(method);
    if (message !== undefined) {
      this._faults.delete(method);
      throw new ChainError("UNAVAILABLE", message);
    }
  }

  private _tip(): Block {
    const tip = this._blocks[this._blocks.length - 1];
    if (tip === undefined) {
      throw new ChainError("UNKNOWN_BLOCK", "Chain has no genesis block");
    }
    return tip;
  }

  private _seal(transactions: readonly SignedTransaction[]): Block {
    const parent = this._blocks[this._blocks.length - 1];
    const height = parent === undefined ? 0 : parent.header.height + 1;
    const parentHash = parent?.header.hash ?? ZERO_HASH;
    const timestamp = this._genesisTimestamp + height * this._blockTimeMs;
    const hash = createHash("sha256")
      .update(
        canonicalize({
          height,
          parentHash,
          timestamp,
          fork: this._fork,
          transactions: transactions.map(transactionHash),
        }),
      )
      .digest("hex");

    return { header: { height, hash, parentHash, timestamp }, transactions };
  }

  private _apply(block: Block): void {
    for (const transaction of block.transactions) {
      for (const input of transaction.inputs) {
        this._utxos.delete(outputRefToString(input.outputRef));
      }
      for (const output of createdOutputs(transaction)) {
        this._utxos.set(outputRefToString(output.ref), output);
      }
    }
  }

  private _validate(transaction: SignedTransaction, hash: Hash256): void {
    const reject = (reason: string): ChainError =>
      new ChainError("SUBMISSION_REJECTED", `Transaction ${hash} rejected: ${reason}`);

    if (this._pending.some((p) => p.hash === hash)) {
      throw reject("already in the pool");
    }
    if (transaction.outputs.some((_, index) => this._utxos.has(outputRefToString({ txHash: hash, index })))) {
      throw reject("outputs already exist");
    }

    const isMint = MINT_CHECKERS.has(transaction.checker);
    if (isMint && transaction.inputs.length > 0) {
      throw reject(`${transaction.checker} takes no inputs`);
    }
    if (!isMint && transaction.inputs.length === 0) {
      throw reject(`${transaction.checker} needs at least one input`);
    }

    const pendingSpent = new Set(
      this._pending.flatMap((p) => p.transaction.inputs.map((i) => outputRefToString(i.outputRef))),
    );
    const seen = new Set<string>();
    const consumed: Output[] = [];
    const payload = signingPayload(transaction);

    for (const input of transaction.inputs) {
      const key = outputRefToString(input.outputRef);
      if (seen.has(key)) {
        throw reject(`input ${key} is used twice`);
      }
      seen.add(key);

      const output = this._utxos.get(key);
      if (output === undefined || pendingSpent.has(key)) {
        throw reject(`input ${key} is unknown or already spent`);
      }
      consumed.push(output);

      if (!this._checkSignatures) {
        continue;
      }
      if (input.redeemer === "") {
        const listed =
          transaction.checker === "buy-kitty" &&
          output.payload.kind === "tradable-kitty" &&
          output.payload.isAvailableForSale;
        if (!listed) {
          throw reject(`input ${key} is not signed`);
        }
      } else if (!verifySignature(output.owner, payload, input.redeemer)) {
        throw reject(`bad signature on input ${key}`);
      }
    }

    if (transaction.checker === "spend-coins") {
      let totalIn = 0n;
      for (const output of consumed) {
        if (output.payload.kind !== "coin") {
          throw reject("spend-coins consumes only coins");
        }
        totalIn += output.payload.value;
      }
      let totalOut = 0n;
      for (const output of transaction.outputs) {
        if (output.payload.kind !== "coin") {
          throw reject("spend-coins creates only coins");
        }
        totalOut += output.payload.value;
      }
      if (totalOut > totalIn) {
        throw reject(`outputs (${totalOut}) exceed inputs (${totalIn})`);
      }
    }
  }
}
