/**
 * @kitty-wallet/wallet — Sync Engine.
 *
 * Brings the Local Ledger Store up to date with the chain:
 *
 * 1. Compare the watermark with the chain. If the block under it was
 *    replaced, walk back through the stored block records to the last
 *    block both agree on and undo everything above it.
 * 2. Fetch every block from there to the tip.
 * 3. Fold rollbacks and new blocks into ONE batch: outputs, name index,
 *    block records and the watermark commit together or not at all.
 *    Block records older than the finality depth are dropped in the same
 *    batch; a reorganisation below them rebuilds from genesis.
 *
 * Nothing touches the store before step 3, so a failed or aborted sync
 * leaves store and watermark exactly as they were. Running sync again
 * against an unchanged chain writes nothing.
 */

import type { Logger } from "pino";
import type { ChainClient } from "@kitty-wallet/chain";
import { createdOutputs } from "@kitty-wallet/chain";
import type { BlockRecord, LedgerStore } from "@kitty-wallet/store";
import { StoreError, WriteLock } from "@kitty-wallet/store";
import type {
  Block,
  BlockHeader,
  Output,
  OutputRef,
  PublicKey,
  SyncWatermark,
} from "@kitty-wallet/types";
import { isBlock, outputRefToString } from "@kitty-wallet/types";
import { WalletError } from "./errors.js";
import { silentLogger } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

/** Decides which owners' outputs the store keeps. */
export type OwnerFilter = (owner: PublicKey) => boolean;

export interface SyncOptions {
  /** Aborting leaves the store untouched */
  readonly signal?: AbortSignal;
}

export interface SyncResult {
  /** Watermark before the sync, undefined for an empty store */
  readonly previous: SyncWatermark | undefined;
  readonly watermark: SyncWatermark;
  readonly blocksApplied: number;
  readonly blocksRolledBack: number;
  readonly inserted: number;
  readonly removed: number;
  /** Block records dropped for being deeper than the finality depth */
  readonly pruned: number;
}

export interface SyncEngineOptions {
  readonly isTracked: OwnerFilter;
  /** Shared single-writer lock of the wallet */
  readonly lock?: WriteLock;
  /** Blocks below the tip whose undo records are kept (default 100) */
  readonly finalityDepth?: number;
  readonly logger?: Logger;
}

export const DEFAULT_FINALITY_DEPTH = 100;

// =============================================================================
// Working overlay
// =============================================================================

interface OverlayEntry {
  readonly ref: OutputRef;
  readonly output: Output | null;
}

/**
 * Pending view of the output set: the store plus not-yet-committed
 * insertions (an Output) and removals (null).
 */
class OutputOverlay {
  private readonly _entries = new Map<string, OverlayEntry>();

  constructor(private readonly store: LedgerStore) {}

  get(ref: OutputRef): Output | undefined {
    const entry = this._entries.get(outputRefToString(ref));
    if (entry !== undefined) {
      return entry.output ?? undefined;
    }
    return this.store.getOutput(ref);
  }

  put(output: Output): void {
    this._entries.set(outputRefToString(output.ref), { ref: output.ref, output });
  }

  remove(ref: OutputRef): void {
    this._entries.set(outputRefToString(ref), { ref, output: null });
  }

  /** Net difference against the store */
  diff(): { insert: Output[]; remove: OutputRef[] } {
    const insert: Output[] = [];
    const remove: OutputRef[] = [];
    for (const { ref, output } of this._entries.values()) {
      const stored = this.store.hasOutput(ref);
      if (output === null && stored) {
        remove.push(ref);
      } else if (output !== null && !stored) {
        insert.push(output);
      }
    }
    return { insert, remove };
  }
}

// =============================================================================
// Sync Engine
// =============================================================================

export class SyncEngine {
  private readonly _isTracked: OwnerFilter;
  private readonly _lock: WriteLock;
  private readonly _finalityDepth: number;
  private readonly _log: Logger;

  constructor(
    private readonly store: LedgerStore,
    private readonly chain: ChainClient,
    options: SyncEngineOptions,
  ) {
    this._isTracked = options.isTracked;
    this._lock = options.lock ?? new WriteLock();
    this._finalityDepth = options.finalityDepth ?? DEFAULT_FINALITY_DEPTH;
    this._log = (options.logger ?? silentLogger()).child({ component: "sync" });
    if (!Number.isInteger(this._finalityDepth) || this._finalityDepth < 1) {
      throw new WalletError(
        "INVALID_REQUEST",
        `Finality depth must be a positive integer, got ${this._finalityDepth}`,
      );
    }
  }

  /**
   * Fold chain changes since the watermark into the store.
   *
   * @throws WalletError SYNC_IN_PROGRESS when the wallet's lock is held
   * @throws WalletError SYNC_FAILED
   * @throws StoreError STORE_CORRUPTED
   */
  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    return this._exclusive(() => this._sync(false, options.signal));
  }

  /**
   * Rebuild the store from genesis. The old contents are replaced in the
   * same batch that writes the new ones.
   */
  async resync(options: SyncOptions = {}): Promise<SyncResult> {
    return this._exclusive(() => this._sync(true, options.signal));
  }

  /**
   * Sync on behalf of a caller that already holds the wallet's lock.
   */
  syncHeld(options: SyncOptions = {}): Promise<SyncResult> {
    return this._sync(false, options.signal);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _exclusive(fn: () => Promise<SyncResult>): Promise<SyncResult> {
    const running = this._lock.tryRunExclusive(fn);
    if (running === undefined) {
      throw new WalletError(
        "SYNC_IN_PROGRESS",
        "A sync or command is already running on this wallet",
      );
    }
    return running;
  }

  private async _sync(fromScratch: boolean, signal: AbortSignal | undefined): Promise<SyncResult> {
    const previous = this.store.getWatermark();
    this._log.debug({ from: previous?.height, fromScratch }, "Sync started");
    const overlay = new OutputOverlay(this.store);
    const dropBlocks: number[] = [];
    let base: SyncWatermark | undefined = previous;
    let rebuild = fromScratch;

    if (!rebuild && previous !== undefined) {
      const ancestor = await this._commonAncestor(previous, signal);
      if (ancestor === undefined) {
        this._log.warn(
          { from: previous.height },
          "Chain reorganisation below retained block records: rebuilding from genesis",
        );
        rebuild = true;
      } else if (ancestor.height !== previous.height) {
        for (const height of [...this.store.blockHeights()].reverse()) {
          if (height <= ancestor.height) {
            break;
          }
          this._undo(height, overlay);
          dropBlocks.push(height);
        }
        base = ancestor;
        this._log.warn(
          { from: previous.height, to: ancestor.height, blocks: dropBlocks.length },
          "Chain reorganisation: rolling back",
        );
      }
    }

    if (rebuild) {
      for (const output of this.store.listOutputs()) {
        overlay.remove(output.ref);
      }
      dropBlocks.push(...this.store.blockHeights());
      base = undefined;
    }

    const tip = await this._fetch(signal, "chain tip", () => this.chain.getTip());
    const records: BlockRecord[] = [];
    let applied = 0;
    let last: BlockHeader | undefined;
    let parentHash = base?.hash;

    for (let height = base === undefined ? 0 : base.height + 1; height <= tip.height; height++) {
      const block: unknown = await this._fetch(signal, `block ${height}`, () =>
        this.chain.getBlock(height),
      );
      if (block === undefined) {
        throw new WalletError("SYNC_FAILED", `Sync failed: chain has no block ${height}`);
      }
      if (!isBlock(block) || block.header.height !== height) {
        throw new WalletError(
          "SYNC_FAILED",
          `Sync failed: chain returned a malformed block ${height}`,
        );
      }
      if (parentHash !== undefined && block.header.parentHash !== parentHash) {
        throw new WalletError(
          "SYNC_FAILED",
          `Sync failed: chain changed while fetching block ${height}`,
        );
      }
      records.push(this._applyBlock(block, overlay));
      applied += 1;
      parentHash = block.header.hash;
      last = block.header;
    }

    const watermark = last === undefined ? base : { height: last.height, hash: last.hash };
    if (watermark === undefined) {
      throw new WalletError("SYNC_FAILED", "Sync failed: chain returned no blocks");
    }
    this._throwIfAborted(signal);

    // Records at or below the horizon can no longer be rolled back to.
    const horizon = watermark.height - this._finalityDepth;
    const dropped = new Set(dropBlocks);
    const pruned = this.store
      .blockHeights()
      .filter((height) => height <= horizon && !dropped.has(height));
    const kept = records.filter((record) => record.height > horizon);

    const { insert, remove } = overlay.diff();
    const result: SyncResult = {
      previous,
      watermark,
      blocksApplied: applied,
      blocksRolledBack: dropBlocks.length,
      inserted: insert.length,
      removed: remove.length,
      pruned: pruned.length,
    };

    if (applied === 0 && dropBlocks.length === 0 && pruned.length === 0) {
      this._log.debug({ height: watermark.height }, "Already in sync");
      return result;
    }

    try {
      this.store.applyChanges({
        insert,
        remove,
        putBlocks: kept,
        dropBlocks: [...dropBlocks, ...pruned],
        watermark,
      });
    } catch (err) {
      if (err instanceof StoreError && err.code === "STORE_CORRUPTED") {
        throw err;
      }
      throw new WalletError(
        "SYNC_FAILED",
        `Sync failed while committing: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    this._log.info(
      {
        from: previous?.height,
        to: watermark.height,
        blocks: applied,
        pruned: pruned.length,
        inserted: insert.length,
        removed: remove.length,
      },
      "Sync complete",
    );
    return result;
  }

  /**
   * Highest stored block the chain still agrees with, or undefined when
   * none of the retained records match.
   */
  private async _commonAncestor(
    watermark: SyncWatermark,
    signal: AbortSignal | undefined,
  ): Promise<SyncWatermark | undefined> {
    const current = await this._fetch(signal, `block hash ${watermark.height}`, () =>
      this.chain.getBlockHash(watermark.height),
    );
    if (current === watermark.hash) {
      return watermark;
    }

    for (const height of [...this.store.blockHeights()].reverse()) {
      if (height >= watermark.height) {
        continue;
      }
      const record = this.store.getBlockRecord(height);
      const onChain = await this._fetch(signal, `block hash ${height}`, () =>
        this.chain.getBlockHash(height),
      );
      if (record !== undefined && record.hash === onChain) {
        return { height: record.height, hash: record.hash };
      }
    }
    return undefined;
  }

  private _undo(height: number, overlay: OutputOverlay): void {
    const record = this.store.getBlockRecord(height);
    if (record === undefined) {
      return;
    }
    for (const ref of record.created) {
      overlay.remove(ref);
    }
    for (const output of record.spent) {
      overlay.put(output);
    }
  }

  private _applyBlock(block: Block, overlay: OutputOverlay): BlockRecord {
    const created: OutputRef[] = [];
    const spent: Output[] = [];

    for (const transaction of block.transactions) {
      for (const input of transaction.inputs) {
        const existing = overlay.get(input.outputRef);
        if (existing !== undefined) {
          spent.push(existing);
          overlay.remove(input.outputRef);
        }
      }
      for (const output of createdOutputs(transaction)) {
        if (this._isTracked(output.owner)) {
          overlay.put(output);
          created.push(output.ref);
        }
      }
    }

    return { height: block.header.height, hash: block.header.hash, created, spent };
  }

  private async _fetch<T>(
    signal: AbortSignal | undefined,
    what: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    this._throwIfAborted(signal);
    let value: T;
    try {
      value = await fn();
    } catch (err) {
      throw new WalletError(
        "SYNC_FAILED",
        `Sync failed fetching ${what}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    this._throwIfAborted(signal);
    return value;
  }

  private _throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted === true) {
      throw new WalletError("SYNC_FAILED", "Sync aborted", { cause: signal.reason });
    }
  }
}
