/**
 * @kitty-wallet/store — Local Ledger Store.
 *
 * Typed view over a KeyValueStore holding the wallet's snapshot of the
 * chain: unspent outputs, the (owner, name) kitty index, per-block undo
 * records and the sync watermark.
 *
 * Every mutation goes through applyChanges(), which turns a LedgerChange
 * into ONE batch. Outputs, index entries, block records and the watermark
 * therefore always move together.
 */

import type {
  KittyOutput,
  Output,
  OutputKind,
  OutputRef,
  PublicKey,
  SyncWatermark,
} from "@kitty-wallet/types";
import {
  compareOutputRefs,
  isCoinOutput,
  isKittyOutput,
  outputRefsEqual,
} from "@kitty-wallet/types";
import type { CoinOutput } from "@kitty-wallet/types";
import {
  BLOCK_PREFIX,
  blockKey,
  decodeBlockRecord,
  decodeOutput,
  decodeRefs,
  decodeWatermark,
  encodeBlockRecord,
  encodeOutput,
  encodeRefs,
  nameIndexKey,
  OUTPUT_PREFIX,
  outputKey,
  WATERMARK_KEY,
} from "./records.js";
import type { BlockRecord } from "./records.js";
import type { BatchOperation, BatchResult, KeyValueStore } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A set of changes committed as one atomic batch.
 */
export interface LedgerChange {
  /** Outputs to insert (or overwrite) */
  readonly insert?: readonly Output[];

  /** Outputs to remove; unknown references are ignored */
  readonly remove?: readonly OutputRef[];

  /** Block undo records to write */
  readonly putBlocks?: readonly BlockRecord[];

  /** Heights whose block records are dropped */
  readonly dropBlocks?: readonly number[];

  /** New watermark; null clears it */
  readonly watermark?: SyncWatermark | null;
}

/**
 * Filter for listing outputs.
 */
export interface OutputFilter {
  readonly owners?: ReadonlySet<PublicKey>;
  readonly kinds?: ReadonlySet<OutputKind>;
}

// =============================================================================
// Ledger Store
// =============================================================================

export class LedgerStore {
  constructor(private readonly kv: KeyValueStore) {}

  // ─── Outputs ────────────────────────────────────────────────────────

  getOutput(ref: OutputRef): Output | undefined {
    const key = outputKey(ref);
    const value = this.kv.get(key);
    return value === undefined ? undefined : decodeOutput(value, key);
  }

  hasOutput(ref: OutputRef): boolean {
    return this.kv.has(outputKey(ref));
  }

  /**
   * All outputs matching the filter, ascending by reference.
   */
  listOutputs(filter: OutputFilter = {}): readonly Output[] {
    const outputs: Output[] = [];
    for (const [key, value] of this.kv.entries(OUTPUT_PREFIX)) {
      const output = decodeOutput(value, key);
      if (filter.owners !== undefined && !filter.owners.has(output.owner)) {
        continue;
      }
      if (filter.kinds !== undefined && !filter.kinds.has(output.payload.kind)) {
        continue;
      }
      outputs.push(output);
    }
    return outputs.sort((a, b) => compareOutputRefs(a.ref, b.ref));
  }

  listCoins(owners?: ReadonlySet<PublicKey>): readonly CoinOutput[] {
    return this.listOutputs({ owners }).filter(isCoinOutput);
  }

  /**
   * Plain and tradable kitties, optionally for one owner.
   */
  listKitties(owner?: PublicKey): readonly KittyOutput[] {
    const owners = owner === undefined ? undefined : new Set([owner]);
    return this.listOutputs({ owners }).filter(isKittyOutput);
  }

  /**
   * Live kitties of an owner carrying a name, resolved through the index.
   */
  findKittiesByName(owner: PublicKey, name: string): readonly KittyOutput[] {
    const key = nameIndexKey(owner, name);
    const value = this.kv.get(key);
    if (value === undefined) {
      return [];
    }

    const kitties: KittyOutput[] = [];
    for (const ref of decodeRefs(value, key)) {
      const output = this.getOutput(ref);
      if (output !== undefined && isKittyOutput(output)) {
        kitties.push(output);
      }
    }
    return kitties.sort((a, b) => compareOutputRefs(a.ref, b.ref));
  }

  /**
   * Sum of coin values per owner.
   */
  balances(owners?: ReadonlySet<PublicKey>): ReadonlyMap<PublicKey, bigint> {
    const totals = new Map<PublicKey, bigint>();
    for (const coin of this.listCoins(owners)) {
      totals.set(coin.owner, (totals.get(coin.owner) ?? 0n) + coin.payload.value);
    }
    return totals;
  }

  // ─── Watermark & blocks ─────────────────────────────────────────────

  getWatermark(): SyncWatermark | undefined {
    const value = this.kv.get(WATERMARK_KEY);
    return value === undefined ? undefined : decodeWatermark(value, WATERMARK_KEY);
  }

  getBlockRecord(height: number): BlockRecord | undefined {
    const key = blockKey(height);
    const value = this.kv.get(key);
    return value === undefined ? undefined : decodeBlockRecord(value, key);
  }

  /**
   * Heights with a block record, ascending.
   */
  blockHeights(): readonly number[] {
    return this.kv
      .entries(BLOCK_PREFIX)
      .map(([key]) => Number.parseInt(key.slice(BLOCK_PREFIX.length), 10));
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * Commit a change as one atomic batch.
   *
   * Removals are applied before insertions, so a change may replace an
   * output under the same reference.
   */
  applyChanges(change: LedgerChange): BatchResult {
    const operations: BatchOperation[] = [];

    /** Pending name index values, keyed by index key */
    const index = new Map<string, OutputRef[]>();
    const indexFor = (owner: PublicKey, name: string): OutputRef[] => {
      const key = nameIndexKey(owner, name);
      let refs = index.get(key);
      if (refs === undefined) {
        const stored = this.kv.get(key);
        refs = stored === undefined ? [] : [...decodeRefs(stored, key)];
        index.set(key, refs);
      }
      return refs;
    };

    for (const ref of change.remove ?? []) {
      const existing = this.getOutput(ref);
      if (existing === undefined) {
        continue;
      }
      operations.push({ type: "delete", key: outputKey(ref) });
      if (isKittyOutput(existing)) {
        const refs = indexFor(existing.owner, existing.payload.kitty.name);
        const position = refs.findIndex((r) => outputRefsEqual(r, ref));
        if (position >= 0) {
          refs.splice(position, 1);
        }
      }
    }

    for (const output of change.insert ?? []) {
      operations.push({ type: "put", key: outputKey(output.ref), value: encodeOutput(output) });
      if (isKittyOutput(output)) {
        const refs = indexFor(output.owner, output.payload.kitty.name);
        if (!refs.some((r) => outputRefsEqual(r, output.ref))) {
          refs.push(output.ref);
        }
      }
    }

    for (const [key, refs] of index) {
      if (refs.length === 0) {
        operations.push({ type: "delete", key });
      } else {
        const sorted = [...refs].sort(compareOutputRefs);
        operations.push({ type: "put", key, value: encodeRefs(sorted) });
      }
    }

    for (const height of change.dropBlocks ?? []) {
      operations.push({ type: "delete", key: blockKey(height) });
    }
    for (const record of change.putBlocks ?? []) {
      operations.push({ type: "put", key: blockKey(record.height), value: encodeBlockRecord(record) });
    }

    if (change.watermark === null) {
      operations.push({ type: "delete", key: WATERMARK_KEY });
    } else if (change.watermark !== undefined) {
      operations.push({
        type: "put",
        key: WATERMARK_KEY,
        value: { height: change.watermark.height, hash: change.watermark.hash },
      });
    }

    return this.kv.batch(operations);
  }
}
