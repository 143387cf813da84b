/**
 * @kitty-wallet/store — In-memory KeyValueStore implementation.
 *
 * Stores values in a Map. Suitable for:
 * - Unit and integration tests
 * - Temporary wallets that are discarded on exit
 *
 * Not durable (all state lost on process exit).
 */

import type { JsonValue } from "@kitty-wallet/types";
import type { BatchOperation, BatchResult, KeyValueStore } from "./types.js";
import { validateKey } from "./types.js";

/**
 * In-memory key-value store.
 *
 * Batches are validated in full before the map is touched, so a rejected
 * batch leaves the store unchanged.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly _values = new Map<string, JsonValue>();

  private _sequence = 0;

  get(key: string): JsonValue | undefined {
    return this._values.get(key);
  }

  has(key: string): boolean {
    return this._values.has(key);
  }

  entries(prefix: string): readonly (readonly [string, JsonValue])[] {
    const result: [string, JsonValue][] = [];
    for (const [key, value] of this._values) {
      if (key.startsWith(prefix)) {
        result.push([key, value]);
      }
    }
    return result.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  batch(operations: readonly BatchOperation[]): BatchResult {
    for (const op of operations) {
      validateKey(op.key);
    }

    if (operations.length === 0) {
      return { sequence: this._sequence, count: 0 };
    }

    for (const op of operations) {
      if (op.type === "put") {
        this._values.set(op.key, op.value);
      } else {
        this._values.delete(op.key);
      }
    }

    this._sequence += 1;
    return { sequence: this._sequence, count: operations.length };
  }

  sequence(): number {
    return this._sequence;
  }

  /** Number of keys currently stored. */
  get size(): number {
    return this._values.size;
  }
}
