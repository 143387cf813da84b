/**
 * @kitty-wallet/store — Core types.
 *
 * Defines the key-value persistence contract the wallet core requires.
 *
 * Design principles:
 * - Point reads and ordered prefix scans
 * - Writes only through batches; a batch is applied entirely or not at all
 * - Values are plain JSON (bigints are encoded by the layer above)
 * - Unreadable persisted data is fatal, never silently skipped
 */

import type { JsonValue } from "@kitty-wallet/types";

// =============================================================================
// Batch Operations
// =============================================================================

export interface PutOperation {
  readonly type: "put";
  readonly key: string;
  readonly value: JsonValue;
}

export interface DeleteOperation {
  readonly type: "delete";
  readonly key: string;
}

export type BatchOperation = PutOperation | DeleteOperation;

/**
 * Result of a committed batch.
 */
export interface BatchResult {
  /** Sequence number of the batch (1-based, monotonically increasing) */
  readonly sequence: number;

  /** Number of operations applied */
  readonly count: number;
}

// =============================================================================
// Key-Value Store Interface
// =============================================================================

/**
 * Durable key-value mapping with atomic multi-key batches.
 *
 * Invariants:
 * - A batch is all-or-nothing, also across crashes
 * - Reads observe the last committed batch
 * - entries() returns keys in ascending lexicographic order
 */
export interface KeyValueStore {
  /**
   * Read a single value.
   *
   * @returns The value, or undefined if the key is absent
   */
  get(key: string): JsonValue | undefined;

  has(key: string): boolean;

  /**
   * All entries whose key starts with the prefix, sorted by key.
   */
  entries(prefix: string): readonly (readonly [string, JsonValue])[];

  /**
   * Apply a batch of puts and deletes atomically.
   *
   * An empty batch is a no-op and does not consume a sequence number.
   *
   * @throws StoreError if the store is closed or a key is invalid
   */
  batch(operations: readonly BatchOperation[]): BatchResult;

  /**
   * Sequence number of the last committed batch, or 0 if none.
   */
  sequence(): number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for store operations.
 *
 * STORE_CORRUPTED is fatal: the current command must abort.
 */
export type StoreErrorCode =
  | "INVALID_KEY"
  | "STORE_CLOSED"
  | "STORE_CORRUPTED"
  | "STORE_LOCKED";

/**
 * Error thrown by store operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new StoreError("INVALID_KEY", "Key must be a non-empty string");
  }
  if (key.includes("\n")) {
    throw new StoreError("INVALID_KEY", "Key must not contain newlines", key);
  }
}
