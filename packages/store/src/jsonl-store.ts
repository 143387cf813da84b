/**
 * @kitty-wallet/store — File-based JSONL KeyValueStore implementation.
 *
 * Stores committed batches as one JSON object per line in a `.jsonl` file.
 * The current key-value state is the fold of all batches in order.
 *
 * Crash safety:
 * - A batch is one line written with a single append + fsync
 * - An append that fails is truncated back off before the error surfaces,
 *   so the next batch never lands after a partial line
 * - A torn final line (no trailing newline) is an uncommitted batch: it is
 *   discarded and truncated away on load
 * - Any other unreadable line, sequence gap or hash-chain break is
 *   corruption and fails the load with STORE_CORRUPTED
 *
 * File format:
 * {"sequence":1,"operations":[{"type":"put","key":"...","value":...}],"hash":"..."}
 */

import {
  closeSync,
  existsSync,
  fstatSync,
  fsyncSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  truncateSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { JsonValue } from "@kitty-wallet/types";
import { computeBatchHash, GENESIS_HASH } from "./hash-chain.js";
import { InMemoryKeyValueStore } from "./in-memory-store.js";
import type { BatchOperation, BatchResult, KeyValueStore } from "./types.js";
import { StoreError, validateKey } from "./types.js";

/**
 * Options for creating a JsonlKeyValueStore.
 */
export interface JsonlKeyValueStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const BatchOperationSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("put"), key: z.string().min(1), value: JsonValueSchema }),
  z.object({ type: z.literal("delete"), key: z.string().min(1) }),
]);

const BatchLineSchema = z.object({
  sequence: z.number().int().positive(),
  operations: z.array(BatchOperationSchema).min(1),
  hash: z.string().regex(/^[0-9a-f]{64}$/),
});

/**
 * File-based JSONL key-value store.
 *
 * State is rebuilt from the file on construction; afterwards the file is
 * only ever appended to, except by compact().
 */
export class JsonlKeyValueStore implements KeyValueStore {
  private readonly _filePath: string;

  /** Folded state (rebuilt from file on load) */
  private readonly _state = new InMemoryKeyValueStore();

  private _sequence = 0;

  private _lastHash: string = GENESIS_HASH;

  /**
   * Create a new JsonlKeyValueStore.
   *
   * If the file exists, batches are replayed from it.
   * The parent directory is created if it doesn't exist.
   *
   * @throws StoreError STORE_CORRUPTED if the file cannot be replayed
   */
  constructor(options: JsonlKeyValueStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get(key: string): JsonValue | undefined {
    return this._state.get(key);
  }

  has(key: string): boolean {
    return this._state.has(key);
  }

  entries(prefix: string): readonly (readonly [string, JsonValue])[] {
    return this._state.entries(prefix);
  }

  sequence(): number {
    return this._sequence;
  }

  // ─── Batch ──────────────────────────────────────────────────────────

  batch(operations: readonly BatchOperation[]): BatchResult {
    for (const op of operations) {
      validateKey(op.key);
    }

    if (operations.length === 0) {
      return { sequence: this._sequence, count: 0 };
    }

    const sequence = this._sequence + 1;
    const hash = computeBatchHash(sequence, operations, this._lastHash);
    const line = JSON.stringify({ sequence, operations, hash }) + "\n";

    // Durable first; in-memory state only moves after the line is on disk
    this._appendAndSync(line);

    this._state.batch(operations);
    this._sequence = sequence;
    this._lastHash = hash;

    return { sequence, count: operations.length };
  }

  // ─── Maintenance ────────────────────────────────────────────────────

  /**
   * Rewrite the log as a single batch holding the current state.
   *
   * The new file is written and synced beside the old one, then renamed
   * over it, so a crash leaves either the old or the new log.
   */
  compact(): void {
    const operations: BatchOperation[] = this._state
      .entries("")
      .map(([key, value]): BatchOperation => ({ type: "put", key, value }));

    const tmpPath = `${this._filePath}.compact`;
    const fd = openSync(tmpPath, "w");
    let hash = GENESIS_HASH;
    try {
      if (operations.length > 0) {
        hash = computeBatchHash(1, operations, GENESIS_HASH);
        writeSync(fd, JSON.stringify({ sequence: 1, operations, hash }) + "\n");
      }
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, this._filePath);

    this._sequence = operations.length > 0 ? 1 : 0;
    this._lastHash = hash;
  }

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lines = content.split("\n");

    // The segment after the last newline is either empty or a torn write
    const torn = lines.pop() ?? "";
    if (torn.length > 0) {
      truncateSync(this._filePath, Buffer.byteLength(content) - Buffer.byteLength(torn));
    }

    for (let i = 0; i < lines.length; i++) {
      const trimmed = (lines[i] ?? "").trim();
      if (trimmed.length === 0) {
        continue;
      }
      this._replayLine(trimmed, i + 1);
    }
  }

  private _replayLine(text: string, lineNumber: number): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw this._corrupted(lineNumber, "line is not valid JSON");
    }

    const parsed = BatchLineSchema.safeParse(raw);
    if (!parsed.success) {
      throw this._corrupted(lineNumber, parsed.error.issues[0]?.message ?? "invalid batch");
    }

    const { sequence, operations, hash } = parsed.data;
    if (sequence !== this._sequence + 1) {
      throw this._corrupted(
        lineNumber,
        `expected sequence ${this._sequence + 1}, found ${sequence}`,
      );
    }

    const expected = computeBatchHash(sequence, operations, this._lastHash);
    if (expected !== hash) {
      throw this._corrupted(lineNumber, "hash chain broken");
    }

    this._state.batch(operations);
    this._sequence = sequence;
    this._lastHash = hash;
  }

  private _corrupted(lineNumber: number, reason: string): StoreError {
    return new StoreError(
      "STORE_CORRUPTED",
      `${this._filePath}:${lineNumber}: ${reason}`,
    );
  }

  /**
   * Append data to the JSONL file and fsync for durability. On failure
   * the file is cut back to its size before the append.
   */
  private _appendAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      const size = fstatSync(fd).size;
      try {
        writeSync(fd, data);
        fsyncSync(fd);
      } catch (err) {
        ftruncateSync(fd, size);
        throw err;
      }
    } finally {
      closeSync(fd);
    }
  }
}
