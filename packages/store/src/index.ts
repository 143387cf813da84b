/**
 * @kitty-wallet/store — Local Ledger Store and key-value persistence.
 *
 * Provides:
 * - KeyValueStore interface with atomic multi-key batches
 * - InMemoryKeyValueStore for tests and temporary wallets
 * - JsonlKeyValueStore for durable, hash-chained file persistence
 * - LedgerStore, the typed snapshot of the wallet's unspent outputs
 * - WriteLock and DirectoryLock for the single-writer discipline
 *
 * @packageDocumentation
 */

// Core types
export type {
  PutOperation,
  DeleteOperation,
  BatchOperation,
  BatchResult,
  KeyValueStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

// Hash chain
export { computeBatchHash, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryKeyValueStore } from "./in-memory-store.js";
export { JsonlKeyValueStore } from "./jsonl-store.js";
export type { JsonlKeyValueStoreOptions } from "./jsonl-store.js";

// Ledger view
export { LedgerStore } from "./ledger-store.js";
export type { LedgerChange, OutputFilter } from "./ledger-store.js";
export type { BlockRecord } from "./records.js";

// Locking
export { WriteLock } from "./write-lock.js";
export { DirectoryLock, LOCK_FILE_NAME } from "./directory-lock.js";
