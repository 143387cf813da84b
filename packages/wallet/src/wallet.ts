/**
 * @kitty-wallet/wallet — Wallet service.
 *
 * Composition root for one wallet: its ledger store, keystore, sync
 * engine, builder and verifier. One method per wallet command. Commands
 * that submit a transaction sync first (unless told not to), build and
 * sign, then submit; the resulting outputs reach the store through a
 * later sync, never directly.
 *
 * Commands and syncs share one WriteLock: commands queue behind each
 * other, while an explicit sync() on a busy wallet fails fast.
 */

import { join } from "node:path";
import type { Logger } from "pino";
import type { ChainClient } from "@kitty-wallet/chain";
import { Keystore } from "@kitty-wallet/keystore";
import type { RandomSource } from "@kitty-wallet/kitties";
import type { KeyValueStore } from "@kitty-wallet/store";
import {
  DirectoryLock,
  InMemoryKeyValueStore,
  JsonlKeyValueStore,
  LedgerStore,
  WriteLock,
} from "@kitty-wallet/store";
import type {
  Block,
  KittyOutput,
  Output,
  OutputRef,
  PublicKey,
} from "@kitty-wallet/types";
import { TransactionBuilder } from "./builder.js";
import type { WalletConfig } from "./config.js";
import type {
  BreedKittyRequest,
  BuiltTransaction,
  MintCoinsRequest,
  MintKittyRequest,
  MintTradableKittyRequest,
  SetKittyPropertyRequest,
} from "./builder.js";
import { WalletError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { SyncEngine } from "./sync.js";
import type { SyncOptions, SyncResult } from "./sync.js";
import { Verifier } from "./verifier.js";
import type { VerificationReport } from "./verifier.js";

// =============================================================================
// Configuration
// =============================================================================

export interface WalletOptions {
  readonly chain: ChainClient;
  readonly ledgerStore: KeyValueStore;
  readonly keyStore: KeyValueStore;

  /** Keep every owner's outputs, not only those of held keys */
  readonly trackAllOwners?: boolean;

  /** Skip the sync before transaction commands by default */
  readonly noSync?: boolean;

  /** Blocks below the tip whose undo records are kept */
  readonly finalityDepth?: number;

  readonly random?: RandomSource;
  readonly logger?: Logger;

  /** Released by close() */
  readonly directoryLock?: DirectoryLock;
}

export type WalletSetup = Omit<WalletOptions, "ledgerStore" | "keyStore" | "directoryLock">;

export interface OpenWalletOptions extends WalletSetup {
  readonly dataDir: string;
  /** Ledger batches above which the log is compacted on open */
  readonly compactAfter?: number;
}

export const LEDGER_FILE_NAME = "ledger.jsonl";
export const KEYSTORE_FILE_NAME = "keystore.jsonl";

export const LEDGER_COMPACT_AFTER = 256;

// =============================================================================
// Requests & reports
// =============================================================================

export interface CommandOptions {
  /** Overrides the wallet's noSync default for this command */
  readonly noSync?: boolean;
}

export interface SpendRequest {
  /** Keys whose coins may be spent (default: every held key) */
  readonly from?: readonly PublicKey[];
  readonly inputs?: readonly OutputRef[];
  readonly recipient: PublicKey;
  readonly amounts: readonly bigint[];
}

export interface BuyRequest {
  readonly buyer: PublicKey;
  readonly seller: PublicKey;
  readonly name: string;
  readonly inputs?: readonly OutputRef[];
  readonly expectedPrice?: bigint;
}

export interface BalanceReport {
  readonly byOwner: ReadonlyMap<PublicKey, bigint>;
  readonly total: bigint;
}

// =============================================================================
// Wallet
// =============================================================================

export class Wallet {
  readonly store: LedgerStore;
  readonly keystore: Keystore;
  readonly syncEngine: SyncEngine;
  readonly builder: TransactionBuilder;
  readonly verifier: Verifier;

  private readonly _chain: ChainClient;
  private readonly _lock = new WriteLock();
  private readonly _noSync: boolean;
  private readonly _log: Logger;
  private readonly _directoryLock: DirectoryLock | undefined;
  private _closed = false;

  constructor(options: WalletOptions) {
    const logger = options.logger ?? silentLogger();
    this._chain = options.chain;
    this._noSync = options.noSync ?? false;
    this._log = logger.child({ component: "wallet" });
    this._directoryLock = options.directoryLock;

    this.store = new LedgerStore(options.ledgerStore);
    this.keystore = new Keystore(options.keyStore);

    const trackAll = options.trackAllOwners ?? false;
    this.syncEngine = new SyncEngine(this.store, this._chain, {
      isTracked: trackAll ? () => true : (owner) => this.keystore.has(owner),
      lock: this._lock,
      finalityDepth: options.finalityDepth,
      logger,
    });
    this.builder = new TransactionBuilder(this.store, this.keystore, {
      random: options.random,
      logger,
    });
    this.verifier = new Verifier(this.store, this._chain);
  }

  /**
   * Open (or create) a wallet data directory, taking its lock. A ledger
   * log past `compactAfter` batches is rewritten to its live entries.
   *
   * @throws StoreError STORE_LOCKED | STORE_CORRUPTED
   */
  static open(options: OpenWalletOptions): Wallet {
    const { dataDir, compactAfter = LEDGER_COMPACT_AFTER, ...setup } = options;
    const directoryLock = DirectoryLock.acquire(dataDir);
    try {
      const ledgerStore = new JsonlKeyValueStore({ filePath: join(dataDir, LEDGER_FILE_NAME) });
      if (ledgerStore.sequence() > compactAfter) {
        setup.logger?.info({ batches: ledgerStore.sequence() }, "Compacting ledger log");
        ledgerStore.compact();
      }
      return new Wallet({
        ...setup,
        ledgerStore,
        keyStore: new JsonlKeyValueStore({ filePath: join(dataDir, KEYSTORE_FILE_NAME) }),
        directoryLock,
      });
    } catch (err) {
      directoryLock.release();
      throw err;
    }
  }

  /** A wallet that lives only as long as the process. */
  static inMemory(setup: WalletSetup): Wallet {
    return new Wallet({
      ...setup,
      ledgerStore: new InMemoryKeyValueStore(),
      keyStore: new InMemoryKeyValueStore(),
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Refuse new work, wait for the running sync or command to finish, then
   * release the data directory.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    this._closed = true;
    await this._lock.runExclusive(() => undefined);
    this._directoryLock?.release();
  }

  // ─── Sync ───────────────────────────────────────────────────────────

  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    this._assertOpen();
    return this.syncEngine.sync(options);
  }

  async resync(options: SyncOptions = {}): Promise<SyncResult> {
    this._assertOpen();
    return this.syncEngine.resync(options);
  }

  // ─── Transactions ───────────────────────────────────────────────────

  mintCoins(request: MintCoinsRequest, options: CommandOptions = {}): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.mintCoins(request));
  }

  spendCoins(request: SpendRequest, options: CommandOptions = {}): Promise<BuiltTransaction> {
    return this._transact(options, () =>
      this.builder.spendCoins({
        from: new Set(request.from ?? this.keystore.list()),
        inputs: request.inputs,
        recipient: request.recipient,
        amounts: request.amounts,
      }),
    );
  }

  mintKitty(request: MintKittyRequest, options: CommandOptions = {}): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.mintKitty(request));
  }

  mintTradableKitty(
    request: MintTradableKittyRequest,
    options: CommandOptions = {},
  ): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.mintTradableKitty(request));
  }

  breedKitty(request: BreedKittyRequest, options: CommandOptions = {}): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.breedKitty(request, false));
  }

  breedTradableKitty(
    request: BreedKittyRequest,
    options: CommandOptions = {},
  ): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.breedKitty(request, true));
  }

  setKittyProperty(
    request: SetKittyPropertyRequest,
    options: CommandOptions = {},
  ): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.setKittyProperty(request));
  }

  buyKitty(request: BuyRequest, options: CommandOptions = {}): Promise<BuiltTransaction> {
    return this._transact(options, () => this.builder.buyKitty(request));
  }

  // ─── Verification ───────────────────────────────────────────────────

  verifyCoin(ref: OutputRef): Promise<VerificationReport> {
    return this.verifier.verify(ref, "coin");
  }

  verifyKitty(ref: OutputRef): Promise<VerificationReport> {
    return this.verifier.verify(ref, "kitty");
  }

  verifyTradableKitty(ref: OutputRef): Promise<VerificationReport> {
    return this.verifier.verify(ref, "tradable-kitty");
  }

  // ─── Reports ────────────────────────────────────────────────────────

  /** Coin balances of every tracked owner. */
  showBalance(): BalanceReport {
    const byOwner = this.store.balances();
    let total = 0n;
    for (const value of byOwner.values()) {
      total += value;
    }
    return { byOwner, total };
  }

  showAllOutputs(): readonly Output[] {
    return this.store.listOutputs();
  }

  showAllKitties(): readonly KittyOutput[] {
    return this.store.listKitties();
  }

  showOwnedKitties(owner: PublicKey): readonly KittyOutput[] {
    return this.store.listKitties(owner);
  }

  // ─── Keys ───────────────────────────────────────────────────────────

  insertKey(seed: string, password?: string): PublicKey {
    this._assertOpen();
    return this.keystore.insert(seed, password);
  }

  generateKey(password?: string): PublicKey {
    this._assertOpen();
    return this.keystore.generate(password);
  }

  /** Irrevocable: the key's outputs become unspendable from this wallet. */
  removeKey(publicKey: PublicKey): void {
    this._assertOpen();
    this.keystore.remove(publicKey);
    this._log.info({ publicKey }, "Key removed");
  }

  unlockKey(publicKey: PublicKey, password: string): void {
    this.keystore.unlock(publicKey, password);
  }

  showKeys(): readonly PublicKey[] {
    return this.keystore.list();
  }

  // ─── Chain queries ──────────────────────────────────────────────────

  /**
   * Block at a height, or the best block when no height is given.
   */
  async getBlock(height?: number): Promise<Block | undefined> {
    const target = height ?? (await this._chain.getTip()).height;
    return this._chain.getBlock(target);
  }

  showTimestamp(): Promise<number> {
    return this._chain.latestTimestamp();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertOpen(): void {
    if (this._closed) {
      throw new WalletError("WALLET_CLOSED", "Wallet has been closed");
    }
  }

  private async _transact(
    options: CommandOptions,
    build: () => BuiltTransaction,
  ): Promise<BuiltTransaction> {
    this._assertOpen();
    return this._lock.runExclusive(async () => {
      if (!(options.noSync ?? this._noSync)) {
        await this.syncEngine.syncHeld();
      }
      return this._submit(build());
    });
  }

  private async _submit(built: BuiltTransaction): Promise<BuiltTransaction> {
    try {
      await this._chain.submit(built.transaction);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this._log.warn({ txHash: built.txHash, reason }, "Transaction rejected");
      throw new WalletError("SUBMISSION_FAILED", reason, { cause: err });
    }

    this._log.info(
      { txHash: built.txHash, checker: built.transaction.checker, outputs: built.outputRefs.length },
      "Transaction submitted",
    );
    return built;
  }
}

// =============================================================================
// From configuration
// =============================================================================

/**
 * Wallet described by a loaded config: on disk when WALLET_DATA_DIR is
 * set, in memory otherwise.
 */
export function openWallet(config: WalletConfig, chain: ChainClient, logger: Logger): Wallet {
  const setup: WalletSetup = {
    chain,
    logger,
    noSync: config.WALLET_NO_SYNC,
    finalityDepth: config.WALLET_FINALITY_DEPTH,
    trackAllOwners: config.WALLET_TRACK_ALL_OWNERS,
  };
  return config.WALLET_DATA_DIR === undefined
    ? Wallet.inMemory(setup)
    : Wallet.open({ ...setup, dataDir: config.WALLET_DATA_DIR });
}
