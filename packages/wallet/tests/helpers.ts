/**
 * Shared fixtures for wallet tests: an in-memory wallet on a DevChain.
 */

import { DevChain } from "@kitty-wallet/chain";
import type { RandomSource } from "@kitty-wallet/kitties";
import type { BatchOperation, BatchResult, KeyValueStore } from "@kitty-wallet/store";
import { InMemoryKeyValueStore } from "@kitty-wallet/store";
import type { JsonValue, Output, OutputRef, PublicKey } from "@kitty-wallet/types";
import { silentLogger } from "../src/logger.js";
import { Wallet } from "../src/wallet.js";
import type { WalletOptions } from "../src/wallet.js";

/** Distinct, reproducible entropy for each mint. */
export function counterRandom(): RandomSource {
  let counter = 0;
  return () => {
    const bytes = new Uint8Array(32);
    bytes[0] = counter & 0xff;
    bytes[1] = (counter >> 8) & 0xff;
    counter += 1;
    return bytes;
  };
}

export function ref(byte: string, index = 0): OutputRef {
  return { txHash: byte.repeat(64), index };
}

export function coin(r: OutputRef, owner: PublicKey, value: bigint): Output {
  return { ref: r, owner, payload: { kind: "coin", value } };
}

/**
 * KeyValueStore whose batches can be made to fail, for fault injection.
 */
export class FaultyKeyValueStore implements KeyValueStore {
  failBatches = false;

  readonly inner = new InMemoryKeyValueStore();

  get(key: string): JsonValue | undefined {
    return this.inner.get(key);
  }

  has(key: string): boolean {
    return this.inner.has(key);
  }

  entries(prefix: string): readonly (readonly [string, JsonValue])[] {
    return this.inner.entries(prefix);
  }

  batch(operations: readonly BatchOperation[]): BatchResult {
    if (this.failBatches) {
      throw new Error("disk full");
    }
    return this.inner.batch(operations);
  }

  sequence(): number {
    return this.inner.sequence();
  }
}

export interface Fixture {
  readonly chain: DevChain;
  readonly wallet: Wallet;
  readonly ledgerKv: FaultyKeyValueStore;
  readonly alice: PublicKey;
  readonly bob: PublicKey;
}

export interface FixtureOptions
  extends Partial<Pick<WalletOptions, "trackAllOwners" | "noSync" | "finalityDepth">> {
  readonly chain?: DevChain;
}

export function createFixture(options: FixtureOptions = {}): Fixture {
  const { chain = new DevChain(), ...overrides } = options;
  const ledgerKv = new FaultyKeyValueStore();
  const wallet = new Wallet({
    chain,
    ledgerStore: ledgerKv,
    keyStore: new InMemoryKeyValueStore(),
    random: counterRandom(),
    logger: silentLogger(),
    ...overrides,
  });
  const alice = wallet.insertKey("alice");
  const bob = wallet.insertKey("bob");
  return { chain, wallet, ledgerKv, alice, bob };
}

/** Seal queued transactions and sync them into the wallet. */
export async function confirm(fixture: Fixture): Promise<void> {
  fixture.chain.produceBlock();
  await fixture.wallet.sync();
}

/** Everything in a store, for before/after comparisons. */
export function dump(kv: KeyValueStore): readonly (readonly [string, JsonValue])[] {
  return kv.entries("");
}
