/**
 * Tests for DevChain.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryKeyValueStore } from "@kitty-wallet/store";
import { Keystore } from "@kitty-wallet/keystore";
import type { PublicKey, Transaction } from "@kitty-wallet/types";
import { outputRefsOf, signingPayload } from "../src/codec.js";
import { DevChain } from "../src/dev-chain.js";
import { ChainError } from "../src/types.js";

let chain: DevChain;
let keystore: Keystore;
let alice: PublicKey;
let bob: PublicKey;

beforeEach(() => {
  chain = new DevChain({ genesisTimestamp: 1_000_000, blockTimeMs: 6000 });
  keystore = new Keystore(new InMemoryKeyValueStore());
  alice = keystore.insert("alice");
  bob = keystore.insert("bob");
});

function mintTo(owner: PublicKey, value: bigint): Transaction {
  return {
    inputs: [],
    outputs: [{ owner, payload: { kind: "coin", value } }],
    checker: "mint-coins",
  };
}

function signed(tx: Transaction, signer: PublicKey): Transaction {
  const payload = signingPayload(tx);
  return {
    ...tx,
    inputs: tx.inputs.map((input) => ({ ...input, redeemer: keystore.sign(signer, payload) })),
  };
}

async function expectRejected(promise: Promise<unknown>, pattern: RegExp): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(ChainError);
  await expect(promise).rejects.toThrow(pattern);
}

/** Mint `value` to alice and seal it; returns the coin reference. */
async function fundAlice(value: bigint) {
  const tx = mintTo(alice, value);
  await chain.submit(tx);
  chain.produceBlock();
  const [ref] = outputRefsOf(tx);
  if (ref === undefined) throw new Error("mint created no output");
  return ref;
}

// =============================================================================
// Blocks
// =============================================================================

describe("blocks", () => {
  it("starts at a genesis block", async () => {
    const tip = await chain.getTip();
    expect(tip.height).toBe(0);
    expect(tip.parentHash).toBe("0".repeat(64));
    expect(await chain.latestTimestamp()).toBe(1_000_000);
  });

  it("links produced blocks to their parents", async () => {
    const genesis = await chain.getTip();
    const block = chain.produceBlock();

    expect(block.header.height).toBe(1);
    expect(block.header.parentHash).toBe(genesis.hash);
    expect(block.header.timestamp).toBe(1_006_000);
    expect(await chain.getBlockHash(1)).toBe(block.header.hash);
    expect(await chain.getBlock(2)).toBeUndefined();
  });

  it("applies sealed transactions to the output set", async () => {
    const tx = mintTo(alice, 100n);
    const hash = await chain.submit(tx);
    expect(chain.pendingCount).toBe(1);

    const [ref] = outputRefsOf(tx);
    expect(ref?.txHash).toBe(hash);
    if (ref === undefined) return;
    expect(await chain.getOutput(ref)).toBeUndefined();

    chain.produceBlock();
    expect(chain.pendingCount).toBe(0);
    expect(await chain.getOutput(ref)).toEqual({
      ref,
      owner: alice,
      payload: { kind: "coin", value: 100n },
    });
  });
});

// =============================================================================
// Submission checks
// =============================================================================

describe("submit", () => {
  it("accepts a signed spend and moves the coin", async () => {
    const coin = await fundAlice(100n);
    const tx = signed(
      {
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 40n } }],
        checker: "spend-coins",
      },
      alice,
    );

    await chain.submit(tx);
    chain.produceBlock();

    expect(await chain.getOutput(coin)).toBeUndefined();
    const [paid] = outputRefsOf(tx);
    if (paid === undefined) throw new Error("spend created no output");
    expect((await chain.getOutput(paid))?.owner).toBe(bob);
  });

  it("rejects an unsigned input", async () => {
    const coin = await fundAlice(100n);
    await expectRejected(
      chain.submit({
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 40n } }],
        checker: "spend-coins",
      }),
      /is not signed/,
    );
  });

  it("rejects a signature by someone other than the owner", async () => {
    const coin = await fundAlice(100n);
    const tx = signed(
      {
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 40n } }],
        checker: "spend-coins",
      },
      bob,
    );
    await expectRejected(chain.submit(tx), /bad signature/);
  });

  it("rejects outputs exceeding inputs", async () => {
    const coin = await fundAlice(100n);
    const tx = signed(
      {
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 150n } }],
        checker: "spend-coins",
      },
      alice,
    );
    await expectRejected(chain.submit(tx), /outputs \(150\) exceed inputs \(100\)/);
  });

  it("rejects a second spend of a queued input", async () => {
    const coin = await fundAlice(100n);
    const first = signed(
      {
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 40n } }],
        checker: "spend-coins",
      },
      alice,
    );
    const second = signed(
      {
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [{ owner: bob, payload: { kind: "coin", value: 30n } }],
        checker: "spend-coins",
      },
      alice,
    );

    await chain.submit(first);
    await expectRejected(chain.submit(second), /unknown or already spent/);
  });

  it("rejects inputs on a mint", async () => {
    const coin = await fundAlice(1n);
    await expectRejected(
      chain.submit({
        inputs: [{ outputRef: coin, redeemer: "" }],
        outputs: [],
        checker: "mint-coins",
      }),
      /takes no inputs/,
    );
  });

  it("lets an unsigned listed kitty go to a buyer", async () => {
    const listing: Transaction = {
      inputs: [],
      outputs: [
        {
          owner: bob,
          payload: {
            kind: "tradable-kitty",
            kitty: { name: "tom", gender: "male", dna: "d".repeat(64), numBreedings: 0, freeBreedings: 2 },
            price: 10n,
            isAvailableForSale: true,
          },
        },
      ],
      checker: "mint-tradable-kitty",
    };
    await chain.submit(listing);
    chain.produceBlock();
    const [kittyRef] = outputRefsOf(listing);
    if (kittyRef === undefined) throw new Error("listing created no output");

    const hash = await chain.submit({
      inputs: [{ outputRef: kittyRef, redeemer: "" }],
      outputs: [],
      checker: "buy-kitty",
    });
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
  });
});

// =============================================================================
// Faults & reorgs
// =============================================================================

describe("failNext", () => {
  it("fails exactly one call", async () => {
    chain.failNext("getTip");
    await expect(chain.getTip()).rejects.toMatchObject({ code: "UNAVAILABLE" });
    await expect(chain.getTip()).resolves.toMatchObject({ height: 0 });
  });
});

describe("rewind", () => {
  it("drops blocks and their outputs, then forks with new hashes", async () => {
    const coin = await fundAlice(100n);
    const replaced = await chain.getBlockHash(1);

    chain.rewind(0);
    expect(chain.height).toBe(0);
    expect(await chain.getOutput(coin)).toBeUndefined();

    const fork = chain.produceBlock();
    expect(fork.header.height).toBe(1);
    expect(fork.header.hash).not.toBe(replaced);
  });

  it("refuses heights above the tip", () => {
    expect(() => chain.rewind(5)).toThrow(ChainError);
  });
});
