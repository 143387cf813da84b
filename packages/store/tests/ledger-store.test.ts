/**
 * Tests for LedgerStore.
 *
 * Verifies:
 * - Output round-trips through the persisted JSON form
 * - Name index follows inserts and removals
 * - Watermark and block records move in the same batch as outputs
 * - Unreadable records surface as STORE_CORRUPTED
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { KittyData, Output, OutputRef } from "@kitty-wallet/types";
import { InMemoryKeyValueStore } from "../src/in-memory-store.js";
import { LedgerStore } from "../src/ledger-store.js";
import { StoreError } from "../src/types.js";

// =============================================================================
// Fixtures
// =============================================================================

const ALICE = "a1".repeat(32);
const BOB = "b2".repeat(32);

function ref(byte: string, index = 0): OutputRef {
  return { txHash: byte.repeat(64), index };
}

function coin(r: OutputRef, owner: string, value: bigint): Output {
  return { ref: r, owner, payload: { kind: "coin", value } };
}

function kittyData(name: string): KittyData {
  return {
    name,
    gender: "female",
    dna: "d".repeat(64),
    numBreedings: 0,
    freeBreedings: 2,
  };
}

function kitty(r: OutputRef, owner: string, name: string): Output {
  return { ref: r, owner, payload: { kind: "kitty", kitty: kittyData(name) } };
}

let kv: InMemoryKeyValueStore;
let store: LedgerStore;

beforeEach(() => {
  kv = new InMemoryKeyValueStore();
  store = new LedgerStore(kv);
});

// =============================================================================
// Outputs
// =============================================================================

describe("outputs", () => {
  it("round-trips u128 values", () => {
    const big = (1n << 128n) - 1n;
    store.applyChanges({ insert: [coin(ref("1"), ALICE, big)] });

    expect(store.getOutput(ref("1"))).toEqual(coin(ref("1"), ALICE, big));
  });

  it("round-trips tradable kitties", () => {
    const listed: Output = {
      ref: ref("2", 3),
      owner: BOB,
      payload: {
        kind: "tradable-kitty",
        kitty: kittyData("tom"),
        price: 250n,
        isAvailableForSale: true,
      },
    };
    store.applyChanges({ insert: [listed] });
    expect(store.getOutput(ref("2", 3))).toEqual(listed);
  });

  it("lists outputs ordered by reference and filtered", () => {
    store.applyChanges({
      insert: [
        coin(ref("3"), ALICE, 5n),
        kitty(ref("1"), ALICE, "kitty"),
        coin(ref("2"), BOB, 7n),
      ],
    });

    expect(store.listOutputs().map((o) => o.ref.txHash[0])).toEqual(["1", "2", "3"]);
    expect(store.listOutputs({ owners: new Set([ALICE]) })).toHaveLength(2);
    expect(store.listOutputs({ kinds: new Set(["coin"]) })).toHaveLength(2);
    expect(store.listKitties(ALICE).map((k) => k.payload.kitty.name)).toEqual(["kitty"]);
  });

  it("sums balances per owner", () => {
    store.applyChanges({
      insert: [
        coin(ref("1"), ALICE, 40n),
        coin(ref("2"), ALICE, 60n),
        coin(ref("3"), BOB, 9n),
        kitty(ref("4"), BOB, "kitty"),
      ],
    });

    const balances = store.balances();
    expect(balances.get(ALICE)).toBe(100n);
    expect(balances.get(BOB)).toBe(9n);
    expect(store.balances(new Set([BOB])).has(ALICE)).toBe(false);
  });

  it("ignores removal of unknown references", () => {
    const result = store.applyChanges({ remove: [ref("9")] });
    expect(result.count).toBe(0);
  });
});

// =============================================================================
// Name index
// =============================================================================

describe("name index", () => {
  it("finds kitties by owner and name", () => {
    store.applyChanges({
      insert: [kitty(ref("1"), ALICE, "tom"), kitty(ref("2"), BOB, "tom")],
    });

    expect(store.findKittiesByName(ALICE, "tom").map((k) => k.ref)).toEqual([ref("1")]);
    expect(store.findKittiesByName(ALICE, "tim")).toEqual([]);
  });

  it("drops the entry when the kitty is removed", () => {
    store.applyChanges({ insert: [kitty(ref("1"), ALICE, "tom")] });
    store.applyChanges({ remove: [ref("1")] });

    expect(store.findKittiesByName(ALICE, "tom")).toEqual([]);
    expect(kv.entries("kitty-name/")).toEqual([]);
  });

  it("moves the entry when a kitty is replaced in one change", () => {
    store.applyChanges({ insert: [kitty(ref("1"), ALICE, "tom")] });
    store.applyChanges({
      remove: [ref("1")],
      insert: [kitty(ref("2"), ALICE, "tom")],
    });

    expect(store.findKittiesByName(ALICE, "tom").map((k) => k.ref)).toEqual([ref("2")]);
  });

  it("escapes names with separators", () => {
    store.applyChanges({ insert: [kitty(ref("1"), ALICE, "a/b c")] });
    expect(store.findKittiesByName(ALICE, "a/b c")).toHaveLength(1);
    expect(store.findKittiesByName(ALICE, "a")).toEqual([]);
  });
});

// =============================================================================
// Watermark & blocks
// =============================================================================

describe("watermark and block records", () => {
  it("commits outputs, block record and watermark as one batch", () => {
    const result = store.applyChanges({
      insert: [coin(ref("1"), ALICE, 1n)],
      putBlocks: [{ height: 1, hash: "e".repeat(64), created: [ref("1")], spent: [] }],
      watermark: { height: 1, hash: "e".repeat(64) },
    });

    expect(result.sequence).toBe(1);
    expect(store.getWatermark()).toEqual({ height: 1, hash: "e".repeat(64) });
    expect(store.getBlockRecord(1)).toEqual({
      height: 1,
      hash: "e".repeat(64),
      created: [ref("1")],
      spent: [],
    });
  });

  it("keeps spent outputs in block records", () => {
    const spent = coin(ref("1"), ALICE, 12n);
    store.applyChanges({
      putBlocks: [{ height: 2, hash: "f".repeat(64), created: [], spent: [spent] }],
    });
    expect(store.getBlockRecord(2)?.spent).toEqual([spent]);
  });

  it("orders block heights numerically", () => {
    store.applyChanges({
      putBlocks: [10, 2, 1].map((height) => ({
        height,
        hash: "c".repeat(64),
        created: [],
        spent: [],
      })),
    });
    expect(store.blockHeights()).toEqual([1, 2, 10]);

    store.applyChanges({ dropBlocks: [2] });
    expect(store.blockHeights()).toEqual([1, 10]);
  });

  it("clears the watermark with null", () => {
    store.applyChanges({ watermark: { height: 0, hash: "0".repeat(64) } });
    store.applyChanges({ watermark: null });
    expect(store.getWatermark()).toBeUndefined();
  });
});

// =============================================================================
// Corruption
// =============================================================================

describe("corruption", () => {
  it("reports an unreadable output record", () => {
    kv.batch([{ type: "put", key: `output/${"1".repeat(64)}00000000`, value: { owner: 5 } }]);

    try {
      store.listOutputs();
      expect.unreachable("listing should fail");
    } catch (err) {
      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({ code: "STORE_CORRUPTED" });
    }
  });

  it("rejects a coin value above u128", () => {
    kv.batch([
      {
        type: "put",
        key: `output/${"1".repeat(64)}00000000`,
        value: {
          ref: { txHash: "1".repeat(64), index: 0 },
          owner: ALICE,
          payload: { kind: "coin", value: (1n << 128n).toString() },
        },
      },
    ]);

    expect(() => store.getOutput(ref("1"))).toThrow(/value exceeds u128/);
  });
});
