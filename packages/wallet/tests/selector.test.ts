/**
 * Tests for InputSelector.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { InMemoryKeyValueStore, LedgerStore } from "@kitty-wallet/store";
import type { Output } from "@kitty-wallet/types";
import { compareOutputRefs } from "@kitty-wallet/types";
import { WalletError } from "../src/errors.js";
import { InputSelector } from "../src/selector.js";
import { coin, ref } from "./helpers.js";

const ALICE = "a1".repeat(32);
const BOB = "b2".repeat(32);

let store: LedgerStore;
let selector: InputSelector;

beforeEach(() => {
  store = new LedgerStore(new InMemoryKeyValueStore());
  selector = new InputSelector(store);
});

function expectWalletError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(WalletError);
    expect(err).toMatchObject({ code });
  }
}

describe("selectCoins", () => {
  it("takes coins in ascending reference order until covered", () => {
    store.applyChanges({
      insert: [coin(ref("3"), ALICE, 50n), coin(ref("1"), ALICE, 30n), coin(ref("2"), ALICE, 30n)],
    });

    const selection = selector.selectCoins(new Set([ALICE]), 55n);
    expect(selection.inputs.map((c) => c.ref)).toEqual([ref("1"), ref("2")]);
    expect(selection.total).toBe(60n);
  });

  it("only considers permitted owners", () => {
    store.applyChanges({ insert: [coin(ref("1"), BOB, 500n), coin(ref("2"), ALICE, 10n)] });

    expectWalletError(() => selector.selectCoins(new Set([ALICE]), 20n), "INSUFFICIENT_FUNDS");
    expect(selector.selectCoins(new Set([ALICE, BOB]), 20n).inputs).toHaveLength(1);
  });

  it("ignores kitties", () => {
    store.applyChanges({
      insert: [
        {
          ref: ref("1"),
          owner: ALICE,
          payload: {
            kind: "kitty",
            kitty: { name: "tom", gender: "male", dna: "d".repeat(64), numBreedings: 0, freeBreedings: 2 },
          },
        },
      ],
    });
    expectWalletError(() => selector.selectCoins(new Set([ALICE]), 1n), "INSUFFICIENT_FUNDS");
  });

  it("selects nothing for a zero target", () => {
    expect(selector.selectCoins(new Set([ALICE]), 0n)).toEqual({ inputs: [], total: 0n });
  });

  it("is deterministic and picks the shortest ascending prefix", () => {
    fc.assert(
      fc.property(
        fc.array(fc.bigInt({ min: 1n, max: 1000n }), { minLength: 1, maxLength: 20 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (values, fraction) => {
          const kv = new InMemoryKeyValueStore();
          const local = new LedgerStore(kv);
          const outputs: Output[] = values.map((value, i) =>
            coin({ txHash: (values.length - i).toString(16).padStart(64, "0"), index: 0 }, ALICE, value),
          );
          local.applyChanges({ insert: outputs });

          const sum = values.reduce((a, b) => a + b, 0n);
          const target = 1n + BigInt(Math.floor(Number(sum - 1n) * fraction));
          const pick = new InputSelector(local);

          const first = pick.selectCoins(new Set([ALICE]), target);
          const second = pick.selectCoins(new Set([ALICE]), target);
          expect(second).toEqual(first);

          const sorted = [...outputs].sort((a, b) => compareOutputRefs(a.ref, b.ref));
          expect(first.inputs.map((c) => c.ref)).toEqual(
            sorted.slice(0, first.inputs.length).map((c) => c.ref),
          );
          expect(first.total >= target).toBe(true);
          const withoutLast = first.total - (first.inputs[first.inputs.length - 1]?.payload.value ?? 0n);
          expect(withoutLast < target).toBe(true);
        },
      ),
    );
  });
});

describe("resolve", () => {
  it("returns explicitly named outputs", () => {
    store.applyChanges({ insert: [coin(ref("1"), ALICE, 100n)] });
    expect(selector.resolveCoins([ref("1")])).toEqual({
      inputs: [coin(ref("1"), ALICE, 100n)],
      total: 100n,
    });
  });

  it("fails for a reference not held locally", () => {
    expectWalletError(() => selector.resolve([ref("9")]), "NOT_FOUND");
  });

  it("refuses a kitty where coins are required", () => {
    store.applyChanges({
      insert: [
        {
          ref: ref("1"),
          owner: ALICE,
          payload: {
            kind: "kitty",
            kitty: { name: "tom", gender: "male", dna: "d".repeat(64), numBreedings: 0, freeBreedings: 2 },
          },
        },
      ],
    });
    expectWalletError(() => selector.resolveCoins([ref("1")]), "INVALID_REQUEST");
  });
});

describe("kittyByName", () => {
  it("fails when the owner has no such kitty", () => {
    expectWalletError(() => selector.kittyByName(ALICE, "kity"), "NOT_FOUND");
  });
});
