/**
 * Tests for kitty genetics: minting, breeding and names.
 */

import { describe, it, expect } from "vitest";
import {
  breed,
  childDna,
  defaultChildName,
  genderFromDna,
  mintKitty,
} from "../src/genetics.js";
import { validateKittyName } from "../src/names.js";
import { KittyError } from "../src/types.js";
import {
  ALICE,
  BOB,
  kittyData,
  lookupOf,
  plainKitty,
  ref,
  tradableKitty,
  zeroRandom,
} from "./helpers.js";

function expectKittyError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(KittyError);
    expect(err).toMatchObject({ code });
  }
}

// =============================================================================
// Names
// =============================================================================

describe("validateKittyName", () => {
  it("accepts printable names up to 32 characters", () => {
    expect(() => validateKittyName("tom")).not.toThrow();
    expect(() => validateKittyName("x".repeat(32))).not.toThrow();
    expect(() => validateKittyName("mïsty 🐱")).not.toThrow();
  });

  it.each(["", "x".repeat(33), "tab\tcat", " padded", "new\nline"])(
    "rejects %j",
    (name) => {
      expectKittyError(() => validateKittyName(name), "INVALID_NAME");
    },
  );
});

// =============================================================================
// Mint
// =============================================================================

describe("mintKitty", () => {
  it("derives DNA from the request and the random source", () => {
    const a = mintKitty({ name: "tom", gender: "male", owner: ALICE }, lookupOf([]), zeroRandom);
    const b = mintKitty({ name: "tom", gender: "male", owner: ALICE }, lookupOf([]), zeroRandom);
    const c = mintKitty(
      { name: "tom", gender: "male", owner: ALICE },
      lookupOf([]),
      () => new Uint8Array(32).fill(7),
    );

    expect(a.dna).toMatch(/^[0-9a-f]{64}$/);
    expect(b.dna).toBe(a.dna);
    expect(c.dna).not.toBe(a.dna);
    expect(a).toMatchObject({ name: "tom", gender: "male", numBreedings: 0, freeBreedings: 2 });
  });

  it("refuses a name already live for the owner", () => {
    const live = [plainKitty(ref("1"), ALICE, kittyData("kity", "female"))];
    expectKittyError(
      () => mintKitty({ name: "kity", gender: "male", owner: ALICE }, lookupOf(live), zeroRandom),
      "NAME_COLLISION",
    );
  });

  it("allows the name again once the kitty is no longer live", () => {
    const kitty = mintKitty({ name: "kity", gender: "male", owner: ALICE }, lookupOf([]), zeroRandom);
    expect(kitty.name).toBe("kity");
  });

  it("allows the same name for another owner", () => {
    const live = [plainKitty(ref("1"), BOB, kittyData("kity", "female"))];
    const kitty = mintKitty({ name: "kity", gender: "male", owner: ALICE }, lookupOf(live), zeroRandom);
    expect(kitty.name).toBe("kity");
  });

  it("collides with a tradable kitty of the same name", () => {
    const live = [tradableKitty(ref("1"), ALICE, kittyData("kity", "female"), 10n)];
    expectKittyError(
      () => mintKitty({ name: "kity", gender: "male", owner: ALICE }, lookupOf(live), zeroRandom),
      "NAME_COLLISION",
    );
  });
});

// =============================================================================
// Breed
// =============================================================================

describe("breed", () => {
  const mom = plainKitty(ref("1"), ALICE, kittyData("mom", "female"));
  const dad = plainKitty(ref("2"), ALICE, kittyData("dad", "male"));

  it("derives the child and updates the parents' counters", () => {
    const result = breed({ mom, dad, owner: ALICE, tradable: false }, lookupOf([mom, dad]));
    const dna = childDna(mom.payload.kitty, dad.payload.kitty);

    expect(result.child).toEqual({
      kind: "kitty",
      kitty: {
        name: defaultChildName(dna),
        gender: genderFromDna(dna),
        dna,
        numBreedings: 0,
        freeBreedings: 2,
      },
    });
    expect(result.mom.kitty).toMatchObject({ name: "mom", numBreedings: 1, freeBreedings: 1 });
    expect(result.dad.kitty).toMatchObject({ name: "dad", numBreedings: 1, freeBreedings: 1 });
  });

  it("names the child when asked", () => {
    const result = breed(
      { mom, dad, owner: ALICE, tradable: false, childName: "junior" },
      lookupOf([mom, dad]),
    );
    expect(result.child.kitty.name).toBe("junior");
  });

  it("gives a different child on the next breeding", () => {
    const after = breed({ mom, dad, owner: ALICE, tradable: false }, lookupOf([mom, dad]));
    const mom2 = plainKitty(ref("3"), ALICE, after.mom.kitty);
    const dad2 = plainKitty(ref("4"), ALICE, after.dad.kitty);
    const again = breed({ mom: mom2, dad: dad2, owner: ALICE, tradable: false }, lookupOf([mom2, dad2, plainKitty(ref("5"), ALICE, after.child.kitty)]));

    expect(again.child.kitty.dna).not.toBe(after.child.kitty.dna);
  });

  it("rejects two females", () => {
    const other = plainKitty(ref("3"), ALICE, kittyData("sis", "female"));
    expectKittyError(
      () => breed({ mom, dad: other, owner: ALICE, tradable: false }, lookupOf([mom, other])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects swapped genders", () => {
    expectKittyError(
      () => breed({ mom: dad, dad: mom, owner: ALICE, tradable: false }, lookupOf([mom, dad])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects a pair not owned by the caller", () => {
    expectKittyError(
      () => breed({ mom, dad, owner: BOB, tradable: false }, lookupOf([mom, dad])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects parents that are not live", () => {
    expectKittyError(
      () => breed({ mom, dad, owner: ALICE, tradable: false }, lookupOf([mom])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects an exhausted parent", () => {
    const tired = plainKitty(ref("3"), ALICE, kittyData("tired", "male", { numBreedings: 2, freeBreedings: 0 }));
    expectKittyError(
      () => breed({ mom, dad: tired, owner: ALICE, tradable: false }, lookupOf([mom, tired])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects a kitty breeding with itself", () => {
    expectKittyError(
      () => breed({ mom, dad: mom, owner: ALICE, tradable: false }, lookupOf([mom])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("rejects a child name already in use", () => {
    expectKittyError(
      () => breed({ mom, dad, owner: ALICE, tradable: false, childName: "dad" }, lookupOf([mom, dad])),
      "NAME_COLLISION",
    );
  });

  it("requires tradable parents for a tradable breeding", () => {
    expectKittyError(
      () => breed({ mom, dad, owner: ALICE, tradable: true }, lookupOf([mom, dad])),
      "INVALID_BREEDING_PAIR",
    );
  });

  it("breeds tradable parents into an unlisted tradable child", () => {
    const tMom = tradableKitty(ref("1"), ALICE, kittyData("mom", "female"), 50n);
    const tDad = tradableKitty(ref("2"), ALICE, kittyData("dad", "male"), 70n, false);
    const result = breed({ mom: tMom, dad: tDad, owner: ALICE, tradable: true }, lookupOf([tMom, tDad]));

    expect(result.child).toMatchObject({ kind: "tradable-kitty", price: 0n, isAvailableForSale: false });
    expect(result.mom).toMatchObject({ kind: "tradable-kitty", price: 50n, isAvailableForSale: true });
    expect(result.dad).toMatchObject({ kind: "tradable-kitty", price: 70n, isAvailableForSale: false });
  });
});

describe("genderFromDna", () => {
  it("follows the parity of the first byte", () => {
    expect(genderFromDna("00" + "1".repeat(62))).toBe("female");
    expect(genderFromDna("01" + "0".repeat(62))).toBe("male");
    expect(genderFromDna("fe" + "0".repeat(62))).toBe("female");
  });
});
