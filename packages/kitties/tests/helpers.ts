/**
 * Shared fixtures for kitty rule tests.
 */

import type {
  Gender,
  KittyData,
  KittyOutput,
  OutputRef,
  PublicKey,
} from "@kitty-wallet/types";
import type { KittyLookup } from "../src/types.js";

export const ALICE: PublicKey = "a1".repeat(32);
export const BOB: PublicKey = "b2".repeat(32);

export const zeroRandom = (): Uint8Array => new Uint8Array(32);

export function ref(byte: string, index = 0): OutputRef {
  return { txHash: byte.repeat(64), index };
}

export function kittyData(name: string, gender: Gender, overrides: Partial<KittyData> = {}): KittyData {
  return {
    name,
    gender,
    dna: (gender === "female" ? "f" : "e").repeat(64),
    numBreedings: 0,
    freeBreedings: 2,
    ...overrides,
  };
}

export function plainKitty(r: OutputRef, owner: PublicKey, kitty: KittyData): KittyOutput {
  return { ref: r, owner, payload: { kind: "kitty", kitty } };
}

export function tradableKitty(
  r: OutputRef,
  owner: PublicKey,
  kitty: KittyData,
  price: bigint,
  isAvailableForSale = true,
): KittyOutput {
  return {
    ref: r,
    owner,
    payload: { kind: "tradable-kitty", kitty, price, isAvailableForSale },
  };
}

/** Lookup over a fixed set of live kitties. */
export function lookupOf(live: readonly KittyOutput[]): KittyLookup {
  return (owner, name) =>
    live.filter((k) => k.owner === owner && k.payload.kitty.name === name);
}
