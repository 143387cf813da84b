/**
 * @kitty-wallet/kitties — Kitty genetics.
 *
 * Pure derivation of genetic codes:
 *
 *   mint:   dna = sha256(canonicalize({ name, gender, owner, entropy }))
 *   breed:  dna = sha256(canonicalize({ momDna, dadDna, momBreedings, dadBreedings }))
 *
 * A child's gender follows the parity of its first DNA byte (even is
 * female). Breeding consumes one free breeding from each parent.
 */

import { createHash, randomBytes } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  Gender,
  KittyData,
  KittyOutput,
  PublicKey,
} from "@kitty-wallet/types";
import { outputRefsEqual } from "@kitty-wallet/types";
import { assertNameAvailable, validateKittyName } from "./names.js";
import type { AnyKittyPayload, KittyLookup, RandomSource } from "./types.js";
import { INITIAL_FREE_BREEDINGS, KittyError } from "./types.js";

export const defaultRandomSource: RandomSource = () => randomBytes(32);

function sha256Hex(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

// =============================================================================
// Mint
// =============================================================================

export interface MintKittyRequest {
  readonly name: string;
  readonly gender: Gender;
  readonly owner: PublicKey;
}

/**
 * Create a new kitty for an owner.
 *
 * @throws KittyError INVALID_NAME | NAME_COLLISION
 */
export function mintKitty(
  request: MintKittyRequest,
  lookup: KittyLookup,
  random: RandomSource = defaultRandomSource,
): KittyData {
  validateKittyName(request.name);
  assertNameAvailable(lookup, request.owner, request.name);

  const entropy = Buffer.from(random()).toString("hex");
  const dna = sha256Hex(
    canonicalize({
      name: request.name,
      gender: request.gender,
      owner: request.owner,
      entropy,
    }),
  );

  return {
    name: request.name,
    gender: request.gender,
    dna,
    numBreedings: 0,
    freeBreedings: INITIAL_FREE_BREEDINGS,
  };
}

// =============================================================================
// Breed
// =============================================================================

/**
 * Genetic code of the offspring of two parents, as they are before
 * breeding. Breeding the same pair again yields a different child.
 */
export function childDna(mom: KittyData, dad: KittyData): string {
  return sha256Hex(
    canonicalize({
      momDna: mom.dna,
      dadDna: dad.dna,
      momBreedings: mom.numBreedings,
      dadBreedings: dad.numBreedings,
    }),
  );
}

export function genderFromDna(dna: string): Gender {
  return Number.parseInt(dna.slice(0, 2), 16) % 2 === 0 ? "female" : "male";
}

export function defaultChildName(dna: string): string {
  return `kitty-${dna.slice(0, 8)}`;
}

export interface BreedRequest {
  readonly mom: KittyOutput;
  readonly dad: KittyOutput;
  /** Key requesting the breeding; must own both parents */
  readonly owner: PublicKey;
  readonly childName?: string;
  /** Breed tradable parents into a tradable child */
  readonly tradable: boolean;
}

export interface BreedResult {
  readonly mom: AnyKittyPayload;
  readonly dad: AnyKittyPayload;
  readonly child: AnyKittyPayload;
}

function invalidPair(reason: string): KittyError {
  return new KittyError("INVALID_BREEDING_PAIR", `Cannot breed: ${reason}`);
}

function isLive(lookup: KittyLookup, kitty: KittyOutput): boolean {
  return lookup(kitty.owner, kitty.payload.kitty.name).some((live) =>
    outputRefsEqual(live.ref, kitty.ref),
  );
}

function bred(kitty: KittyData): KittyData {
  return {
    ...kitty,
    numBreedings: kitty.numBreedings + 1,
    freeBreedings: kitty.freeBreedings - 1,
  };
}

function withKitty(payload: AnyKittyPayload, kitty: KittyData): AnyKittyPayload {
  return payload.kind === "kitty"
    ? { kind: "kitty", kitty }
    : { ...payload, kitty };
}

/**
 * Validate a breeding pair and derive both updated parents and the child.
 *
 * @throws KittyError INVALID_BREEDING_PAIR | INVALID_NAME | NAME_COLLISION
 */
export function breed(request: BreedRequest, lookup: KittyLookup): BreedResult {
  const { mom, dad, owner } = request;
  const expectedKind = request.tradable ? "tradable-kitty" : "kitty";

  if (outputRefsEqual(mom.ref, dad.ref)) {
    throw invalidPair("a kitty cannot breed with itself");
  }
  if (mom.owner !== owner || dad.owner !== owner) {
    throw invalidPair(`both parents must be owned by ${owner}`);
  }
  if (mom.payload.kind !== expectedKind || dad.payload.kind !== expectedKind) {
    throw invalidPair(`both parents must be of kind ${expectedKind}`);
  }
  if (!isLive(lookup, mom) || !isLive(lookup, dad)) {
    throw invalidPair("both parents must be live");
  }

  const momData = mom.payload.kitty;
  const dadData = dad.payload.kitty;
  if (momData.gender !== "female") {
    throw invalidPair(`mom "${momData.name}" is not female`);
  }
  if (dadData.gender !== "male") {
    throw invalidPair(`dad "${dadData.name}" is not male`);
  }
  if (momData.freeBreedings <= 0 || dadData.freeBreedings <= 0) {
    throw invalidPair("a parent has no free breedings left");
  }

  const dna = childDna(momData, dadData);
  const name = request.childName ?? defaultChildName(dna);
  validateKittyName(name);
  assertNameAvailable(lookup, owner, name);

  const child: KittyData = {
    name,
    gender: genderFromDna(dna),
    dna,
    numBreedings: 0,
    freeBreedings: INITIAL_FREE_BREEDINGS,
  };

  return {
    mom: withKitty(mom.payload, bred(momData)),
    dad: withKitty(dad.payload, bred(dadData)),
    child: request.tradable
      ? { kind: "tradable-kitty", kitty: child, price: 0n, isAvailableForSale: false }
      : { kind: "kitty", kitty: child },
  };
}
