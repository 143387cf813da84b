/**
 * @kitty-wallet/kitties — Kitty genetics and marketplace rules.
 *
 * Pure functions: given kitties and a lookup of the owner's live kitties,
 * derive new payloads or fail with a KittyError. Nothing here reads or
 * writes the ledger.
 *
 * @packageDocumentation
 */

export {
  INITIAL_FREE_BREEDINGS,
  MAX_NAME_LENGTH,
  KittyError,
} from "./types.js";
export type {
  AnyKittyPayload,
  KittyErrorCode,
  KittyLookup,
  RandomSource,
} from "./types.js";

export { validateKittyName, assertNameAvailable } from "./names.js";

export {
  defaultRandomSource,
  mintKitty,
  childDna,
  genderFromDna,
  defaultChildName,
  breed,
} from "./genetics.js";
export type { MintKittyRequest, BreedRequest, BreedResult } from "./genetics.js";

export {
  mintTradableKitty,
  changeProperties,
  prepareBuy,
  paymentCovers,
} from "./market.js";
export type {
  MintTradableKittyRequest,
  PropertyChange,
  BuyRequest,
  BuyPlan,
} from "./market.js";
