/**
 * @kitty-wallet/kitties — Marketplace rules.
 *
 * Listing, property changes and purchases of tradable kitties. Every
 * function returns new payloads; none touches the ledger.
 */

import type {
  Gender,
  KittyOutput,
  NewOutput,
  PublicKey,
  TradableKittyPayload,
} from "@kitty-wallet/types";
import { isU128 } from "@kitty-wallet/types";
import { mintKitty, defaultRandomSource } from "./genetics.js";
import { assertNameAvailable, validateKittyName } from "./names.js";
import type { KittyLookup, RandomSource } from "./types.js";
import { KittyError } from "./types.js";

function assertPrice(price: bigint): void {
  if (!isU128(price)) {
    throw new KittyError("INVALID_PRICE", `Price ${price} is not an unsigned 128-bit value`);
  }
}

// =============================================================================
// Mint
// =============================================================================

export interface MintTradableKittyRequest {
  readonly name: string;
  readonly gender: Gender;
  readonly owner: PublicKey;
  readonly price: bigint;
  readonly isAvailableForSale?: boolean;
}

/**
 * @throws KittyError INVALID_NAME | INVALID_PRICE | NAME_COLLISION
 */
export function mintTradableKitty(
  request: MintTradableKittyRequest,
  lookup: KittyLookup,
  random: RandomSource = defaultRandomSource,
): TradableKittyPayload {
  assertPrice(request.price);
  const kitty = mintKitty(request, lookup, random);
  return {
    kind: "tradable-kitty",
    kitty,
    price: request.price,
    isAvailableForSale: request.isAvailableForSale ?? true,
  };
}

// =============================================================================
// Property change
// =============================================================================

export interface PropertyChange {
  readonly current: KittyOutput;
  readonly owner: PublicKey;
  /** Defaults to the current name */
  readonly newName?: string;
  /** Defaults to the current price, or 0 for a plain kitty */
  readonly price?: bigint;
  /** Defaults to the current availability, or true for a plain kitty */
  readonly isAvailableForSale?: boolean;
}

/**
 * Derive the payload that replaces a kitty after a property change.
 * A plain kitty comes back tradable, which lists it on the market.
 * DNA and breeding counters are carried over unchanged.
 *
 * @throws KittyError NOT_OWNER | INVALID_NAME | INVALID_PRICE | NAME_COLLISION
 */
export function changeProperties(
  change: PropertyChange,
  lookup: KittyLookup,
): TradableKittyPayload {
  const { current, owner } = change;
  if (current.owner !== owner) {
    throw new KittyError(
      "NOT_OWNER",
      `Kitty "${current.payload.kitty.name}" is not owned by ${owner}`,
    );
  }

  const currentPayload = current.payload;
  const name = change.newName ?? currentPayload.kitty.name;
  validateKittyName(name);
  assertNameAvailable(lookup, owner, name, current.ref);

  const listed = currentPayload.kind === "tradable-kitty" ? currentPayload : undefined;
  const price = change.price ?? listed?.price ?? 0n;
  assertPrice(price);

  return {
    kind: "tradable-kitty",
    kitty: { ...currentPayload.kitty, name },
    price,
    isAvailableForSale: change.isAvailableForSale ?? listed?.isAvailableForSale ?? true,
  };
}

// =============================================================================
// Buy
// =============================================================================

export interface BuyRequest {
  readonly kitty: KittyOutput;
  readonly buyer: PublicKey;
  /** Price the buyer agreed to; a different listed price is refused */
  readonly expectedPrice?: bigint;
}

export interface BuyPlan {
  /** The kitty as it will be owned by the buyer */
  readonly kittyOutput: NewOutput;
  /** Coins created for the seller */
  readonly paymentOutputs: readonly NewOutput[];
  readonly price: bigint;
}

/**
 * Validate a purchase against the listing as currently known and lay out
 * its outputs. The transferred kitty is taken off the market.
 *
 * @throws KittyError NOT_AVAILABLE_FOR_SALE | PRICE_CHANGED | NAME_COLLISION
 */
export function prepareBuy(request: BuyRequest, lookup: KittyLookup): BuyPlan {
  const { kitty, buyer } = request;
  const payload = kitty.payload;
  if (payload.kind !== "tradable-kitty" || !payload.isAvailableForSale) {
    throw new KittyError(
      "NOT_AVAILABLE_FOR_SALE",
      `Kitty "${payload.kitty.name}" is not available for sale`,
    );
  }
  if (request.expectedPrice !== undefined && request.expectedPrice !== payload.price) {
    throw new KittyError(
      "PRICE_CHANGED",
      `Kitty "${payload.kitty.name}" is listed at ${payload.price}, expected ${request.expectedPrice}`,
    );
  }
  assertNameAvailable(lookup, buyer, payload.kitty.name);

  return {
    kittyOutput: {
      owner: buyer,
      payload: { ...payload, isAvailableForSale: false },
    },
    paymentOutputs:
      payload.price > 0n
        ? [{ owner: kitty.owner, payload: { kind: "coin", value: payload.price } }]
        : [],
    price: payload.price,
  };
}

/**
 * Whether coins worth `paymentTotal` reach the plan's price. This is a
 * soft check: the ledger, not the wallet, refuses underpayment.
 */
export function paymentCovers(plan: BuyPlan, paymentTotal: bigint): boolean {
  return paymentTotal >= plan.price;
}
