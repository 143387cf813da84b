/**
 * @kitty-wallet/kitties — Kitty names.
 *
 * A name is 1 to 32 printable characters and unique among the owner's
 * live kitties. Plain and tradable kitties share one namespace.
 */

import type { OutputRef, PublicKey } from "@kitty-wallet/types";
import { outputRefsEqual } from "@kitty-wallet/types";
import type { KittyLookup } from "./types.js";
import { KittyError, MAX_NAME_LENGTH } from "./types.js";

const CONTROL_CHARACTERS = /\p{Cc}/u;

/**
 * @throws KittyError INVALID_NAME
 */
export function validateKittyName(name: string): void {
  const length = [...name].length;
  if (length === 0 || length > MAX_NAME_LENGTH) {
    throw new KittyError(
      "INVALID_NAME",
      `Kitty name must be 1 to ${MAX_NAME_LENGTH} characters, got ${length}`,
    );
  }
  if (CONTROL_CHARACTERS.test(name) || name.trim() !== name) {
    throw new KittyError(
      "INVALID_NAME",
      `Kitty name "${name}" contains control characters or surrounding whitespace`,
    );
  }
}

/**
 * Fail if the owner already has a live kitty with this name, other than
 * the one at `except` (the kitty being renamed).
 *
 * @throws KittyError NAME_COLLISION
 */
export function assertNameAvailable(
  lookup: KittyLookup,
  owner: PublicKey,
  name: string,
  except?: OutputRef,
): void {
  const clash = lookup(owner, name).find(
    (kitty) => except === undefined || !outputRefsEqual(kitty.ref, except),
  );
  if (clash !== undefined) {
    throw new KittyError(
      "NAME_COLLISION",
      `Owner ${owner} already has a live kitty named "${name}"`,
    );
  }
}
