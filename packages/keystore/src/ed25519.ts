/**
 * @kitty-wallet/keystore — ed25519 primitives over node:crypto.
 *
 * Keys travel as raw bytes: a 32-byte seed for the private half and a
 * 32-byte public key. node:crypto only takes DER, so the fixed PKCS#8 and
 * SPKI prefixes for ed25519 are prepended here.
 */

import {
  createPrivateKey,
  createPublicKey,
  sign,
  verify,
} from "node:crypto";
import type { KeyObject } from "node:crypto";
import type { PublicKey } from "@kitty-wallet/types";

const PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");
const SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

export const SEED_LENGTH = 32;

export function privateKeyFromSeed(seed: Uint8Array): KeyObject {
  return createPrivateKey({
    key: Buffer.concat([PKCS8_PREFIX, seed]),
    format: "der",
    type: "pkcs8",
  });
}

export function publicKeyOf(privateKey: KeyObject): PublicKey {
  const spki = createPublicKey(privateKey).export({ format: "der", type: "spki" });
  return spki.subarray(SPKI_PREFIX.length).toString("hex");
}

export function signPayload(privateKey: KeyObject, payload: Uint8Array): string {
  return sign(null, payload, privateKey).toString("hex");
}

/**
 * Check an ed25519 signature. Malformed keys or signatures verify as false.
 */
export function verifySignature(
  publicKey: PublicKey,
  payload: Uint8Array,
  signature: string,
): boolean {
  if (!/^[0-9a-f]{64}$/.test(publicKey) || !/^[0-9a-f]{128}$/.test(signature)) {
    return false;
  }
  const key = createPublicKey({
    key: Buffer.concat([SPKI_PREFIX, Buffer.from(publicKey, "hex")]),
    format: "der",
    type: "spki",
  });
  return verify(null, payload, key, Buffer.from(signature, "hex"));
}
