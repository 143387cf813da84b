/**
 * Primitive codecs
 *
 * Text forms for references and keys, u128 bounds, and the JSON shape of
 * outputs (bigints rendered as decimal strings) shared by persistence and
 * transaction encoding.
 */

import type {
  Hash256,
  NewOutput,
  Output,
  OutputPayload,
  OutputRef,
  PublicKey,
} from "./output.js";

// =============================================================================
// Hex & u128
// =============================================================================

const HASH_PATTERN = /^[0-9a-f]{64}$/;

export const U128_MAX = (1n << 128n) - 1n;
export const U32_MAX = 0xffff_ffff;

/**
 * Normalize a 256-bit hex value: strips an optional 0x prefix and lowercases.
 * Returns undefined when the input is not exactly 32 bytes of hex.
 */
export function normalizeHash256(value: string): Hash256 | undefined {
  const stripped = value.startsWith("0x") || value.startsWith("0X")
    ? value.slice(2)
    : value;
  const lower = stripped.toLowerCase();
  return HASH_PATTERN.test(lower) ? lower : undefined;
}

export function isHash256(value: unknown): value is Hash256 {
  return typeof value === "string" && HASH_PATTERN.test(value);
}

export function isPublicKey(value: unknown): value is PublicKey {
  return isHash256(value);
}

export function isU128(value: bigint): boolean {
  return value >= 0n && value <= U128_MAX;
}

// =============================================================================
// OutputRef
// =============================================================================

/**
 * Encode an OutputRef as 72 hex characters: the transaction hash followed
 * by the index as a 4-byte little-endian integer.
 */
export function outputRefToString(ref: OutputRef): string {
  const index = Buffer.alloc(4);
  index.writeUInt32LE(ref.index, 0);
  return ref.txHash + index.toString("hex");
}

/**
 * Parse the 72-hex-character form produced by outputRefToString.
 * An optional 0x prefix is accepted.
 *
 * @throws Error if the text is not a well-formed reference
 */
export function parseOutputRef(text: string): OutputRef {
  const stripped = text.startsWith("0x") ? text.slice(2) : text;
  const lower = stripped.toLowerCase();
  if (!/^[0-9a-f]{72}$/.test(lower)) {
    throw new Error(
      `Invalid output reference "${text}": expected 72 hex characters`,
    );
  }
  const index = Buffer.from(lower.slice(64), "hex").readUInt32LE(0);
  return { txHash: lower.slice(0, 64), index };
}

export function outputRefsEqual(a: OutputRef, b: OutputRef): boolean {
  return a.txHash === b.txHash && a.index === b.index;
}

/**
 * Total order over references: ascending by transaction hash, then index.
 */
export function compareOutputRefs(a: OutputRef, b: OutputRef): number {
  if (a.txHash !== b.txHash) {
    return a.txHash < b.txHash ? -1 : 1;
  }
  return a.index - b.index;
}

export function isOutputRef(value: unknown): value is OutputRef {
  if (value === null || typeof value !== "object") return false;
  return (
    "txHash" in value &&
    isHash256(value.txHash) &&
    "index" in value &&
    typeof value.index === "number" &&
    Number.isInteger(value.index) &&
    value.index >= 0 &&
    value.index <= U32_MAX
  );
}

// =============================================================================
// JSON shapes
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * JSON form of an output payload; bigints become decimal strings.
 */
export function payloadToJson(payload: OutputPayload): JsonValue {
  switch (payload.kind) {
    case "coin":
      return { kind: "coin", value: payload.value.toString() };
    case "kitty":
      return { kind: "kitty", kitty: { ...payload.kitty } };
    case "tradable-kitty":
      return {
        kind: "tradable-kitty",
        kitty: { ...payload.kitty },
        price: payload.price.toString(),
        isAvailableForSale: payload.isAvailableForSale,
      };
  }
}

export function newOutputToJson(output: NewOutput): JsonValue {
  return { owner: output.owner, payload: payloadToJson(output.payload) };
}

export function outputToJson(output: Output): JsonValue {
  return {
    ref: { txHash: output.ref.txHash, index: output.ref.index },
    owner: output.owner,
    payload: payloadToJson(output.payload),
  };
}
