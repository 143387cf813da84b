/**
 * @kitty-wallet/store — Persisted record shapes.
 *
 * Values in the key-value store are JSON. Outputs carry u128 amounts, so
 * they are written with bigints as decimal strings and validated with zod
 * on the way back in. A record that fails validation is corruption.
 */

import { z } from "zod";
import type {
  JsonValue,
  Output,
  OutputPayload,
  OutputRef,
  SyncWatermark,
} from "@kitty-wallet/types";
import { outputRefToString, outputToJson, U128_MAX } from "@kitty-wallet/types";
import { StoreError } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

const Hash256Schema = z.string().regex(/^[0-9a-f]{64}$/);

const U128Schema = z
  .string()
  .regex(/^\d{1,39}$/)
  .transform((text) => BigInt(text))
  .refine((value) => value <= U128_MAX, "value exceeds u128");

export const OutputRefSchema = z.object({
  txHash: Hash256Schema,
  index: z.number().int().min(0).max(0xffff_ffff),
});

const KittyDataSchema = z.object({
  name: z.string().min(1),
  gender: z.enum(["male", "female"]),
  dna: Hash256Schema,
  numBreedings: z.number().int().min(0),
  freeBreedings: z.number().int().min(0),
});

const PayloadSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("coin"), value: U128Schema }),
  z.object({ kind: z.literal("kitty"), kitty: KittyDataSchema }),
  z.object({
    kind: z.literal("tradable-kitty"),
    kitty: KittyDataSchema,
    price: U128Schema,
    isAvailableForSale: z.boolean(),
  }),
]);

export const OutputRecordSchema = z.object({
  ref: OutputRefSchema,
  owner: Hash256Schema,
  payload: PayloadSchema,
});

export const WatermarkSchema = z.object({
  height: z.number().int().min(0),
  hash: Hash256Schema,
});

export const BlockRecordSchema = z.object({
  height: z.number().int().min(0),
  hash: Hash256Schema,
  created: z.array(OutputRefSchema),
  spent: z.array(OutputRecordSchema),
});

export const NameIndexSchema = z.array(OutputRefSchema);

// =============================================================================
// Record types
// =============================================================================

/**
 * Per-block undo data: what a block changed in the local store.
 * Rolling a block back deletes `created` and restores `spent`.
 */
export interface BlockRecord {
  readonly height: number;
  readonly hash: string;
  readonly created: readonly OutputRef[];
  readonly spent: readonly Output[];
}

// =============================================================================
// Keys
// =============================================================================

export const OUTPUT_PREFIX = "output/";
export const NAME_INDEX_PREFIX = "kitty-name/";
export const BLOCK_PREFIX = "block/";
export const WATERMARK_KEY = "meta/watermark";

export function outputKey(ref: OutputRef): string {
  return OUTPUT_PREFIX + outputRefToString(ref);
}

export function nameIndexPrefix(owner: string): string {
  return `${NAME_INDEX_PREFIX}${owner}/`;
}

export function nameIndexKey(owner: string, name: string): string {
  return nameIndexPrefix(owner) + encodeURIComponent(name);
}

/** Heights are zero-padded so key order matches numeric order. */
export function blockKey(height: number): string {
  return BLOCK_PREFIX + String(height).padStart(10, "0");
}

// =============================================================================
// Encode / decode
// =============================================================================

export function encodeOutput(output: Output): JsonValue {
  return outputToJson(output);
}

export function encodeBlockRecord(record: BlockRecord): JsonValue {
  return {
    height: record.height,
    hash: record.hash,
    created: record.created.map((ref) => ({ txHash: ref.txHash, index: ref.index })),
    spent: record.spent.map((output) => outputToJson(output)),
  };
}

export function encodeRefs(refs: readonly OutputRef[]): JsonValue {
  return refs.map((ref) => ({ txHash: ref.txHash, index: ref.index }));
}

function parseOrCorrupt<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: JsonValue,
  key: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new StoreError(
      "STORE_CORRUPTED",
      `Unreadable record "${key}"${where}: ${issue?.message ?? "invalid"}`,
      key,
    );
  }
  return result.data;
}

export function decodeOutput(value: JsonValue, key: string): Output {
  const record = parseOrCorrupt(OutputRecordSchema, value, key);
  return { ref: record.ref, owner: record.owner, payload: toPayload(record.payload) };
}

export function decodeWatermark(value: JsonValue, key: string): SyncWatermark {
  return parseOrCorrupt(WatermarkSchema, value, key);
}

export function decodeBlockRecord(value: JsonValue, key: string): BlockRecord {
  const record = parseOrCorrupt(BlockRecordSchema, value, key);
  return {
    height: record.height,
    hash: record.hash,
    created: record.created,
    spent: record.spent.map((output) => ({
      ref: output.ref,
      owner: output.owner,
      payload: toPayload(output.payload),
    })),
  };
}

export function decodeRefs(value: JsonValue, key: string): readonly OutputRef[] {
  return parseOrCorrupt(NameIndexSchema, value, key);
}

function toPayload(payload: z.infer<typeof PayloadSchema>): OutputPayload {
  switch (payload.kind) {
    case "coin":
      return { kind: "coin", value: payload.value };
    case "kitty":
      return { kind: "kitty", kitty: payload.kitty };
    case "tradable-kitty":
      return {
        kind: "tradable-kitty",
        kitty: payload.kitty,
        price: payload.price,
        isAvailableForSale: payload.isAvailableForSale,
      };
  }
}
