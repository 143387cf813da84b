/**
 * Runtime Type Guards
 *
 * Narrowing functions for wallet domain types. Sync and verification
 * check chain responses with isBlock and isOutput; callers branch on
 * payload kind with isCoinOutput and isKittyOutput.
 */

import type {
  CoinOutput,
  Gender,
  KittyData,
  KittyOutput,
  NewOutput,
  Output,
  OutputKind,
  OutputPayload,
} from "./output.js";
import type {
  Block,
  BlockHeader,
  CheckerKind,
  Transaction,
  TransactionInput,
} from "./transaction.js";
import { isHash256, isOutputRef, isPublicKey } from "./codec.js";

const OUTPUT_KINDS = new Set<string>(["coin", "kitty", "tradable-kitty"]);

const CHECKER_KINDS = new Set<string>([
  "mint-coins",
  "spend-coins",
  "mint-kitty",
  "mint-tradable-kitty",
  "breed-kitty",
  "breed-tradable-kitty",
  "set-kitty-property",
  "buy-kitty",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isOutputKind(value: unknown): value is OutputKind {
  return typeof value === "string" && OUTPUT_KINDS.has(value);
}

export function isGender(value: unknown): value is Gender {
  return value === "male" || value === "female";
}

export function isKittyData(value: unknown): value is KittyData {
  if (!isRecord(value)) return false;
  return (
    typeof value.name === "string" &&
    isGender(value.gender) &&
    isHash256(value.dna) &&
    typeof value.numBreedings === "number" &&
    Number.isInteger(value.numBreedings) &&
    value.numBreedings >= 0 &&
    typeof value.freeBreedings === "number" &&
    Number.isInteger(value.freeBreedings) &&
    value.freeBreedings >= 0
  );
}

export function isOutputPayload(value: unknown): value is OutputPayload {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case "coin":
      return typeof value.value === "bigint" && value.value >= 0n;
    case "kitty":
      return isKittyData(value.kitty);
    case "tradable-kitty":
      return (
        isKittyData(value.kitty) &&
        typeof value.price === "bigint" &&
        value.price >= 0n &&
        typeof value.isAvailableForSale === "boolean"
      );
    default:
      return false;
  }
}

export function isNewOutput(value: unknown): value is NewOutput {
  if (!isRecord(value)) return false;
  return isPublicKey(value.owner) && isOutputPayload(value.payload);
}

export function isOutput(value: unknown): value is Output {
  if (!isRecord(value)) return false;
  return isOutputRef(value.ref) && isNewOutput(value);
}

export function isCheckerKind(value: unknown): value is CheckerKind {
  return typeof value === "string" && CHECKER_KINDS.has(value);
}

function isTransactionInput(value: unknown): value is TransactionInput {
  if (!isRecord(value)) return false;
  return isOutputRef(value.outputRef) && typeof value.redeemer === "string";
}

export function isTransaction(value: unknown): value is Transaction {
  if (!isRecord(value)) return false;
  return (
    Array.isArray(value.inputs) &&
    value.inputs.every(isTransactionInput) &&
    Array.isArray(value.outputs) &&
    value.outputs.every(isNewOutput) &&
    isCheckerKind(value.checker) &&
    (value.nonce === undefined || isHash256(value.nonce))
  );
}

export function isBlockHeader(value: unknown): value is BlockHeader {
  if (!isRecord(value)) return false;
  return (
    typeof value.height === "number" &&
    Number.isInteger(value.height) &&
    value.height >= 0 &&
    isHash256(value.hash) &&
    isHash256(value.parentHash) &&
    typeof value.timestamp === "number"
  );
}

export function isBlock(value: unknown): value is Block {
  if (!isRecord(value)) return false;
  return (
    isBlockHeader(value.header) &&
    Array.isArray(value.transactions) &&
    value.transactions.every(isTransaction)
  );
}

export function isCoinOutput(output: Output): output is CoinOutput {
  return output.payload.kind === "coin";
}

/**
 * True for both plain and tradable kitties.
 */
export function isKittyOutput(output: Output): output is KittyOutput {
  return (
    output.payload.kind === "kitty" || output.payload.kind === "tradable-kitty"
  );
}
