/**
 * @kitty-wallet/chain — Transaction encoding.
 *
 * Canonical form is RFC 8785 JSON with bigints as decimal strings.
 *
 *   signing payload = canonical(tx with every redeemer blanked)
 *   tx hash         = sha256(canonical(signed tx))
 *
 * Output i of a transaction is referenced as { txHash, index: i }.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  Hash256,
  JsonValue,
  Output,
  OutputRef,
  Transaction,
} from "@kitty-wallet/types";
import { newOutputToJson } from "@kitty-wallet/types";

export function transactionToJson(transaction: Transaction): JsonValue {
  return {
    inputs: transaction.inputs.map((input) => ({
      outputRef: { txHash: input.outputRef.txHash, index: input.outputRef.index },
      redeemer: input.redeemer,
    })),
    outputs: transaction.outputs.map(newOutputToJson),
    checker: transaction.checker,
    ...(transaction.nonce !== undefined ? { nonce: transaction.nonce } : {}),
  };
}

export function toCanonicalJson(transaction: Transaction): string {
  return canonicalize(transactionToJson(transaction));
}

/**
 * Bytes every input owner signs. Redeemers are blanked, so signatures
 * do not cover each other and can be attached in any order.
 */
export function signingPayload(transaction: Transaction): Uint8Array {
  const unsigned: Transaction = {
    ...transaction,
    inputs: transaction.inputs.map((input) => ({ outputRef: input.outputRef, redeemer: "" })),
  };
  return Buffer.from(toCanonicalJson(unsigned), "utf-8");
}

export function transactionHash(transaction: Transaction): Hash256 {
  return createHash("sha256").update(toCanonicalJson(transaction)).digest("hex");
}

export function outputRefsOf(transaction: Transaction): readonly OutputRef[] {
  const txHash = transactionHash(transaction);
  return transaction.outputs.map((_, index) => ({ txHash, index }));
}

/**
 * The outputs of a transaction as they exist once it is on chain.
 */
export function createdOutputs(transaction: Transaction): readonly Output[] {
  const txHash = transactionHash(transaction);
  return transaction.outputs.map((output, index) => ({
    ref: { txHash, index },
    owner: output.owner,
    payload: output.payload,
  }));
}
