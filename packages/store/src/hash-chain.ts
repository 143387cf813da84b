/**
 * @kitty-wallet/store — Hash chain over committed batches.
 *
 * Each batch is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous batch's hash, forming a chain:
 *
 *   batch[1].hash = sha256(canonicalize(batch[1]) + "genesis")
 *   batch[n].hash = sha256(canonicalize(batch[n]) + batch[n-1].hash)
 *
 * Any modification to a persisted batch breaks the chain from that point.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BatchOperation } from "./types.js";

/**
 * The hash used as the predecessor of the first batch.
 */
export const GENESIS_HASH = "genesis";

/**
 * Compute the SHA-256 hash of a batch given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeBatchHash(
  sequence: number,
  operations: readonly BatchOperation[],
  previousHash: string,
): string {
  const content = canonicalize({ sequence, operations });
  return createHash("sha256").update(content + previousHash).digest("hex");
}
