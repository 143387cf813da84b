/**
 * @kitty-wallet/wallet — Verifier.
 *
 * Looks up one output reference on the chain and in the Local Ledger
 * Store independently and reports where they disagree. Read-only.
 */

import { canonicalize } from "json-canonicalize";
import type { ChainClient } from "@kitty-wallet/chain";
import { ChainError } from "@kitty-wallet/chain";
import type { LedgerStore } from "@kitty-wallet/store";
import type { Output, OutputKind, OutputRef } from "@kitty-wallet/types";
import {
  isOutput,
  outputRefToString,
  outputRefsEqual,
  payloadToJson,
} from "@kitty-wallet/types";

export interface VerificationReport {
  readonly ref: OutputRef;
  /** Unspent on chain */
  readonly inChain: boolean;
  readonly inLocalStore: boolean;
  readonly chainOutput: Output | undefined;
  readonly localOutput: Output | undefined;
  /** Human-readable differences; empty when both sides agree */
  readonly mismatches: readonly string[];
}

function samePayload(a: Output, b: Output): boolean {
  return canonicalize(payloadToJson(a.payload)) === canonicalize(payloadToJson(b.payload));
}

/**
 * @throws ChainError MALFORMED_RESPONSE unless the chain sent an output
 *   for the reference that was asked about, or nothing
 */
function checkedChainOutput(ref: OutputRef, received: unknown): Output | undefined {
  if (received === undefined) {
    return undefined;
  }
  if (!isOutput(received) || !outputRefsEqual(received.ref, ref)) {
    throw new ChainError(
      "MALFORMED_RESPONSE",
      `Chain returned a malformed output for ${outputRefToString(ref)}`,
    );
  }
  return received;
}

export class Verifier {
  constructor(
    private readonly store: LedgerStore,
    private readonly chain: ChainClient,
  ) {}

  /**
   * @param expectedKind When given, a side holding another kind of output
   *   is reported as a mismatch
   * @throws ChainError when the chain cannot be queried or answers with a
   *   malformed output
   */
  async verify(ref: OutputRef, expectedKind?: OutputKind): Promise<VerificationReport> {
    const chainOutput = checkedChainOutput(ref, await this.chain.getOutput(ref));
    const localOutput = this.store.getOutput(ref);
    const mismatches: string[] = [];

    if (chainOutput === undefined && localOutput !== undefined) {
      mismatches.push("present in local store but not unspent on chain");
    }
    if (chainOutput !== undefined && localOutput === undefined) {
      mismatches.push("unspent on chain but missing from local store");
    }
    if (chainOutput !== undefined && localOutput !== undefined) {
      if (chainOutput.owner !== localOutput.owner) {
        mismatches.push(`owner differs: chain ${chainOutput.owner}, local ${localOutput.owner}`);
      }
      if (!samePayload(chainOutput, localOutput)) {
        mismatches.push("payload differs between chain and local store");
      }
    }
    if (expectedKind !== undefined) {
      for (const [side, output] of [
        ["chain", chainOutput],
        ["local", localOutput],
      ] as const) {
        if (output !== undefined && output.payload.kind !== expectedKind) {
          mismatches.push(`${side} output is a ${output.payload.kind}, expected ${expectedKind}`);
        }
      }
    }

    return {
      ref,
      inChain: chainOutput !== undefined,
      inLocalStore: localOutput !== undefined,
      chainOutput,
      localOutput,
      mismatches,
    };
  }
}
