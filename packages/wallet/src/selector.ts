/**
 * @kitty-wallet/wallet — Input Selector.
 *
 * Picks unspent outputs from the Local Ledger Store. Coin selection is
 * deterministic: candidate coins are taken in ascending reference order
 * until the target is covered, so the same store and target always give
 * the same inputs.
 */

import type { LedgerStore } from "@kitty-wallet/store";
import type {
  CoinOutput,
  KittyOutput,
  Output,
  OutputRef,
  PublicKey,
} from "@kitty-wallet/types";
import { outputRefToString } from "@kitty-wallet/types";
import { WalletError } from "./errors.js";

export interface CoinSelection {
  /** Chosen coins, ascending by reference */
  readonly inputs: readonly CoinOutput[];
  readonly total: bigint;
}

export class InputSelector {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Accumulate coins owned by any of `owners` until `target` is reached.
   * A zero target selects nothing.
   *
   * @throws WalletError INSUFFICIENT_FUNDS
   */
  selectCoins(owners: ReadonlySet<PublicKey>, target: bigint): CoinSelection {
    const inputs: CoinOutput[] = [];
    let total = 0n;
    if (target <= 0n) {
      return { inputs, total };
    }

    for (const coin of this.store.listCoins(owners)) {
      inputs.push(coin);
      total += coin.payload.value;
      if (total >= target) {
        return { inputs, total };
      }
    }

    throw new WalletError(
      "INSUFFICIENT_FUNDS",
      `Insufficient funds: need ${target}, owners hold ${total}`,
    );
  }

  /**
   * Resolve explicitly named inputs against the local store.
   *
   * @throws WalletError NOT_FOUND for any reference not held locally
   */
  resolve(refs: readonly OutputRef[]): readonly Output[] {
    return refs.map((ref) => {
      const output = this.store.getOutput(ref);
      if (output === undefined) {
        throw new WalletError(
          "NOT_FOUND",
          `Output ${outputRefToString(ref)} is not in the local store`,
        );
      }
      return output;
    });
  }

  /**
   * Resolve explicit references that must all be coins.
   *
   * @throws WalletError NOT_FOUND | INVALID_REQUEST
   */
  resolveCoins(refs: readonly OutputRef[]): CoinSelection {
    const inputs: CoinOutput[] = [];
    let total = 0n;
    for (const output of this.resolve(refs)) {
      if (output.payload.kind !== "coin") {
        throw new WalletError(
          "INVALID_REQUEST",
          `Output ${outputRefToString(output.ref)} is a ${output.payload.kind}, not a coin`,
        );
      }
      inputs.push({ ref: output.ref, owner: output.owner, payload: output.payload });
      total += output.payload.value;
    }
    return { inputs, total };
  }

  /**
   * The owner's live kitty carrying `name`, plain or tradable.
   *
   * @throws WalletError NOT_FOUND
   */
  kittyByName(owner: PublicKey, name: string): KittyOutput {
    const [kitty] = this.store.findKittiesByName(owner, name);
    if (kitty === undefined) {
      throw new WalletError(
        "NOT_FOUND",
        `No live kitty named "${name}" owned by ${owner}`,
      );
    }
    return kitty;
  }
}
