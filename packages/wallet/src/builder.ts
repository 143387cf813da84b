/**
 * @kitty-wallet/wallet — Transaction Builder.
 *
 * Composes transactions from the Input Selector's inputs and the kitty
 * rules' payloads, then signs every input through the Keystore over the
 * canonical signing payload.
 *
 * The builder proposes; it does not validate economics. A spend whose
 * outputs exceed its inputs is built and signed like any other, and the
 * ledger decides.
 */

import type { Logger } from "pino";
import { outputRefsOf, signingPayload, transactionHash } from "@kitty-wallet/chain";
import type { Keystore } from "@kitty-wallet/keystore";
import {
  breed,
  changeProperties,
  defaultRandomSource,
  mintKitty,
  mintTradableKitty,
  paymentCovers,
  prepareBuy,
} from "@kitty-wallet/kitties";
import type { KittyLookup, RandomSource } from "@kitty-wallet/kitties";
import type { LedgerStore } from "@kitty-wallet/store";
import type {
  CheckerKind,
  Gender,
  Hash256,
  KittyOutput,
  NewOutput,
  Output,
  OutputRef,
  PublicKey,
  SignedTransaction,
  Transaction,
} from "@kitty-wallet/types";
import { isU128 } from "@kitty-wallet/types";
import { WalletError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { InputSelector } from "./selector.js";

// =============================================================================
// Types
// =============================================================================

export interface BuiltTransaction {
  readonly transaction: SignedTransaction;
  readonly txHash: Hash256;
  /** References the outputs will have once the transaction is on chain */
  readonly outputRefs: readonly OutputRef[];
}

export interface MintCoinsRequest {
  readonly owner: PublicKey;
  readonly amount: bigint;
}

export interface SpendCoinsRequest {
  /** Keys whose coins may be selected */
  readonly from: ReadonlySet<PublicKey>;
  /** Explicit inputs; when given, no selection happens */
  readonly inputs?: readonly OutputRef[];
  readonly recipient: PublicKey;
  /** One output of each amount goes to the recipient */
  readonly amounts: readonly bigint[];
}

export interface MintKittyRequest {
  readonly owner: PublicKey;
  readonly name: string;
  readonly gender: Gender;
}

export interface MintTradableKittyRequest extends MintKittyRequest {
  readonly price: bigint;
  readonly isAvailableForSale?: boolean;
}

export interface BreedKittyRequest {
  readonly owner: PublicKey;
  readonly momName: string;
  readonly dadName: string;
  readonly childName?: string;
}

export interface SetKittyPropertyRequest {
  readonly owner: PublicKey;
  readonly name: string;
  readonly newName?: string;
  readonly price?: bigint;
  readonly isAvailableForSale?: boolean;
}

export interface BuyKittyRequest {
  readonly buyer: PublicKey;
  readonly seller: PublicKey;
  readonly name: string;
  /** Keys whose coins may pay (default: the buyer) */
  readonly from?: ReadonlySet<PublicKey>;
  /** Explicit coin inputs; when given, no selection happens */
  readonly inputs?: readonly OutputRef[];
  readonly expectedPrice?: bigint;
}

export interface TransactionBuilderOptions {
  readonly random?: RandomSource;
  readonly logger?: Logger;
}

/** An input and whether the builder must be able to sign it. */
interface DraftInput {
  readonly output: Output;
  /** Sign when the key is at hand, otherwise leave the redeemer empty */
  readonly signatureOptional?: boolean;
}

function assertAmount(amount: bigint, what: string): void {
  if (!isU128(amount)) {
    throw new WalletError(
      "INVALID_REQUEST",
      `${what} ${amount} is not an unsigned 128-bit value`,
    );
  }
}

// =============================================================================
// Builder
// =============================================================================

export class TransactionBuilder {
  readonly selector: InputSelector;

  private readonly _random: RandomSource;
  private readonly _log: Logger;
  private readonly _lookup: KittyLookup;

  constructor(
    private readonly store: LedgerStore,
    private readonly keystore: Keystore,
    options: TransactionBuilderOptions = {},
  ) {
    this.selector = new InputSelector(store);
    this._random = options.random ?? defaultRandomSource;
    this._log = (options.logger ?? silentLogger()).child({ component: "builder" });
    this._lookup = (owner, name) => store.findKittiesByName(owner, name);
  }

  // ─── Coins ──────────────────────────────────────────────────────────

  mintCoins(request: MintCoinsRequest): BuiltTransaction {
    assertAmount(request.amount, "Amount");
    return this._finish("mint-coins", [], [
      { owner: request.owner, payload: { kind: "coin", value: request.amount } },
    ]);
  }

  /**
   * @throws WalletError INSUFFICIENT_FUNDS | NOT_FOUND | INVALID_REQUEST
   * @throws KeystoreError when an input's owner key is missing or locked
   */
  spendCoins(request: SpendCoinsRequest): BuiltTransaction {
    if (request.amounts.length === 0) {
      throw new WalletError("INVALID_REQUEST", "A spend needs at least one output amount");
    }
    let target = 0n;
    for (const amount of request.amounts) {
      assertAmount(amount, "Output amount");
      target += amount;
    }

    const selection =
      request.inputs !== undefined
        ? this.selector.resolveCoins(request.inputs)
        : this.selector.selectCoins(request.from, target);

    return this._finish(
      "spend-coins",
      selection.inputs.map((output) => ({ output })),
      request.amounts.map((value): NewOutput => ({
        owner: request.recipient,
        payload: { kind: "coin", value },
      })),
    );
  }

  // ─── Kitties ────────────────────────────────────────────────────────

  mintKitty(request: MintKittyRequest): BuiltTransaction {
    const kitty = mintKitty(request, this._lookup, this._random);
    return this._finish("mint-kitty", [], [
      { owner: request.owner, payload: { kind: "kitty", kitty } },
    ]);
  }

  mintTradableKitty(request: MintTradableKittyRequest): BuiltTransaction {
    const payload = mintTradableKitty(request, this._lookup, this._random);
    return this._finish("mint-tradable-kitty", [], [{ owner: request.owner, payload }]);
  }

  /**
   * Breed two of the owner's kitties. Parents are consumed and recreated
   * with updated counters, next to the child.
   *
   * @throws KittyError INVALID_BREEDING_PAIR | NAME_COLLISION
   * @throws WalletError NOT_FOUND when no tracked kitty carries a name
   */
  breedKitty(request: BreedKittyRequest, tradable = false): BuiltTransaction {
    const mom = this._parent(request.owner, request.momName);
    const dad = this._parent(request.owner, request.dadName);
    const result = breed(
      { mom, dad, owner: request.owner, childName: request.childName, tradable },
      this._lookup,
    );

    return this._finish(
      tradable ? "breed-tradable-kitty" : "breed-kitty",
      [{ output: mom }, { output: dad }],
      [
        { owner: request.owner, payload: result.mom },
        { owner: request.owner, payload: result.dad },
        { owner: request.owner, payload: result.child },
      ],
    );
  }

  /**
   * Replace a kitty with one carrying new name, price or availability.
   */
  setKittyProperty(request: SetKittyPropertyRequest): BuiltTransaction {
    const current = this.selector.kittyByName(request.owner, request.name);
    const payload = changeProperties(
      {
        current,
        owner: request.owner,
        newName: request.newName,
        price: request.price,
        isAvailableForSale: request.isAvailableForSale,
      },
      this._lookup,
    );
    return this._finish("set-kitty-property", [{ output: current }], [
      { owner: request.owner, payload },
    ]);
  }

  /**
   * Buy a listed kitty. Availability and price are checked against the
   * local snapshot before any coin is selected. Coins beyond the price
   * come back to the buyer as change.
   *
   * @throws KittyError NOT_AVAILABLE_FOR_SALE | PRICE_CHANGED | NAME_COLLISION
   * @throws WalletError NOT_FOUND | INSUFFICIENT_FUNDS
   */
  buyKitty(request: BuyKittyRequest): BuiltTransaction {
    const listing = this.selector.kittyByName(request.seller, request.name);
    const plan = prepareBuy(
      { kitty: listing, buyer: request.buyer, expectedPrice: request.expectedPrice },
      this._lookup,
    );

    const payment =
      request.inputs !== undefined
        ? this.selector.resolveCoins(request.inputs)
        : this.selector.selectCoins(request.from ?? new Set([request.buyer]), plan.price);

    if (!paymentCovers(plan, payment.total)) {
      this._log.warn(
        { kitty: request.name, price: plan.price.toString(), paid: payment.total.toString() },
        "Payment does not cover the listed price",
      );
    }

    const outputs: NewOutput[] = [plan.kittyOutput, ...plan.paymentOutputs];
    if (payment.total > plan.price) {
      outputs.push({
        owner: request.buyer,
        payload: { kind: "coin", value: payment.total - plan.price },
      });
    }

    return this._finish(
      "buy-kitty",
      [
        { output: listing, signatureOptional: true },
        ...payment.inputs.map((output) => ({ output })),
      ],
      outputs,
    );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Breeding parent: the owner's kitty of that name, else any tracked
   * kitty of that name so the ownership rule can reject it.
   */
  private _parent(owner: PublicKey, name: string): KittyOutput {
    const own = this.store.findKittiesByName(owner, name)[0];
    if (own !== undefined) {
      return own;
    }
    const other = this.store.listKitties().find((k) => k.payload.kitty.name === name);
    if (other !== undefined) {
      return other;
    }
    throw new WalletError("NOT_FOUND", `No tracked kitty named "${name}"`);
  }

  private _finish(
    checker: CheckerKind,
    inputs: readonly DraftInput[],
    outputs: readonly NewOutput[],
  ): BuiltTransaction {
    const unsigned: Transaction = {
      inputs: inputs.map((input) => ({ outputRef: input.output.ref, redeemer: "" })),
      outputs,
      checker,
      ...(inputs.length === 0 ? { nonce: Buffer.from(this._random()).toString("hex") } : {}),
    };
    const payload = signingPayload(unsigned);

    const transaction: SignedTransaction = {
      ...unsigned,
      inputs: inputs.map((input) => {
        const owner = input.output.owner;
        const redeemer =
          input.signatureOptional === true && !this.keystore.isUnlocked(owner)
            ? ""
            : this.keystore.sign(owner, payload);
        return { outputRef: input.output.ref, redeemer };
      }),
    };

    return {
      transaction,
      txHash: transactionHash(transaction),
      outputRefs: outputRefsOf(transaction),
    };
  }
}
