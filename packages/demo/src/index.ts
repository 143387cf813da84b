#!/usr/bin/env node
/**
 * @kitty-wallet/demo — Terminal walkthrough.
 *
 * Drives a wallet through its commands against an in-process DevChain:
 * keys -> mint -> spend -> kitties -> breed -> market -> verify -> reorg
 *
 * Configuration comes from the environment (see loadConfig); the demo
 * defaults to quiet logs and tracks every owner so market listings show up.
 */

import chalk from "chalk";
import { DevChain } from "@kitty-wallet/chain";
import type { Output, OutputRef } from "@kitty-wallet/types";
import { outputRefToString } from "@kitty-wallet/types";
import { createLogger, loadConfig, openWallet, Wallet } from "@kitty-wallet/wallet";
import type { BuiltTransaction } from "@kitty-wallet/wallet";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                   KITTY WALLET DEMO                     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Local ledger, coins and kitties on UTXOs         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function short(hex: string): string {
  return hex.length > 16 ? `${hex.slice(0, 12)}...${hex.slice(-6)}` : hex;
}

function hashLine(label: string, hash: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short(hash)));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function describeOutput(output: Output): string {
  const owner = short(output.owner);
  switch (output.payload.kind) {
    case "coin":
      return `coin ${output.payload.value} → ${owner}`;
    case "kitty":
      return `kitty "${output.payload.kitty.name}" (${output.payload.kitty.gender}) → ${owner}`;
    case "tradable-kitty":
      return (
        `tradable "${output.payload.kitty.name}" at ${output.payload.price}` +
        `${output.payload.isAvailableForSale ? ", for sale" : ""} → ${owner}`
      );
  }
}

function firstRef(built: BuiltTransaction): OutputRef {
  const [first] = built.outputRefs;
  if (first === undefined) {
    throw new Error(`Transaction ${built.txHash} created no outputs`);
  }
  return first;
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Every command builds, signs and submits a real transaction;"));
  console.log(chalk.gray("  the local ledger only changes when a sync folds in a new block.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const config = loadConfig({
    LOG_LEVEL: "warn",
    WALLET_TRACK_ALL_OWNERS: "true",
    ...process.env,
  });
  const logger = createLogger(config);
  const chain = new DevChain();
  const wallet = openWallet(config, chain, logger);
  ok(`DevChain at height ${chain.height}`);
  ok(config.WALLET_DATA_DIR === undefined
    ? "Wallet opened in memory"
    : `Wallet opened at ${config.WALLET_DATA_DIR}`);

  /** Seal the pool into a block and fold it into the wallet */
  const confirm = async (): Promise<void> => {
    const block = chain.produceBlock();
    const result = await wallet.sync();
    info("block", `#${block.header.height} with ${block.transactions.length} transaction(s)`);
    info("sync", `+${result.inserted} / -${result.removed} outputs`);
  };

  try {
    // ─── Step 2: Keys ─────────────────────────────────────────────────

    stepHeader(2, TOTAL_STEPS, "Keys");

    const alice = wallet.insertKey("alice");
    const bob = wallet.insertKey("bob");
    hashLine("alice", alice);
    hashLine("bob", bob);
    ok(`${wallet.showKeys().length} keys in keystore`);

    await sleep(DELAY_MS);

    // ─── Step 3: Mint coins ───────────────────────────────────────────

    stepHeader(3, TOTAL_STEPS, "Mint Coins");

    const minted = await wallet.mintCoins({ owner: alice, amount: 100n });
    hashLine("tx", minted.txHash);
    info("local outputs", `${wallet.showAllOutputs().length} before confirmation`);
    await confirm();
    ok(`alice holds ${wallet.showBalance().byOwner.get(alice) ?? 0n}`);

    await sleep(DELAY_MS);

    // ─── Step 4: Spend ────────────────────────────────────────────────

    stepHeader(4, TOTAL_STEPS, "Spend Coins");

    const spend = await wallet.spendCoins({ recipient: bob, amounts: [40n] });
    info("inputs", String(spend.transaction.inputs.length));
    info("outputs", String(spend.transaction.outputs.length));
    await confirm();
    info("spent ref", outputRefToString(firstRef(minted)).slice(0, 16) + "...");
    ok(`original coin ${wallet.store.hasOutput(firstRef(minted)) ? "still present" : "gone"}`);
    const balance = wallet.showBalance();
    for (const [owner, value] of balance.byOwner) {
      info(owner === alice ? "alice" : owner === bob ? "bob" : short(owner), String(value));
    }

    await sleep(DELAY_MS);

    // ─── Step 5: Kitties ──────────────────────────────────────────────

    stepHeader(5, TOTAL_STEPS, "Mint Kitties");

    await wallet.mintKitty({ owner: alice, name: "molly", gender: "female" });
    await wallet.mintKitty({ owner: alice, name: "tom", gender: "male" });
    await confirm();
    for (const kitty of wallet.showOwnedKitties(alice)) {
      ok(describeOutput(kitty));
    }

    await sleep(DELAY_MS);

    // ─── Step 6: Breed ────────────────────────────────────────────────

    stepHeader(6, TOTAL_STEPS, "Breed");

    const bred = await wallet.breedKitty({ owner: alice, momName: "molly", dadName: "tom" });
    await confirm();
    const child = wallet.store.getOutput(bred.outputRefs[2] ?? firstRef(bred));
    if (child !== undefined && child.payload.kind !== "coin") {
      ok(`born: ${describeOutput(child)}`);
      hashLine("dna", child.payload.kitty.dna);
    }
    info("kitties", `${wallet.showOwnedKitties(alice).length} owned by alice`);

    await sleep(DELAY_MS);

    // ─── Step 7: Market ───────────────────────────────────────────────

    stepHeader(7, TOTAL_STEPS, "Market");

    const market = Wallet.inMemory({ chain, logger });
    const carol = market.insertKey("carol");
    await market.mintTradableKitty({ owner: carol, name: "felix", gender: "male", price: 25n });
    await confirm();
    ok(`carol lists "felix" at 25 (key held elsewhere: ${short(carol)})`);

    const purchase = await wallet.buyKitty({ buyer: bob, seller: carol, name: "felix", expectedPrice: 25n });
    info("listing input", purchase.transaction.inputs[0]?.redeemer === "" ? "unsigned" : "signed");
    await confirm();
    for (const kitty of wallet.showOwnedKitties(bob)) {
      ok(describeOutput(kitty));
    }
    await market.close();

    await sleep(DELAY_MS);

    // ─── Step 8: Verify ───────────────────────────────────────────────

    stepHeader(8, TOTAL_STEPS, "Verify");

    for (const kitty of wallet.showOwnedKitties(bob)) {
      const report = await wallet.verifyTradableKitty(kitty.ref);
      if (report.mismatches.length === 0) {
        ok(`"${kitty.payload.kitty.name}" agrees with the chain`);
      } else {
        for (const mismatch of report.mismatches) {
          warn(mismatch);
        }
      }
    }
    const stale = await wallet.verifyCoin(firstRef(minted));
    info("spent coin", stale.inChain ? "unspent on chain" : "not on chain, not in store");

    await sleep(DELAY_MS);

    // ─── Step 9: Reorg ────────────────────────────────────────────────

    stepHeader(9, TOTAL_STEPS, "Chain Reorganisation");

    const height = chain.height;
    chain.rewind(height - 1);
    chain.produceBlock();
    const result = await wallet.sync();
    warn(`block #${height} replaced by an empty block`);
    info("rolled back", `${result.blocksRolledBack} block(s)`);
    info("applied", `${result.blocksApplied} block(s)`);
    for (const kitty of wallet.showAllKitties().filter((k) => k.payload.kitty.name === "felix")) {
      ok(`back with the seller: ${describeOutput(kitty)}`);
    }

    console.log();
    console.log(chalk.white("    Blocks:              ") + chalk.cyan.bold(String(chain.height + 1)));
    console.log(chalk.white("    Tracked outputs:     ") + chalk.cyan.bold(String(wallet.showAllOutputs().length)));
    console.log(chalk.white("    Coin total:          ") + chalk.cyan.bold(String(wallet.showBalance().total)));
    console.log();
  } finally {
    await wallet.close();
  }
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
