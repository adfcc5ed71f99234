#!/usr/bin/env node
/**
 * @notevault/demo — Interactive CLI walkthrough.
 *
 * Runs one vault through its whole life in your terminal:
 * initialize -> deposit -> withdraw -> rejected withdrawals ->
 * audit -> verify the event trail
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { InMemoryEventStore } from "@notevault/event-store";
import {
  EventStoreSink,
  InMemoryTransferGateway,
  VaultDeployment,
  commitmentFromText,
  isVaultError,
  vaultStreamId,
} from "@notevault/ledger";
import type { VaultStore } from "@notevault/ledger";
import type { NoteId, Principal } from "@notevault/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 500;

const ADMIN = "admin";
const CUSTODIAN = "vault-custody";
const ALICE = "alice";
const BOB = "bob";
const XAVIER = "xavier";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     NOTEVAULT DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("              Custodial Note Ledger                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function rejected(msg: string, code: string): void {
  console.log(chalk.yellow("    ✗ ") + chalk.white(msg) + chalk.gray(" → ") + chalk.yellow(code));
}

function balances(gateway: InMemoryTransferGateway, who: readonly Principal[]): void {
  for (const principal of who) {
    info(principal, gateway.balanceOf(principal).toString());
  }
}

/** Attempt a withdrawal that should fail, and show why. */
function attemptWithdraw(
  vault: VaultStore,
  caller: Principal,
  noteId: NoteId,
  recipient: Principal,
): void {
  try {
    vault.withdraw(caller, noteId, recipient);
  } catch (err) {
    if (!isVaultError(err)) {
      throw err;
    }
    rejected(`${caller} withdraws note ${noteId.toString()}`, err.code);
    return;
  }
  throw new Error(`Withdrawal of note ${noteId.toString()} by ${caller} was expected to fail`);
}

const TOTAL_STEPS = 7;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one vault, from first deposit to audit."));
  console.log(chalk.gray("  Every step uses the real domain packages.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const gateway = new InMemoryTransferGateway([
    [ALICE, 1000n],
    [BOB, 1000n],
  ]);
  ok("Balance book seeded (alice: 1000, bob: 1000)");

  const eventStore = new InMemoryEventStore();
  const streamId = vaultStreamId(ADMIN);
  ok("EventStore initialized (InMemory, hash-chained)");

  const deployment = new VaultDeployment({
    admin: ADMIN,
    custodian: CUSTODIAN,
    gateway,
    sink: new EventStoreSink(eventStore, { streamId }),
  });
  const vault = deployment.initialize(ADMIN);
  ok(`Vault initialized (admin: ${ADMIN}, custodian: ${CUSTODIAN})`);

  await sleep(DELAY_MS);

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Deposit");

  const note = vault.deposit(ALICE, commitmentFromText("c1"), 100n);
  ok(`alice locked ${note.amount.toString()} under note ${note.id.toString()}`);
  info("totalLocked", vault.totalLocked().toString());
  info("noteCount", String(vault.noteCount()));
  balances(gateway, [ALICE, CUSTODIAN]);

  await sleep(DELAY_MS);

  // ─── Step 3: Withdraw ───────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Withdraw");

  const spent = vault.withdraw(ALICE, note.id, XAVIER);
  ok(`alice redeemed note ${spent.id.toString()} to ${XAVIER}`);
  info("totalLocked", vault.totalLocked().toString());
  info("noteCount", String(vault.noteCount()));
  balances(gateway, [CUSTODIAN, XAVIER]);

  await sleep(DELAY_MS);

  // ─── Step 4: Rejected Withdrawals ───────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Rejected Withdrawals");

  attemptWithdraw(vault, ALICE, note.id, XAVIER);
  attemptWithdraw(vault, BOB, note.id, BOB);
  attemptWithdraw(vault, ALICE, 7n, ALICE);
  ok("State unchanged by every rejection");

  await sleep(DELAY_MS);

  // ─── Step 5: Metadata ───────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Note Metadata");

  const meta = vault.noteMetadata(note.id);
  info("owner", meta.owner);
  info("amount", meta.amount.toString());
  info("spent", String(meta.spent));
  ok("Commitment bytes stay inside the ledger");

  await sleep(DELAY_MS);

  // ─── Step 6: Audit ──────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Audit");

  const second = vault.deposit(BOB, commitmentFromText("c2"), 250n);
  ok(`bob locked ${second.amount.toString()} under note ${second.id.toString()}`);

  const report = vault.checkConsistency();
  info("totalLocked", report.totalLocked.toString());
  info("unspentSum", report.unspentSum.toString());
  info("unspentCount", String(report.unspentCount));
  if (report.consistent) {
    ok("totalLocked equals the sum of unspent notes");
  } else {
    console.log(chalk.red("    ✗ Ledger is inconsistent"));
  }

  await sleep(DELAY_MS);

  // ─── Step 7: Event Trail ────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Event Trail");

  const events = eventStore.readAll();
  for (const stored of events) {
    const line = JSON.stringify({
      type: stored.event.type,
      stream: stored.streamId,
      hash: stored.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }

  const integrity = eventStore.verifyIntegrity();
  const last = events[events.length - 1];
  if (last !== undefined) {
    hashLine("head", last.hash);
  }
  if (integrity.valid) {
    ok(`Hash chain verified (${events.length} events)`);
  } else {
    console.log(chalk.red(`    ✗ Hash chain broken: ${integrity.errors.map((e) => `#${e.position}: ${e.reason}`).join("; ")}`));
  }

  // ─── Summary ────────────────────────────────────────────────────────

  console.log();
  console.log(chalk.white("    Notes issued:        ") + chalk.cyan.bold(String(vault.noteCount())));
  console.log(chalk.white("    Value locked:        ") + chalk.cyan.bold(vault.totalLocked().toString()));
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(events.length)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
