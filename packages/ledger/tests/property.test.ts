/**
 * Property-based tests for the note ledger.
 *
 * For any sequence of deposits and withdrawals, successful or not:
 * 1. The locked total equals the sum of unspent notes
 * 2. Ids are assigned in strictly increasing order with no gaps
 * 3. A failed operation changes nothing
 * 4. Custody plus circulating balances is constant
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryTransferGateway } from "../src/transfer-gateway.js";
import type { VaultSnapshot } from "../src/types.js";
import { VaultStore } from "../src/vault-store.js";
import { ADMIN, ALICE, BOB, CAROL, CUSTODIAN, RecordingSink, bytes } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbPrincipal = fc.constantFrom(ALICE, BOB, CAROL);

type Op =
  | { readonly kind: "deposit"; readonly who: string; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly who: string; readonly id: bigint; readonly to: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("deposit" as const),
    who: arbPrincipal,
    amount: fc.bigInt({ min: 0n, max: 600n }),
  }),
  fc.record({
    kind: fc.constant("withdraw" as const),
    who: arbPrincipal,
    id: fc.bigInt({ min: 0n, max: 12n }),
    to: arbPrincipal,
  }),
);

// =============================================================================
// Helpers
// =============================================================================

function fresh(): { vault: VaultStore; gateway: InMemoryTransferGateway; sink: RecordingSink } {
  const gateway = new InMemoryTransferGateway([
    [ALICE, 1000n],
    [BOB, 1000n],
    [CAROL, 1000n],
  ]);
  const sink = new RecordingSink();
  const vault = VaultStore.create({ admin: ADMIN, custodian: CUSTODIAN, gateway, sink });
  return { vault, gateway, sink };
}

function stateOf(vault: VaultStore): Omit<VaultSnapshot, "createdAt"> {
  const { createdAt: _createdAt, ...state } = vault.snapshot();
  return state;
}

function apply(vault: VaultStore, op: Op): boolean {
  try {
    if (op.kind === "deposit") {
      vault.deposit(op.who, bytes(`${op.who}:${op.amount.toString()}`), op.amount);
    } else {
      vault.withdraw(op.who, op.id, op.to);
    }
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err) return false;
    throw err;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("property: ledger invariants", () => {
  it("the locked total always equals the sum of unspent notes", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 30 }), (ops) => {
        const { vault } = fresh();
        for (const op of ops) {
          apply(vault, op);
          const report = vault.checkConsistency();
          expect(report.consistent).toBe(true);
          expect(report.totalLocked).toBe(vault.totalLocked());
        }
      }),
      { numRuns: 200 },
    );
  });

  it("ids are 0, 1, 2, ... in deposit order", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 30 }), (ops) => {
        const { vault } = fresh();
        for (const op of ops) apply(vault, op);

        const ids = vault.listNotes().map((n) => n.id);
        expect(ids).toEqual(ids.map((_, i) => BigInt(i)));
        expect(vault.nextNoteId()).toBe(BigInt(ids.length));
      }),
      { numRuns: 200 },
    );
  });

  it("a failed operation leaves state, balances and events unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 30 }), (ops) => {
        const { vault, gateway, sink } = fresh();
        for (const op of ops) {
          const before = stateOf(vault);
          const balances = gateway.balances();
          const eventCount = sink.events.length;

          if (!apply(vault, op)) {
            expect(stateOf(vault)).toEqual(before);
            expect(gateway.balances()).toEqual(balances);
            expect(sink.events).toHaveLength(eventCount);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("custody holds exactly the locked total and no value is created", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 30 }), (ops) => {
        const { vault, gateway } = fresh();
        for (const op of ops) {
          apply(vault, op);
          expect(gateway.balanceOf(CUSTODIAN)).toBe(vault.totalLocked());
          expect(gateway.supply).toBe(3000n);
        }
      }),
      { numRuns: 200 },
    );
  });
});
