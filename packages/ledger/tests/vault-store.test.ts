/**
 * Tests for VaultStore transitions and queries.
 *
 * Covers:
 * - Deposit and withdraw effects on notes, totals and custody
 * - Check order and error codes
 * - All-or-nothing behavior when the gateway or sink fails
 * - Commitment redaction in the audit trail
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTransferGateway, TransferError } from "../src/transfer-gateway.js";
import { U64_MAX, VaultError } from "../src/types.js";
import { VaultStore } from "../src/vault-store.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  CUSTODIAN,
  FailingSink,
  FlakyGateway,
  bytes,
  makeHarness,
  makeStoreHarness,
  thrownCode,
} from "./helpers.js";
import type { Harness } from "./helpers.js";

describe("VaultStore", () => {
  let h: Harness;

  beforeEach(() => {
    h = makeHarness();
  });

  // ─── deposit ─────────────────────────────────────────────────────────

  describe("deposit", () => {
    it("creates an unspent note owned by the depositor", () => {
      const note = h.vault.deposit(ALICE, bytes("c1"), 100n);

      expect(note.id).toBe(0n);
      expect(note.owner).toBe(ALICE);
      expect(note.amount).toBe(100n);
      expect(note.spent).toBe(false);
      expect(note.commitment).toEqual(bytes("c1"));
    });

    it("raises the locked total and the note count", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.deposit(BOB, bytes("c2"), 40n);

      expect(h.vault.totalLocked()).toBe(140n);
      expect(h.vault.noteCount()).toBe(2);
    });

    it("moves the amount from the depositor to the custodian", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);

      expect(h.gateway.balanceOf(ALICE)).toBe(900n);
      expect(h.gateway.balanceOf(CUSTODIAN)).toBe(100n);
    });

    it("gives each note an id above every earlier id", () => {
      const ids = [
        h.vault.deposit(ALICE, bytes("a"), 1n).id,
        h.vault.deposit(BOB, bytes("b"), 2n).id,
        h.vault.deposit(ALICE, bytes("c"), 3n).id,
      ];

      expect(ids).toEqual([0n, 1n, 2n]);
      expect(h.vault.nextNoteId()).toBe(3n);
    });

    it("accepts a zero amount", () => {
      const note = h.vault.deposit(ALICE, bytes("z"), 0n);

      expect(note.amount).toBe(0n);
      expect(h.vault.totalLocked()).toBe(0n);
      expect(h.vault.noteCount()).toBe(1);
    });

    it("emits note.deposited with the commitment redacted", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);

      expect(h.sink.events).toEqual([
        {
          type: "note.deposited",
          actor: ALICE,
          payload: { owner: ALICE, amount: "100", commitment: "" },
        },
      ]);
    });

    it("rejects amounts outside u64 before any effect", () => {
      expect(thrownCode(() => h.vault.deposit(ALICE, bytes("x"), -1n))).toBe("INVALID_AMOUNT");
      expect(thrownCode(() => h.vault.deposit(ALICE, bytes("x"), U64_MAX + 1n))).toBe(
        "INVALID_AMOUNT",
      );

      expect(h.vault.noteCount()).toBe(0);
      expect(h.gateway.balanceOf(ALICE)).toBe(1000n);
      expect(h.sink.events).toHaveLength(0);
    });

    it("rejects a blank depositor", () => {
      expect(thrownCode(() => h.vault.deposit(" ", bytes("x"), 1n))).toBe("INVALID_PRINCIPAL");
    });

    it("rejects a deposit that would overflow the locked total", () => {
      h.gateway.credit(ALICE, U64_MAX);
      h.vault.deposit(ALICE, bytes("big"), U64_MAX);

      expect(thrownCode(() => h.vault.deposit(ALICE, bytes("one"), 1n))).toBe("LOCKED_OVERFLOW");
      expect(h.vault.totalLocked()).toBe(U64_MAX);
      expect(h.vault.noteCount()).toBe(1);
      expect(h.sink.events).toHaveLength(1);
    });

    it("rethrows a gateway failure unchanged and changes nothing", () => {
      expect(() => h.vault.deposit(ALICE, bytes("x"), 5000n)).toThrow(TransferError);
      expect(thrownCode(() => h.vault.deposit(ALICE, bytes("x"), 5000n))).toBe(
        "INSUFFICIENT_BALANCE",
      );

      expect(h.vault.noteCount()).toBe(0);
      expect(h.vault.totalLocked()).toBe(0n);
      expect(h.sink.events).toHaveLength(0);
    });

    it("undoes the transfer, the note and the total when the sink fails", () => {
      const gateway = new InMemoryTransferGateway([[ALICE, 1000n]]);
      const vault = VaultStore.create({
        admin: ADMIN,
        custodian: CUSTODIAN,
        gateway,
        sink: new FailingSink("note.deposited"),
      });

      expect(() => vault.deposit(ALICE, bytes("x"), 100n)).toThrow("sink rejected note.deposited");

      expect(vault.noteCount()).toBe(0);
      expect(vault.nextNoteId()).toBe(0n);
      expect(vault.totalLocked()).toBe(0n);
      expect(gateway.balanceOf(ALICE)).toBe(1000n);
      expect(gateway.balanceOf(CUSTODIAN)).toBe(0n);
    });

    it("reports ROLLBACK_FAILED when an undo step cannot run", () => {
      const book = new InMemoryTransferGateway([[ALICE, 1000n]]);
      const vault = VaultStore.create({
        admin: ADMIN,
        custodian: CUSTODIAN,
        gateway: new FlakyGateway(book, (from) => from === CUSTODIAN),
        sink: new FailingSink("note.deposited"),
      });

      expect(() => vault.deposit(ALICE, bytes("x"), 100n)).toThrow(VaultError);
      expect(thrownCode(() => vault.deposit(ALICE, bytes("x"), 100n))).toBe("ROLLBACK_FAILED");
    });
  });

  // ─── withdraw ────────────────────────────────────────────────────────

  describe("withdraw", () => {
    it("tombstones the note and lowers the locked total", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.deposit(BOB, bytes("c2"), 30n);

      const note = h.vault.withdraw(ALICE, 0n, ALICE);

      expect(note.spent).toBe(true);
      expect(h.vault.totalLocked()).toBe(30n);
      expect(h.vault.noteCount()).toBe(2);
    });

    it("releases the amount from the custodian to the recipient", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.withdraw(ALICE, 0n, CAROL);

      expect(h.gateway.balanceOf(CUSTODIAN)).toBe(0n);
      expect(h.gateway.balanceOf(CAROL)).toBe(1100n);
      expect(h.gateway.balanceOf(ALICE)).toBe(900n);
    });

    it("emits note.withdrawn", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.withdraw(ALICE, 0n, CAROL);

      expect(h.sink.events[1]).toEqual({
        type: "note.withdrawn",
        actor: ALICE,
        payload: { owner: ALICE, noteId: "0", amount: "100" },
      });
    });

    it("rejects an unknown note", () => {
      expect(thrownCode(() => h.vault.withdraw(ALICE, 0n, ALICE))).toBe("NOTE_NOT_FOUND");
    });

    it("rejects a caller who does not own the note, the admin included", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);

      expect(thrownCode(() => h.vault.withdraw(BOB, 0n, BOB))).toBe("NOT_NOTE_OWNER");
      expect(thrownCode(() => h.vault.withdraw(ADMIN, 0n, ADMIN))).toBe("NOT_NOTE_OWNER");
      expect(h.vault.getNote(0n)?.spent).toBe(false);
    });

    it("rejects a second withdrawal", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.withdraw(ALICE, 0n, ALICE);

      expect(thrownCode(() => h.vault.withdraw(ALICE, 0n, ALICE))).toBe("NOTE_ALREADY_SPENT");
      expect(h.gateway.balanceOf(ALICE)).toBe(1000n);
    });

    it("checks existence before ownership and ownership before spent state", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      h.vault.withdraw(ALICE, 0n, ALICE);

      expect(thrownCode(() => h.vault.withdraw(BOB, 7n, BOB))).toBe("NOTE_NOT_FOUND");
      expect(thrownCode(() => h.vault.withdraw(BOB, 0n, BOB))).toBe("NOT_NOTE_OWNER");
    });

    it("rejects a blank recipient without spending the note", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);

      expect(thrownCode(() => h.vault.withdraw(ALICE, 0n, ""))).toBe("INVALID_PRINCIPAL");
      expect(h.vault.getNote(0n)?.spent).toBe(false);
    });

    it("refuses a note the locked total cannot cover and leaves it unspent", () => {
      h.vault.deposit(ALICE, bytes("c1"), 100n);
      // Corrupt the running total below the note's amount
      Reflect.set(h.vault, "_totalLocked", 40n);

      expect(thrownCode(() => h.vault.withdraw(ALICE, 0n, ALICE))).toBe("INSUFFICIENT_LOCKED");
      expect(h.vault.noteMetadata(0n)).toEqual({ owner: ALICE, amount: 100n, spent: false });
      expect(h.vault.totalLocked()).toBe(40n);
      expect(h.gateway.balanceOf(CUSTODIAN)).toBe(100n);
      expect(h.sink.events.map((e) => e.type)).toEqual(["note.deposited"]);
      expect(h.vault.checkConsistency().consistent).toBe(false);
    });

    it("restores the note, total and balances when the sink fails", () => {
      const gateway = new InMemoryTransferGateway([[ALICE, 1000n]]);
      const sink = new FailingSink("note.withdrawn");
      const vault = VaultStore.create({ admin: ADMIN, custodian: CUSTODIAN, gateway, sink });
      vault.deposit(ALICE, bytes("c1"), 100n);

      expect(() => vault.withdraw(ALICE, 0n, CAROL)).toThrow("sink rejected note.withdrawn");

      expect(vault.getNote(0n)?.spent).toBe(false);
      expect(vault.totalLocked()).toBe(100n);
      expect(gateway.balanceOf(CUSTODIAN)).toBe(100n);
      expect(gateway.balanceOf(CAROL)).toBe(0n);
      expect(sink.events).toHaveLength(1);
    });

    it("restores the note and total when the release transfer fails", () => {
      const book = new InMemoryTransferGateway([[ALICE, 1000n]]);
      const vault = VaultStore.create({
        admin: ADMIN,
        custodian: CUSTODIAN,
        gateway: new FlakyGateway(book, (from) => from === CUSTODIAN),
        sink: new FailingSink("note.withdrawn"),
      });
      vault.deposit(ALICE, bytes("c1"), 100n);

      expect(() => vault.withdraw(ALICE, 0n, CAROL)).toThrow(
        `transfer ${CUSTODIAN} -> ${CAROL} refused`,
      );

      expect(vault.getNote(0n)?.spent).toBe(false);
      expect(vault.totalLocked()).toBe(100n);
      expect(book.balanceOf(CUSTODIAN)).toBe(100n);
    });
  });

  // ─── queries ─────────────────────────────────────────────────────────

  describe("queries", () => {
    beforeEach(() => {
      h.vault.deposit(ALICE, bytes("1"), 100n);
      h.vault.deposit(BOB, bytes("2"), 50n);
      h.vault.deposit(ALICE, bytes("3"), 25n);
      h.vault.withdraw(ALICE, 0n, ALICE);
    });

    it("noteMetadata returns owner, amount and spent flag", () => {
      expect(h.vault.noteMetadata(0n)).toEqual({ owner: ALICE, amount: 100n, spent: true });
      expect(h.vault.noteMetadata(1n)).toEqual({ owner: BOB, amount: 50n, spent: false });
    });

    it("noteMetadata rejects an unknown id", () => {
      expect(thrownCode(() => h.vault.noteMetadata(3n))).toBe("NOTE_NOT_FOUND");
    });

    it("getNote returns undefined for an unknown id", () => {
      expect(h.vault.getNote(3n)).toBeUndefined();
    });

    it("listNotes filters by owner and spent state", () => {
      expect(h.vault.listNotes({ owner: ALICE }).map((n) => n.id)).toEqual([0n, 2n]);
      expect(h.vault.listNotes({ spent: false }).map((n) => n.id)).toEqual([1n, 2n]);
    });

    it("checkConsistency re-scans the unspent notes", () => {
      expect(h.vault.checkConsistency()).toEqual({
        consistent: true,
        totalLocked: 75n,
        unspentSum: 75n,
        unspentCount: 2,
        noteCount: 3,
      });
    });
  });

  // ─── audit trail ─────────────────────────────────────────────────────

  describe("with an event store sink", () => {
    it("appends each transition to the vault stream", () => {
      const { vault, store, streamId } = makeStoreHarness();
      vault.deposit(ALICE, bytes("secret"), 100n);
      vault.withdraw(ALICE, 0n, BOB);

      const events = store.read(streamId);
      expect(events.map((e) => e.event.type)).toEqual(["note.deposited", "note.withdrawn"]);
      expect(events[0]?.event.metadata.source).toBe("ledger");
      expect(events[0]?.event.metadata.actor).toBe(ALICE);
      expect(store.verifyIntegrity().valid).toBe(true);
    });

    it("never writes the commitment to the stream", () => {
      const { vault, store, streamId } = makeStoreHarness();
      vault.deposit(ALICE, bytes("secret"), 100n);

      expect(store.read(streamId)[0]?.event.payload).toEqual({
        owner: ALICE,
        amount: "100",
        commitment: "",
      });
    });

    it("leaves the stream untouched when a deposit fails", () => {
      const { vault, store, streamId } = makeStoreHarness();

      expect(thrownCode(() => vault.deposit(ALICE, bytes("x"), 2000n))).toBe(
        "INSUFFICIENT_BALANCE",
      );
      expect(store.streamVersion(streamId)).toBe(0);
    });
  });
});
