/**
 * @notevault/ledger — VaultStore.
 *
 * The custodial note ledger. Value moves into custody on deposit, which
 * mints a note; the note's owner later redeems it once, releasing the
 * value from custody to a recipient.
 *
 * API surface:
 * - deposit() — Lock value and create a note
 * - withdraw() — Redeem a note and release its value
 * - totalLocked() / noteCount() / noteMetadata() — Queries
 * - getNote() / listNotes() — Full read-only views
 * - checkConsistency() — Audit re-scan
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * Every transition is all-or-nothing: a failure at any step leaves
 * ledger state, custody balances and the audit trail unchanged.
 */

import type { Note, NoteId, NoteMetadata, Principal } from "@notevault/types";
import { isPrincipal, isU64String } from "@notevault/types";
import { NoteRegistry } from "./note-registry.js";
import type {
  ConsistencyReport,
  NoteFilter,
  NoteSnapshot,
  VaultContext,
  VaultSnapshot,
} from "./types.js";
import { U64_MAX, VaultError, isVaultError } from "./types.js";
import { atomically } from "./unit-of-work.js";
import { assertAmount, assertPrincipal, commitmentFromHex, commitmentToHex } from "./u64.js";

export class VaultStore {
  private readonly _context: VaultContext;
  private readonly _notes: NoteRegistry;
  private _totalLocked: bigint;

  private constructor(context: VaultContext, notes: NoteRegistry, totalLocked: bigint) {
    this._context = context;
    this._notes = notes;
    this._totalLocked = totalLocked;
  }

  /**
   * Create an empty vault. Hosts normally go through
   * VaultDeployment.initialize(), which enforces the admin check.
   */
  static create(context: VaultContext): VaultStore {
    assertPrincipal(context.admin, "Admin");
    assertPrincipal(context.custodian, "Custodian");
    return new VaultStore(context, new NoteRegistry(), 0n);
  }

  get admin(): Principal {
    return this._context.admin;
  }

  get custodian(): Principal {
    return this._context.custodian;
  }

  // ─── Transitions ─────────────────────────────────────────────────────

  /**
   * Lock `amount` from `depositor` into custody and create a note
   * owned by the depositor.
   *
   * The emitted event carries an empty commitment; the real bytes are
   * only held by the note.
   *
   * @throws VaultError INVALID_PRINCIPAL, INVALID_AMOUNT, LOCKED_OVERFLOW
   * @throws whatever the gateway or sink throws, unchanged
   */
  deposit(depositor: Principal, commitment: Uint8Array, amount: bigint): Note {
    assertPrincipal(depositor, "Depositor");
    assertAmount(amount);
    if (this._totalLocked + amount > U64_MAX) {
      throw new VaultError(
        "LOCKED_OVERFLOW",
        `Depositing ${amount.toString()} would push the locked total past the u64 range`,
      );
    }

    const { custodian, gateway, sink } = this._context;

    return atomically((uow) => {
      gateway.transfer(depositor, custodian, amount);
      uow.onRollback(() => gateway.transfer(custodian, depositor, amount));

      const checkpoint = this._notes.checkpoint();
      const note = this._notes.create(depositor, commitment, amount);
      uow.onRollback(() => this._notes.rollbackTo(checkpoint));

      const previousTotal = this._totalLocked;
      this._totalLocked = previousTotal + amount;
      uow.onRollback(() => {
        this._totalLocked = previousTotal;
      });

      sink.emit({
        type: "note.deposited",
        actor: depositor,
        payload: { owner: depositor, amount: amount.toString(), commitment: "" },
      });

      return note;
    });
  }

  /**
   * Redeem note `noteId` on behalf of its owner and release its amount
   * from custody to `recipient`.
   *
   * Checks run in this order before anything changes: the note exists,
   * the caller owns it, it is unspent, custody covers it.
   *
   * @returns the note as tombstoned
   * @throws VaultError NOTE_NOT_FOUND, NOT_NOTE_OWNER, NOTE_ALREADY_SPENT,
   *   INSUFFICIENT_LOCKED, INVALID_PRINCIPAL
   */
  withdraw(caller: Principal, noteId: NoteId, recipient: Principal): Note {
    const note = this._notes.require(noteId);

    if (note.owner !== caller) {
      throw new VaultError(
        "NOT_NOTE_OWNER",
        `Note ${noteId.toString()} is not owned by "${caller}"`,
      );
    }
    if (note.spent) {
      throw new VaultError(
        "NOTE_ALREADY_SPENT",
        `Note ${noteId.toString()} has already been spent`,
      );
    }
    if (this._totalLocked < note.amount) {
      throw new VaultError(
        "INSUFFICIENT_LOCKED",
        `Locked total ${this._totalLocked.toString()} does not cover note ${noteId.toString()} (${note.amount.toString()})`,
      );
    }
    assertPrincipal(recipient, "Recipient");

    const { custodian, gateway, sink } = this._context;

    return atomically((uow) => {
      uow.onRollback(this._notes.markSpent(noteId));

      const previousTotal = this._totalLocked;
      this._totalLocked = previousTotal - note.amount;
      uow.onRollback(() => {
        this._totalLocked = previousTotal;
      });

      gateway.transfer(custodian, recipient, note.amount);
      uow.onRollback(() => gateway.transfer(recipient, custodian, note.amount));

      sink.emit({
        type: "note.withdrawn",
        actor: caller,
        payload: {
          owner: note.owner,
          noteId: noteId.toString(),
          amount: note.amount.toString(),
        },
      });

      return this._notes.require(noteId);
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  totalLocked(): bigint {
    return this._totalLocked;
  }

  /** Notes ever created, spent ones included. */
  noteCount(): number {
    return this._notes.count();
  }

  /**
   * Owner, amount and spent flag of a note. Throws NOTE_NOT_FOUND.
   */
  noteMetadata(noteId: NoteId): NoteMetadata {
    const note = this._notes.require(noteId);
    return { owner: note.owner, amount: note.amount, spent: note.spent };
  }

  getNote(noteId: NoteId): Note | undefined {
    return this._notes.get(noteId);
  }

  listNotes(filter?: NoteFilter): readonly Note[] {
    return this._notes.list(filter);
  }

  /** Id the next deposit will receive. */
  nextNoteId(): NoteId {
    return this._notes.nextId();
  }

  /**
   * Re-scan every note and compare the unspent sum with the
   * incrementally maintained total.
   */
  checkConsistency(): ConsistencyReport {
    let unspentSum = 0n;
    let unspentCount = 0;
    for (const note of this._notes.list({ spent: false })) {
      unspentSum += note.amount;
      unspentCount += 1;
    }
    return {
      consistent: unspentSum === this._totalLocked,
      totalLocked: this._totalLocked,
      unspentSum,
      unspentCount,
      noteCount: this._notes.count(),
    };
  }

  // ─── Snapshot / Restore ──────────────────────────────────────────────

  /**
   * Serializable state of the vault.
   * Restored with VaultStore.fromSnapshot().
   */
  snapshot(): VaultSnapshot {
    return {
      version: 1,
      admin: this._context.admin,
      custodian: this._context.custodian,
      nextNoteId: this._notes.nextId().toString(),
      totalLocked: this._totalLocked.toString(),
      notes: this._notes.list().map(
        (note): NoteSnapshot => ({
          id: note.id.toString(),
          owner: note.owner,
          commitment: commitmentToHex(note.commitment),
          amount: note.amount.toString(),
          spent: note.spent,
        }),
      ),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a vault from a snapshot.
   *
   * The snapshot must belong to the context's admin and custodian, its
   * ids must be strictly increasing and below nextNoteId, and its
   * locked total must equal the sum of unspent notes.
   *
   * @throws VaultError CORRUPT_SNAPSHOT
   */
  static fromSnapshot(snapshot: VaultSnapshot, context: VaultContext): VaultStore {
    if (snapshot.version !== 1) {
      throw corrupt(`Unsupported snapshot version: ${String(snapshot.version)}`);
    }
    if (snapshot.admin !== context.admin) {
      throw corrupt(`Snapshot belongs to admin "${snapshot.admin}", not "${context.admin}"`);
    }
    if (snapshot.custodian !== context.custodian) {
      throw corrupt(
        `Snapshot custodian "${snapshot.custodian}" does not match "${context.custodian}"`,
      );
    }

    const nextNoteId = parseU64(snapshot.nextNoteId, "nextNoteId");
    const totalLocked = parseU64(snapshot.totalLocked, "totalLocked");

    const notes: Note[] = [];
    let previousId: bigint | undefined;
    let unspentSum = 0n;

    for (const entry of snapshot.notes) {
      const id = parseU64(entry.id, "note id");
      if (previousId !== undefined && id <= previousId) {
        throw corrupt(`Note ids are not strictly increasing at ${entry.id}`);
      }
      if (id >= nextNoteId) {
        throw corrupt(`Note ${entry.id} is not below nextNoteId ${snapshot.nextNoteId}`);
      }
      if (!isPrincipal(entry.owner)) {
        throw corrupt(`Note ${entry.id} has no owner`);
      }
      if (typeof entry.spent !== "boolean") {
        throw corrupt(`Note ${entry.id} has no spent flag`);
      }

      const note: Note = {
        id,
        owner: entry.owner,
        commitment: parseCommitment(entry.commitment, entry.id),
        amount: parseU64(entry.amount, `amount of note ${entry.id}`),
        spent: entry.spent,
      };
      if (!note.spent) unspentSum += note.amount;

      notes.push(note);
      previousId = id;
    }

    if (unspentSum !== totalLocked) {
      throw corrupt(
        `Locked total ${snapshot.totalLocked} does not match unspent notes (${unspentSum.toString()})`,
      );
    }

    return new VaultStore(context, NoteRegistry.restore(notes, nextNoteId), totalLocked);
  }
}

// ─── Snapshot parsing ────────────────────────────────────────────────────

function corrupt(message: string, cause?: unknown): VaultError {
  return new VaultError("CORRUPT_SNAPSHOT", message, { cause });
}

function parseU64(value: string, field: string): bigint {
  if (!isU64String(value)) {
    throw corrupt(`Snapshot ${field} is not a u64 decimal string: "${String(value)}"`);
  }
  return BigInt(value);
}

function parseCommitment(hex: string, id: string): Uint8Array {
  try {
    return commitmentFromHex(hex);
  } catch (err) {
    if (isVaultError(err, "INVALID_COMMITMENT")) {
      throw corrupt(`Note ${id} has an invalid commitment`, err);
    }
    throw err;
  }
}

/**
 * Check that a value read back from storage has the shape of a
 * VaultSnapshot. Field contents are checked by fromSnapshot().
 *
 * @throws VaultError CORRUPT_SNAPSHOT
 */
export function parseVaultSnapshot(value: unknown): VaultSnapshot {
  if (typeof value !== "object" || value === null) {
    throw corrupt("Snapshot is not an object");
  }
  if (!("version" in value) || value.version !== 1) {
    throw corrupt("Unsupported snapshot version");
  }
  if (
    !("admin" in value) ||
    !("custodian" in value) ||
    !("nextNoteId" in value) ||
    !("totalLocked" in value) ||
    !("notes" in value) ||
    !("createdAt" in value)
  ) {
    throw corrupt("Snapshot is missing a field");
  }

  const { admin, custodian, nextNoteId, totalLocked, notes, createdAt } = value;
  if (
    typeof admin !== "string" ||
    typeof custodian !== "string" ||
    typeof nextNoteId !== "string" ||
    typeof totalLocked !== "string" ||
    typeof createdAt !== "string" ||
    !Array.isArray(notes)
  ) {
    throw corrupt("Snapshot has a field of the wrong type");
  }

  return {
    version: 1,
    admin,
    custodian,
    nextNoteId,
    totalLocked,
    notes: notes.map((entry: unknown, index) => parseNoteSnapshot(entry, index)),
    createdAt,
  };
}

function parseNoteSnapshot(entry: unknown, index: number): NoteSnapshot {
  if (
    typeof entry !== "object" ||
    entry === null ||
    !("id" in entry) ||
    !("owner" in entry) ||
    !("commitment" in entry) ||
    !("amount" in entry) ||
    !("spent" in entry)
  ) {
    throw corrupt(`Snapshot note at index ${index} is missing a field`);
  }

  const { id, owner, commitment, amount, spent } = entry;
  if (
    typeof id !== "string" ||
    typeof owner !== "string" ||
    typeof commitment !== "string" ||
    typeof amount !== "string" ||
    typeof spent !== "boolean"
  ) {
    throw corrupt(`Snapshot note at index ${index} has a field of the wrong type`);
  }

  return { id, owner, commitment, amount, spent };
}
