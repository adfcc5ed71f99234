/**
 * @notevault/ledger — Note registry.
 *
 * Append-only collection of notes in creation (= id) order.
 *
 * Rules:
 * - Ids come from a counter that only moves forward
 * - Notes are never removed; spending marks a tombstone
 * - Callers only ever see frozen copies
 */

import type { Note, NoteId, Principal } from "@notevault/types";
import type { NoteFilter } from "./types.js";
import { VaultError } from "./types.js";

/** Internal, mutable form of a note. Only `spent` is ever written. */
interface NoteRecord {
  readonly id: NoteId;
  readonly owner: Principal;
  readonly commitment: Uint8Array;
  readonly amount: bigint;
  spent: boolean;
}

/** Registry position a failed operation can rewind to. */
export interface RegistryCheckpoint {
  readonly length: number;
  readonly nextId: NoteId;
}

export class NoteRegistry {
  private readonly _notes: NoteRecord[] = [];
  private readonly _index: Map<NoteId, number> = new Map();
  private _nextId: NoteId = 0n;

  /**
   * Append a new unspent note owned by `owner` and advance the counter.
   * The commitment bytes are copied.
   */
  create(owner: Principal, commitment: Uint8Array, amount: bigint): Note {
    const record: NoteRecord = {
      id: this._nextId,
      owner,
      commitment: commitment.slice(),
      amount,
      spent: false,
    };

    this._index.set(record.id, this._notes.length);
    this._notes.push(record);
    this._nextId += 1n;
    return toNote(record);
  }

  /**
   * Resolve a note by id. Throws NOTE_NOT_FOUND if absent.
   */
  require(id: NoteId): Note {
    return toNote(this.findMut(id));
  }

  get(id: NoteId): Note | undefined {
    const record = this.find(id);
    return record === undefined ? undefined : toNote(record);
  }

  has(id: NoteId): boolean {
    return this._index.has(id);
  }

  /** Notes in id order, optionally filtered by owner and spent state. */
  list(filter?: NoteFilter): readonly Note[] {
    const result: Note[] = [];
    for (const record of this._notes) {
      if (filter?.owner !== undefined && record.owner !== filter.owner) continue;
      if (filter?.spent !== undefined && record.spent !== filter.spent) continue;
      result.push(toNote(record));
    }
    return result;
  }

  /** Number of notes ever created, spent ones included. */
  count(): number {
    return this._notes.length;
  }

  /** Id the next created note will receive. */
  nextId(): NoteId {
    return this._nextId;
  }

  /**
   * Tombstone a note. Throws NOTE_NOT_FOUND or NOTE_ALREADY_SPENT.
   *
   * @returns the step that reverses this, for an enclosing unit of work
   */
  markSpent(id: NoteId): () => void {
    const record = this.findMut(id);
    if (record.spent) {
      throw new VaultError("NOTE_ALREADY_SPENT", `Note ${id.toString()} has already been spent`);
    }
    record.spent = true;
    return () => {
      record.spent = false;
    };
  }

  checkpoint(): RegistryCheckpoint {
    return { length: this._notes.length, nextId: this._nextId };
  }

  /**
   * Drop every note created after `checkpoint` and rewind the counter.
   * Only for aborting an operation that has not completed; committed
   * notes are never removed.
   */
  rollbackTo(checkpoint: RegistryCheckpoint): void {
    while (this._notes.length > checkpoint.length) {
      const record = this._notes.pop();
      if (record === undefined) break;
      this._index.delete(record.id);
    }
    this._nextId = checkpoint.nextId;
  }

  /**
   * Rebuild a registry from already validated notes (ascending ids,
   * all below `nextId`).
   */
  static restore(notes: readonly Note[], nextId: NoteId): NoteRegistry {
    const registry = new NoteRegistry();
    for (const note of notes) {
      registry._index.set(note.id, registry._notes.length);
      registry._notes.push({
        id: note.id,
        owner: note.owner,
        commitment: note.commitment.slice(),
        amount: note.amount,
        spent: note.spent,
      });
    }
    registry._nextId = nextId;
    return registry;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Mutable lookup. Throws NOTE_NOT_FOUND if absent.
   */
  private findMut(id: NoteId): NoteRecord {
    const record = this.find(id);
    if (record === undefined) {
      throw new VaultError("NOTE_NOT_FOUND", `Note ${id.toString()} does not exist`);
    }
    return record;
  }

  private find(id: NoteId): NoteRecord | undefined {
    const position = this._index.get(id);
    return position === undefined ? undefined : this._notes[position];
  }
}

function toNote(record: NoteRecord): Note {
  return Object.freeze({
    id: record.id,
    owner: record.owner,
    commitment: record.commitment.slice(),
    amount: record.amount,
    spent: record.spent,
  });
}
