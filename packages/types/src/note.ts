/**
 * Note Types
 *
 * A note is one locked-and-redeemable claim on custodied value.
 *
 * Rules:
 * - Ids and amounts are unsigned 64-bit integers, carried as bigint
 * - (id, owner, commitment, amount) never change after creation
 * - `spent` flips false → true once and is never reset
 * - Notes are never removed; a spent note is a tombstone
 */

/**
 * An authenticated account identity supplied by the host.
 * The ledger compares principals for equality and nothing else.
 */
export type Principal = string;

/** Note identifier (u64). */
export type NoteId = bigint;

/**
 * A read-only view of a note.
 */
export interface Note {
  readonly id: NoteId;

  /** Principal entitled to redeem the note */
  readonly owner: Principal;

  /** Opaque, application-defined bytes; never interpreted by the ledger */
  readonly commitment: Uint8Array;

  /** Locked quantity (u64), fixed at creation */
  readonly amount: bigint;

  /** True once the note has been withdrawn */
  readonly spent: boolean;
}

/**
 * Public metadata of a note: everything except the commitment.
 */
export interface NoteMetadata {
  readonly owner: Principal;
  readonly amount: bigint;
  readonly spent: boolean;
}
