/**
 * @notevault/ledger — Types for the note ledger.
 *
 * Rules:
 * - Everything handed to callers is readonly
 * - Notes are never removed; spent notes are tombstones
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Principal } from "@notevault/types";
import type { TransferGateway } from "./transfer-gateway.js";
import type { EventSink } from "./event-sink.js";

/** Largest u64 value. Ids, amounts and the locked total never exceed it. */
export const U64_MAX = (1n << 64n) - 1n;

// ─── Context ─────────────────────────────────────────────────────────────

/**
 * Everything a VaultStore needs from its host. The store holds no
 * globals; every operation goes through the handle built from this.
 */
export interface VaultContext {
  /** Administrative principal; the only one allowed to initialize */
  readonly admin: Principal;

  /** Principal holding custodied value between deposit and withdrawal */
  readonly custodian: Principal;

  readonly gateway: TransferGateway;
  readonly sink: EventSink;
}

// ─── Queries ─────────────────────────────────────────────────────────────

export interface NoteFilter {
  readonly owner?: Principal | undefined;
  readonly spent?: boolean | undefined;
}

/**
 * Result of a full re-scan of the note collection.
 * `consistent` is true when the incrementally maintained total matches
 * the sum of unspent notes.
 */
export interface ConsistencyReport {
  readonly consistent: boolean;
  readonly totalLocked: bigint;
  readonly unspentSum: bigint;
  readonly unspentCount: number;
  readonly noteCount: number;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * A note in serialized form: u64 values as decimal strings,
 * commitment as lowercase hex.
 */
export interface NoteSnapshot {
  readonly id: string;
  readonly owner: Principal;
  readonly commitment: string;
  readonly amount: string;
  readonly spent: boolean;
}

/**
 * Serializable snapshot of a vault record.
 * Restored with VaultStore.fromSnapshot().
 */
export interface VaultSnapshot {
  readonly version: 1;
  readonly admin: Principal;
  readonly custodian: Principal;
  readonly nextNoteId: string;
  readonly totalLocked: string;
  readonly notes: readonly NoteSnapshot[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type VaultErrorCode =
  | "NOT_ADMIN"
  | "ALREADY_INITIALIZED"
  | "NOT_INITIALIZED"
  | "NOTE_NOT_FOUND"
  | "NOT_NOTE_OWNER"
  | "NOTE_ALREADY_SPENT"
  | "INSUFFICIENT_LOCKED"
  | "INVALID_AMOUNT"
  | "INVALID_COMMITMENT"
  | "INVALID_PRINCIPAL"
  | "LOCKED_OVERFLOW"
  | "CORRUPT_SNAPSHOT"
  | "ROLLBACK_FAILED";

/**
 * Structured error from the note ledger.
 * Always thrown — never returned as a status value.
 */
export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
  }
}

/** Type guard for VaultError with an optional specific code. */
export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}

