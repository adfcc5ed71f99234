/**
 * @notevault/ledger — Convenience wrappers over VaultStore.
 */

import type { Note, NoteId, Principal } from "@notevault/types";
import { EMPTY_COMMITMENT } from "./u64.js";
import type { VaultStore } from "./vault-store.js";

/** Withdraw a note to its own owner. */
export function withdrawToSelf(vault: VaultStore, caller: Principal, noteId: NoteId): Note {
  return vault.withdraw(caller, noteId, caller);
}

/** Deposit with an empty commitment. */
export function depositWithoutCommitment(
  vault: VaultStore,
  depositor: Principal,
  amount: bigint,
): Note {
  return vault.deposit(depositor, EMPTY_COMMITMENT, amount);
}

export function noteExists(vault: VaultStore, noteId: NoteId): boolean {
  return vault.getNote(noteId) !== undefined;
}

/** True when nothing is locked. Spent notes may still exist. */
export function isVaultEmpty(vault: VaultStore): boolean {
  return vault.totalLocked() === 0n;
}
