/**
 * @notevault/event-store — Note vault event definitions.
 *
 * Naming convention: `<entity>.<action>`.
 *
 * Amounts and ids are u64 values carried as decimal strings so that
 * payloads survive JSON and canonicalization unchanged.
 *
 * The deposit event never carries the note's commitment: the field is
 * present and always the empty string.
 */

import { isPrincipal, isU64String } from "@notevault/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

export const VAULT_EVENTS = {
  NOTE_DEPOSITED: "note.deposited",
  NOTE_WITHDRAWN: "note.withdrawn",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// Type aliases (not interfaces) so payloads stay assignable to
// DomainEvent["payload"].

export type NoteDepositedPayload = {
  readonly owner: string;
  readonly amount: string;
  /** Redacted placeholder, always "" */
  readonly commitment: "";
};

export type NoteWithdrawnPayload = {
  readonly owner: string;
  readonly noteId: string;
  readonly amount: string;
};

export type VaultEventPayloads = {
  readonly "note.deposited": NoteDepositedPayload;
  readonly "note.withdrawn": NoteWithdrawnPayload;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

export const VAULT_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.NOTE_DEPOSITED,
    version: 1,
    description: "Value was locked in custody and a note was created",
    source: "ledger",
    validate: (p): p is NoteDepositedPayload =>
      isObject(p) &&
      isPrincipal(p.owner) &&
      isU64String(p.amount) &&
      p.commitment === "",
  },
  {
    type: VAULT_EVENTS.NOTE_WITHDRAWN,
    version: 1,
    description: "A note was redeemed by its owner and its value released",
    source: "ledger",
    validate: (p): p is NoteWithdrawnPayload =>
      isObject(p) &&
      isPrincipal(p.owner) &&
      isU64String(p.noteId) &&
      isU64String(p.amount),
  },
];

/**
 * Create a catalog holding every note vault event.
 */
export function createVaultEventCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of VAULT_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
