/**
 * @notevault/types — Shared domain types for the note ledger stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Note types
export type { Principal, NoteId, Note, NoteMetadata } from "./note.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isPrincipal,
  isU64,
  isU64String,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
