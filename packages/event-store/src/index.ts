/**
 * @notevault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - SnapshotStore for hash-checked state snapshots
 * - EventCatalog for payload validation
 * - Note vault event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedStoredEvent,
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { BaseEventStore } from "./base-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Snapshots
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  SnapshotStoreError,
  computeSnapshotHash,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";
export type {
  SnapshotStore,
  SnapshotStoreOptions,
  SnapshotStoreErrorCode,
  StoredSnapshot,
  SaveSnapshotOptions,
} from "./snapshot-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Note vault events
export {
  VAULT_EVENTS,
  VAULT_EVENT_SCHEMAS,
  createVaultEventCatalog,
} from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  NoteDepositedPayload,
  NoteWithdrawnPayload,
} from "./vault-events.js";
