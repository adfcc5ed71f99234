/**
 * @notevault/ledger — Custodial note ledger.
 *
 * Provides:
 * - VaultStore with deposit/withdraw transitions and queries
 * - VaultDeployment for the one-record-per-deployment lifecycle
 * - NoteRegistry, the append-only note collection
 * - TransferGateway and EventSink seams, with in-memory and
 *   event-store implementations
 * - UnitOfWork for all-or-nothing operations
 * - Durable deployments that snapshot the record at every transition
 *
 * @packageDocumentation
 */

// Types
export type {
  VaultContext,
  NoteFilter,
  ConsistencyReport,
  NoteSnapshot,
  VaultSnapshot,
  VaultErrorCode,
} from "./types.js";
export { U64_MAX, VaultError, isVaultError } from "./types.js";

// Encoding helpers
export {
  EMPTY_COMMITMENT,
  assertAmount,
  parseAmount,
  assertPrincipal,
  commitmentFromHex,
  commitmentToHex,
  commitmentFromText,
} from "./u64.js";

// Core
export { NoteRegistry } from "./note-registry.js";
export type { RegistryCheckpoint } from "./note-registry.js";
export { VaultStore, parseVaultSnapshot } from "./vault-store.js";
export { VaultDeployment } from "./deployment.js";
export type { VaultDeploymentOptions } from "./deployment.js";
export { UnitOfWork, atomically } from "./unit-of-work.js";
export type { UndoStep } from "./unit-of-work.js";

// Seams
export type { TransferGateway, TransferErrorCode, TransferRecord } from "./transfer-gateway.js";
export { TransferError, InMemoryTransferGateway } from "./transfer-gateway.js";
export type { EventSink, VaultEvent, EventStoreSinkOptions } from "./event-sink.js";
export { EventStoreSink, vaultStreamId } from "./event-sink.js";

// Durability
export {
  SnapshottingSink,
  gatewayCompanion,
  openDurableDeployment,
} from "./durable.js";
export type {
  SnapshotCompanion,
  DurableState,
  DurableDeploymentOptions,
  DurableDeployment,
} from "./durable.js";

// Convenience
export {
  withdrawToSelf,
  depositWithoutCommitment,
  noteExists,
  isVaultEmpty,
} from "./convenience.js";
