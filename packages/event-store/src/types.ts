/**
 * @notevault/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by a SHA-256 hash chain
 * - A single writer per process: the ledger appends synchronously, so
 *   no version check is needed between read and append
 */

import type { DomainEvent } from "@notevault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store, before hash linking.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 */
export interface UnhashedStoredEvent {
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A persisted event, linked into the store-wide hash chain.
 */
export interface StoredEvent extends UnhashedStoredEvent {
  /** SHA-256 over the canonical event content plus `previousHash` */
  readonly hash: string;

  /** Hash of the event at globalPosition - 1, or GENESIS_HASH */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number | undefined;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Every event's previousHash equals the hash of its global predecessor
 * - An append that throws leaves no trace
 */
export interface EventStore {
  /**
   * Append one or more events to a stream, all or nothing.
   *
   * @throws EventStoreError for an empty batch or stream id
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Read events from a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Recompute and check the whole hash chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
