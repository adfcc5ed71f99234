/**
 * Event Types
 *
 * Append-only audit trail.
 * Every state change of the note ledger is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE — only new events
 */

/** Subsystems allowed to emit events. */
export type EventSource = "ledger" | "gateway" | "node";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal or component that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "note.deposited") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
