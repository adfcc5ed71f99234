/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used at system
 * boundaries (API inputs, deserialized files, snapshots).
 */

import type { Principal } from "./note.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

const U64_MAX = (1n << 64n) - 1n;
const DECIMAL_U64 = /^(0|[1-9][0-9]*)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Note guards
// =============================================================================

export function isPrincipal(value: unknown): value is Principal {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * True for a bigint within the u64 range.
 */
export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

/**
 * True for a canonical decimal string that encodes a u64
 * (no sign, no leading zeros, no exponent).
 */
export function isU64String(value: unknown): value is string {
  return (
    typeof value === "string" &&
    DECIMAL_U64.test(value) &&
    BigInt(value) <= U64_MAX
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "gateway", "node"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    (value.causationId === undefined || typeof value.causationId === "string") &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
