/**
 * @notevault/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

/**
 * The `previousHash` of the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Canonical content of an event for hashing. `appendedAt` is included
 * because it is part of the persisted record.
 */
function canonicalEventContent(event: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Link an event into the chain after `previousHash`.
 */
export function linkEvent(
  event: UnhashedStoredEvent,
  previousHash: string,
): StoredEvent {
  return {
    ...event,
    hash: computeEventHash(event, previousHash),
    previousHash,
  };
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    } else if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }

    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
