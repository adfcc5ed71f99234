/**
 * Shared fixtures for event store tests.
 */

import type { DomainEvent } from "@notevault/types";

let seq = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = { type },
): DomainEvent {
  seq++;
  return {
    type,
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: "test",
      correlationId: `corr-${seq}`,
      source: "ledger",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
