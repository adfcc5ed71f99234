/**
 * @notevault/event-store — In-memory EventStore implementation.
 *
 * Suitable for unit tests, short-lived processes and development.
 * All state is lost on process exit.
 */

import type { StoredEvent } from "./types.js";
import { BaseEventStore } from "./base-store.js";

export class InMemoryEventStore extends BaseEventStore {
  protected override persist(_events: readonly StoredEvent[]): void {
    // Nothing to flush; the index is the store.
  }
}
