/**
 * @notevault/ledger — Audit trail output.
 *
 * The ledger reports each committed transition to an EventSink as the
 * last step of the operation. A sink that throws aborts the operation.
 */

import { randomUUID } from "node:crypto";
import type { Principal } from "@notevault/types";
import { createVaultEventCatalog } from "@notevault/event-store";
import type {
  EventCatalog,
  EventStore,
  VaultEventPayloads,
  VaultEventType,
} from "@notevault/event-store";

/** A vault event before store metadata is attached. */
export type VaultEvent = {
  [K in VaultEventType]: {
    readonly type: K;
    readonly actor: Principal;
    readonly payload: VaultEventPayloads[K];
  };
}[VaultEventType];

export interface EventSink {
  emit(event: VaultEvent): void;
}

export interface EventStoreSinkOptions {
  /** Stream the vault's events go to */
  readonly streamId: string;

  /** Defaults to the vault event catalog */
  readonly catalog?: EventCatalog | undefined;

  /** Defaults to randomUUID */
  readonly idFactory?: (() => string) | undefined;

  /** Defaults to the wall clock */
  readonly clock?: (() => Date) | undefined;
}

/**
 * EventSink that appends to an EventStore stream.
 *
 * Payloads are checked against the catalog before they are appended;
 * an invalid payload throws CatalogError and nothing is written.
 */
export class EventStoreSink implements EventSink {
  readonly streamId: string;
  private readonly _store: EventStore;
  private readonly _catalog: EventCatalog;
  private readonly _idFactory: () => string;
  private readonly _clock: () => Date;

  constructor(store: EventStore, options: EventStoreSinkOptions) {
    this._store = store;
    this.streamId = options.streamId;
    this._catalog = options.catalog ?? createVaultEventCatalog();
    this._idFactory = options.idFactory ?? randomUUID;
    this._clock = options.clock ?? (() => new Date());
  }

  /** Current version of the sink's stream. */
  get version(): number {
    return this._store.streamVersion(this.streamId);
  }

  emit(event: VaultEvent): void {
    this._catalog.assertValid(event.type, event.payload);

    const eventId = this._idFactory();
    this._store.append(this.streamId, [
      {
        type: event.type,
        metadata: {
          eventId,
          timestamp: this._clock().toISOString(),
          actor: event.actor,
          correlationId: eventId,
          source: "ledger",
        },
        payload: event.payload,
      },
    ]);
  }
}

/** Stream id used for a vault keyed by its admin principal. */
export function vaultStreamId(admin: Principal): string {
  return `vault-${admin}`;
}
