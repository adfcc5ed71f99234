/**
 * @notevault/event-store — Shared stream bookkeeping.
 *
 * Both store implementations keep the same in-memory index (per-stream
 * arrays, a global log, the hash chain head). They differ only in how a
 * batch is made durable, which subclasses supply through `persist()`.
 *
 * `persist()` is the last step that can fail: once it returns, the batch
 * is indexed and the append succeeds.
 */

import type { DomainEvent } from "@notevault/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export abstract class BaseEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private _nextGlobalPosition = 1;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  /**
   * Make a batch durable. Called before the in-memory index is updated;
   * if it throws, the append has no effect.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const linked = linkEvent(
        {
          event: {
            type: event.type,
            metadata: event.metadata,
            payload: event.payload,
          },
          streamId,
          version: fromVersion + i,
          globalPosition: this._nextGlobalPosition + i,
          appendedAt,
        },
        previousHash,
      );
      previousHash = linked.hash;
      stored.push(linked);
    });

    this.persist(stored);

    for (const event of stored) {
      this.index(event);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    return stream.filter((e) => e.version >= fromVersion);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return this._globalLog.filter((e) => e.globalPosition >= fromPosition);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Add an already-persisted event to the in-memory index.
   * Also used by subclasses when loading existing events.
   */
  protected index(event: StoredEvent): void {
    let stream = this._streams.get(event.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.streamId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);

    if (event.globalPosition >= this._nextGlobalPosition) {
      this._nextGlobalPosition = event.globalPosition + 1;
    }
    this._lastHash = event.hash;
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}
