/**
 * @notevault/ledger — Durable vault deployment.
 *
 * A vault whose audit stream outlives the process also needs its
 * record to. Every committed transition saves a snapshot of the record
 * tagged with the stream version the transition's event will take;
 * on boot the latest snapshot is restored once its version matches the
 * stream head.
 */

import type { Principal } from "@notevault/types";
import type { EventCatalog, EventStore, SnapshotStore } from "@notevault/event-store";
import { VaultDeployment } from "./deployment.js";
import type { EventSink, VaultEvent } from "./event-sink.js";
import { EventStoreSink, vaultStreamId } from "./event-sink.js";
import type { InMemoryTransferGateway, TransferGateway } from "./transfer-gateway.js";
import type { VaultSnapshot } from "./types.js";
import { VaultError } from "./types.js";
import type { VaultStore } from "./vault-store.js";
import { parseVaultSnapshot } from "./vault-store.js";

// ─── Companion state ─────────────────────────────────────────────────────

/**
 * State outside the vault record that is saved and restored with it,
 * such as the book of an in-process gateway. Captured values must be
 * plain JSON.
 */
export interface SnapshotCompanion {
  capture(): unknown;
  restore(state: unknown): void;
}

/** Companion that keeps an InMemoryTransferGateway's balances. */
export function gatewayCompanion(gateway: InMemoryTransferGateway): SnapshotCompanion {
  return {
    capture: () => {
      const book: Record<Principal, string> = {};
      for (const [principal, amount] of gateway.balances()) {
        book[principal] = amount.toString();
      }
      return book;
    },
    restore: (state) => {
      if (typeof state !== "object" || state === null || Array.isArray(state)) {
        throw new VaultError("CORRUPT_SNAPSHOT", "Saved gateway book is not an object");
      }
      const entries: [Principal, bigint][] = [];
      for (const [principal, amount] of Object.entries(state)) {
        if (typeof amount !== "string" || !/^(0|[1-9]\d*)$/.test(amount)) {
          throw new VaultError(
            "CORRUPT_SNAPSHOT",
            `Saved balance of "${principal}" is not a decimal string`,
          );
        }
        entries.push([principal, BigInt(amount)]);
      }
      gateway.replaceBalances(entries);
    },
  };
}

/** What a durable deployment stores per snapshot. */
export interface DurableState {
  readonly vault: VaultSnapshot;
  readonly companion?: unknown;
}

function parseDurableState(value: unknown): DurableState {
  if (typeof value !== "object" || value === null || !("vault" in value)) {
    throw new VaultError("CORRUPT_SNAPSHOT", "Saved state holds no vault record");
  }
  const vault = parseVaultSnapshot(value.vault);
  return "companion" in value ? { vault, companion: value.companion } : { vault };
}

// ─── SnapshottingSink ────────────────────────────────────────────────────

/**
 * EventSink that saves a snapshot before it appends the event.
 *
 * The snapshot is saved at the version the event will take. If the
 * append fails the snapshot is deleted again, leaving the previous
 * version as the latest.
 */
export class SnapshottingSink implements EventSink {
  private readonly _inner: EventStoreSink;
  private readonly _snapshots: SnapshotStore;
  private readonly _capture: () => unknown;

  constructor(inner: EventStoreSink, snapshots: SnapshotStore, capture: () => unknown) {
    this._inner = inner;
    this._snapshots = snapshots;
    this._capture = capture;
  }

  emit(event: VaultEvent): void {
    const streamId = this._inner.streamId;
    const version = this._inner.version + 1;
    this._snapshots.save({ streamId, version, state: this._capture() });

    try {
      this._inner.emit(event);
    } catch (err) {
      try {
        this._snapshots.delete(streamId, version);
      } catch (deleteErr) {
        throw new VaultError(
          "ROLLBACK_FAILED",
          `Snapshot ${version} of ${streamId} could not be removed after a failed append`,
          { cause: new AggregateError([err, deleteErr]) },
        );
      }
      throw err;
    }
  }
}

// ─── openDurableDeployment ───────────────────────────────────────────────

export interface DurableDeploymentOptions {
  readonly admin: Principal;
  readonly custodian: Principal;
  readonly gateway: TransferGateway;
  readonly events: EventStore;
  readonly snapshots: SnapshotStore;
  readonly catalog?: EventCatalog | undefined;
  readonly companion?: SnapshotCompanion | undefined;
}

export interface DurableDeployment {
  readonly deployment: VaultDeployment;
  readonly streamId: string;

  /** Stream version the record was restored at, if one was restored */
  readonly restoredVersion: number | undefined;
}

/**
 * Build a deployment on an event stream and a snapshot store, restoring
 * the record when the stream already holds one.
 *
 * A snapshot one version ahead of the stream is left over from an
 * append that never landed; it is discarded.
 *
 * @throws VaultError CORRUPT_SNAPSHOT when the stream holds events but
 *   no snapshot matches its head
 */
export function openDurableDeployment(options: DurableDeploymentOptions): DurableDeployment {
  const { admin, custodian, gateway, events, snapshots, companion } = options;
  const streamId = vaultStreamId(admin);
  const inner = new EventStoreSink(events, { streamId, catalog: options.catalog });

  const stateOf = (vault: VaultStore): DurableState =>
    companion === undefined
      ? { vault: vault.snapshot() }
      : { vault: vault.snapshot(), companion: companion.capture() };

  const deployment: VaultDeployment = new VaultDeployment(
    {
      admin,
      custodian,
      gateway,
      sink: new SnapshottingSink(inner, snapshots, () => stateOf(deployment.vault())),
    },
    {
      onInitialize: (vault) => {
        snapshots.save({ streamId, version: inner.version, state: stateOf(vault) });
      },
    },
  );

  const head = inner.version;
  let stored = snapshots.load(streamId);
  if (stored !== undefined && stored.version === head + 1) {
    snapshots.delete(streamId, stored.version);
    stored = snapshots.load(streamId);
  }

  if (stored === undefined) {
    if (head > 0) {
      throw new VaultError(
        "CORRUPT_SNAPSHOT",
        `Stream ${streamId} holds ${head} event(s) but no vault snapshot`,
      );
    }
    return { deployment, streamId, restoredVersion: undefined };
  }

  if (stored.version !== head) {
    throw new VaultError(
      "CORRUPT_SNAPSHOT",
      `Snapshot of ${streamId} is at version ${stored.version} but the stream is at ${head}`,
    );
  }

  const state = parseDurableState(stored.state);
  deployment.restore(state.vault);
  if (companion !== undefined && state.companion !== undefined) {
    companion.restore(state.companion);
  }
  return { deployment, streamId, restoredVersion: stored.version };
}
