/**
 * VaultService — Composition root for the note ledger.
 *
 * Route handlers delegate to this service; they never import the
 * ledger directly. One service backs one deployment: one admin, one
 * vault record, one audit stream.
 *
 * The record and the balance book are snapshotted at every transition
 * and restored when the service is built on a stream that already
 * holds events.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Note, NoteId, Principal } from "@notevault/types";
import {
  EMPTY_COMMITMENT,
  InMemoryTransferGateway,
  VaultError,
  commitmentFromHex,
  gatewayCompanion,
  openDurableDeployment,
  parseAmount,
} from "@notevault/ledger";
import type { VaultDeployment } from "@notevault/ledger";
import type { ConsistencyReport, NoteFilter } from "@notevault/ledger";
import { InMemoryEventStore, InMemorySnapshotStore } from "@notevault/event-store";
import type {
  EventStore,
  SnapshotStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@notevault/event-store";
import type { VaultStateDto } from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly admin: Principal;
  readonly custodian: Principal;

  /** Audit trail; defaults to an in-memory store */
  readonly eventStore?: EventStore | undefined;

  /** Vault record snapshots; defaults to an in-memory store */
  readonly snapshotStore?: SnapshotStore | undefined;

  /** Balance book; defaults to an empty one */
  readonly gateway?: InMemoryTransferGateway | undefined;

  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly eventStore: EventStore;
  readonly snapshotStore: SnapshotStore;
  readonly gateway: InMemoryTransferGateway;
  readonly deployment: VaultDeployment;
  readonly streamId: string;

  private readonly _logger: Logger;

  /**
   * @throws VaultError CORRUPT_SNAPSHOT when the stream holds events
   *   that no saved snapshot matches
   */
  constructor(config: VaultServiceConfig) {
    this.eventStore = config.eventStore ?? new InMemoryEventStore();
    this.snapshotStore = config.snapshotStore ?? new InMemorySnapshotStore();
    this.gateway = config.gateway ?? new InMemoryTransferGateway();
    this._logger = (config.logger ?? pino({ level: "silent" })).child({
      component: "vault-service",
    });

    const durable = openDurableDeployment({
      admin: config.admin,
      custodian: config.custodian,
      gateway: this.gateway,
      events: this.eventStore,
      snapshots: this.snapshotStore,
      companion: gatewayCompanion(this.gateway),
    });
    this.deployment = durable.deployment;
    this.streamId = durable.streamId;

    if (durable.restoredVersion !== undefined) {
      const vault = this.deployment.vault();
      this._logger.info(
        {
          version: durable.restoredVersion,
          noteCount: vault.noteCount(),
          totalLocked: vault.totalLocked().toString(),
        },
        "vault restored from snapshot",
      );
    }
  }

  // ─── Lifecycle ───────────────────────────────────────────────────

  initialize(caller: Principal): VaultStateDto {
    this.deployment.initialize(caller);
    this._logger.info({ admin: caller }, "vault initialized");
    return this.state();
  }

  state(): VaultStateDto {
    const { admin, custodian } = this.deployment;
    if (!this.deployment.isInitialized()) {
      return {
        initialized: false,
        admin,
        custodian,
        totalLocked: "0",
        noteCount: 0,
        nextNoteId: "0",
      };
    }

    const vault = this.deployment.vault();
    return {
      initialized: true,
      admin,
      custodian,
      totalLocked: vault.totalLocked().toString(),
      noteCount: vault.noteCount(),
      nextNoteId: vault.nextNoteId().toString(),
    };
  }

  // ─── Transitions ─────────────────────────────────────────────────

  /**
   * @param amount u64 as a decimal string
   * @param commitment hex, empty when omitted
   */
  deposit(depositor: Principal, amount: string, commitment?: string): Note {
    const vault = this.deployment.vault();
    const note = vault.deposit(
      depositor,
      commitment === undefined ? EMPTY_COMMITMENT : commitmentFromHex(commitment),
      parseAmount(amount),
    );

    this._logger.info(
      {
        noteId: note.id.toString(),
        owner: note.owner,
        amount: note.amount.toString(),
        totalLocked: vault.totalLocked().toString(),
      },
      "note deposited",
    );
    return note;
  }

  withdraw(caller: Principal, noteId: NoteId, recipient: Principal): Note {
    const vault = this.deployment.vault();
    const note = vault.withdraw(caller, noteId, recipient);

    this._logger.info(
      {
        noteId: note.id.toString(),
        owner: note.owner,
        recipient,
        amount: note.amount.toString(),
        totalLocked: vault.totalLocked().toString(),
      },
      "note withdrawn",
    );
    return note;
  }

  // ─── Queries ─────────────────────────────────────────────────────

  /** Throws NOTE_NOT_FOUND for an unknown id. */
  getNote(noteId: NoteId): Note {
    const note = this.deployment.vault().getNote(noteId);
    if (note === undefined) {
      throw new VaultError("NOTE_NOT_FOUND", `Note ${noteId.toString()} does not exist`);
    }
    return note;
  }

  listNotes(filter?: NoteFilter): readonly Note[] {
    return this.deployment.vault().listNotes(filter);
  }

  audit(): ConsistencyReport {
    return this.deployment.vault().checkConsistency();
  }

  balanceOf(principal: Principal): bigint {
    return this.gateway.balanceOf(principal);
  }

  // ─── Event Store ─────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
