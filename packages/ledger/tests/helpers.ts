/**
 * Shared fixtures for ledger tests.
 */

import type { Principal } from "@notevault/types";
import { InMemoryEventStore } from "@notevault/event-store";
import type { EventSink, VaultEvent } from "../src/event-sink.js";
import { EventStoreSink, vaultStreamId } from "../src/event-sink.js";
import type { TransferGateway } from "../src/transfer-gateway.js";
import { InMemoryTransferGateway } from "../src/transfer-gateway.js";
import type { VaultContext } from "../src/types.js";
import { VaultStore } from "../src/vault-store.js";

export const ADMIN = "admin";
export const CUSTODIAN = "vault-custody";
export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";

/** Sink that keeps every event in memory. */
export class RecordingSink implements EventSink {
  readonly events: VaultEvent[] = [];

  emit(event: VaultEvent): void {
    this.events.push(event);
  }
}

/** Sink that throws on events of one type, or on every event. */
export class FailingSink implements EventSink {
  readonly events: VaultEvent[] = [];

  constructor(private readonly failOn?: VaultEvent["type"]) {}

  emit(event: VaultEvent): void {
    if (this.failOn === undefined || this.failOn === event.type) {
      throw new Error(`sink rejected ${event.type}`);
    }
    this.events.push(event);
  }
}

/**
 * Gateway that delegates to an in-memory book but refuses transfers
 * matching `shouldFail`.
 */
export class FlakyGateway implements TransferGateway {
  constructor(
    readonly book: InMemoryTransferGateway,
    private readonly shouldFail: (from: Principal, to: Principal) => boolean,
  ) {}

  transfer(from: Principal, to: Principal, amount: bigint): void {
    if (this.shouldFail(from, to)) {
      throw new Error(`transfer ${from} -> ${to} refused`);
    }
    this.book.transfer(from, to, amount);
  }
}

export interface Harness {
  readonly vault: VaultStore;
  readonly gateway: InMemoryTransferGateway;
  readonly sink: RecordingSink;
  readonly context: VaultContext;
}

/** A fresh vault whose depositors each hold 1000. */
export function makeHarness(): Harness {
  const gateway = new InMemoryTransferGateway([
    [ALICE, 1000n],
    [BOB, 1000n],
    [CAROL, 1000n],
  ]);
  const sink = new RecordingSink();
  const context: VaultContext = { admin: ADMIN, custodian: CUSTODIAN, gateway, sink };
  return { vault: VaultStore.create(context), gateway, sink, context };
}

/** A fresh vault writing its audit trail to an in-memory event store. */
export function makeStoreHarness(): {
  vault: VaultStore;
  gateway: InMemoryTransferGateway;
  store: InMemoryEventStore;
  streamId: string;
} {
  const gateway = new InMemoryTransferGateway([[ALICE, 1000n]]);
  const store = new InMemoryEventStore();
  const streamId = vaultStreamId(ADMIN);
  const sink = new EventStoreSink(store, { streamId });
  const vault = VaultStore.create({ admin: ADMIN, custodian: CUSTODIAN, gateway, sink });
  return { vault, gateway, store, streamId };
}

/**
 * Run `fn` and return the `code` of the error it throws, or undefined
 * if it returns. Errors without a string code are rethrown.
 */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
