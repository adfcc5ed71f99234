/**
 * Tests for EventCatalog and the note vault event definitions.
 */

import { describe, it, expect } from "vitest";
import { CatalogError, EventCatalog } from "../src/catalog.js";
import { createVaultEventCatalog, VAULT_EVENTS } from "../src/vault-events.js";

describe("EventCatalog", () => {
  it("registers and lists schemas", () => {
    const catalog = new EventCatalog();
    catalog.register({
      type: "b.happened",
      version: 1,
      description: "b",
      source: "node",
      validate: () => true,
    });
    catalog.register({
      type: "a.happened",
      version: 1,
      description: "a",
      source: "ledger",
      validate: () => true,
    });

    expect(catalog.size).toBe(2);
    expect(catalog.listTypes()).toEqual(["a.happened", "b.happened"]);
    expect(catalog.listBySource("node").map((s) => s.type)).toEqual(["b.happened"]);
  });

  it("replaces a schema registered under a new version", () => {
    const catalog = new EventCatalog();
    catalog.register({ type: "x", version: 1, description: "", source: "ledger", validate: () => false });
    catalog.register({ type: "x", version: 2, description: "", source: "ledger", validate: () => true });

    expect(catalog.getSchema("x")?.version).toBe(2);
    expect(catalog.validate("x", {})).toBe(true);
  });

  it("rejects non-positive versions", () => {
    const catalog = new EventCatalog();
    expect(() =>
      catalog.register({ type: "x", version: 0, description: "", source: "ledger", validate: () => true }),
    ).toThrow(CatalogError);
  });

  it("fails validation for unknown types", () => {
    const catalog = new EventCatalog();
    expect(catalog.validate("nope", {})).toBe(false);
    expect(() => catalog.assertValid("nope", {})).toThrow('Unknown event type "nope"');
  });
});

describe("vault event catalog", () => {
  const catalog = createVaultEventCatalog();

  it("holds both vault events", () => {
    expect(catalog.listTypes()).toEqual(["note.deposited", "note.withdrawn"]);
  });

  it("accepts a redacted deposit payload", () => {
    expect(
      catalog.validate(VAULT_EVENTS.NOTE_DEPOSITED, {
        owner: "alice",
        amount: "100",
        commitment: "",
      }),
    ).toBe(true);
  });

  it("rejects a deposit payload that carries commitment bytes", () => {
    expect(
      catalog.validate(VAULT_EVENTS.NOTE_DEPOSITED, {
        owner: "alice",
        amount: "100",
        commitment: "6331",
      }),
    ).toBe(false);
  });

  it("rejects a deposit payload without the placeholder", () => {
    expect(
      catalog.validate(VAULT_EVENTS.NOTE_DEPOSITED, { owner: "alice", amount: "100" }),
    ).toBe(false);
  });

  it("accepts a withdrawal payload", () => {
    expect(
      catalog.validate(VAULT_EVENTS.NOTE_WITHDRAWN, {
        owner: "alice",
        noteId: "0",
        amount: "100",
      }),
    ).toBe(true);
  });

  it("rejects non-decimal amounts", () => {
    expect(
      catalog.validate(VAULT_EVENTS.NOTE_WITHDRAWN, {
        owner: "alice",
        noteId: "0",
        amount: 100,
      }),
    ).toBe(false);
    expect(() =>
      catalog.assertValid(VAULT_EVENTS.NOTE_WITHDRAWN, { owner: "alice", noteId: "x", amount: "1" }),
    ).toThrow('Payload does not match schema "note.withdrawn" v1');
  });
});
