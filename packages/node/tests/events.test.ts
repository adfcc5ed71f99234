/**
 * Tests for event query routes.
 *
 * The vault's transitions are the only writers; events are produced
 * by driving the vault routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ADMIN, ALICE, asPrincipal, createTestApp, jsonRequest } from "./setup.js";
import type { AppInstance } from "../src/app.js";

interface EventsBody {
  data: {
    streamId: string;
    version: number;
    globalPosition: number;
    event: { type: string; payload: Record<string, unknown>; metadata: { actor: string } };
  }[];
  pagination: { cursor: string | null; hasMore: boolean };
}

let instance: AppInstance;

beforeEach(async () => {
  instance = createTestApp();
  const { app } = instance;
  await app.request(jsonRequest("/api/v1/vault/initialize", "POST", undefined, asPrincipal(ADMIN)));
  await app.request(
    jsonRequest("/api/v1/vault/deposits", "POST", { amount: "100", commitment: "6331" }, asPrincipal(ALICE)),
  );
  await app.request(
    jsonRequest("/api/v1/vault/deposits", "POST", { amount: "5" }, asPrincipal(ALICE)),
  );
  await app.request(jsonRequest("/api/v1/vault/notes/0/withdraw", "POST", {}, asPrincipal(ALICE)));
});

describe("GET /api/v1/events", () => {
  it("lists every transition in order", async () => {
    const res = await instance.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    const body = (await res.json()) as EventsBody;
    expect(body.data.map((e) => e.event.type)).toEqual([
      "note.deposited",
      "note.deposited",
      "note.withdrawn",
    ]);
    expect(body.data.map((e) => e.globalPosition)).toEqual([1, 2, 3]);
  });

  it("never exposes the commitment", async () => {
    const res = await instance.app.request("/api/v1/events");
    const body = (await res.json()) as EventsBody;

    expect(body.data[0]?.event.payload).toEqual({
      owner: ALICE,
      amount: "100",
      commitment: "",
    });
  });

  it("supports pagination with limit", async () => {
    const res = await instance.app.request("/api/v1/events?limit=2");
    const body = (await res.json()) as EventsBody;

    expect(body.data).toHaveLength(2);
    expect(body.pagination.hasMore).toBe(true);
    expect(body.pagination.cursor).not.toBeNull();
  });

  it("filters by event type", async () => {
    const res = await instance.app.request("/api/v1/events?type=note.deposited");
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.globalPosition)).toEqual([1, 2]);
  });

  it("rejects an unknown event type", async () => {
    const res = await instance.app.request("/api/v1/events?type=note.burned");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("serves the hash chain links", async () => {
    const res = await instance.app.request("/api/v1/events");
    const body = (await res.json()) as {
      data: { hash: string; previousHash: string }[];
    };

    expect(body.data[1]?.previousHash).toBe(body.data[0]?.hash);
    expect(body.data[0]?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("starts after a given position", async () => {
    const res = await instance.app.request("/api/v1/events?afterPosition=2");
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.event.type)).toEqual(["note.withdrawn"]);
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("returns the vault stream", async () => {
    const res = await instance.app.request("/api/v1/events/vault-admin");
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.version)).toEqual([1, 2, 3]);
    expect(body.data[2]?.event.payload).toEqual({ owner: ALICE, noteId: "0", amount: "100" });
    expect(body.data[2]?.event.metadata.actor).toBe(ALICE);
  });

  it("combines afterVersion with a type filter", async () => {
    const res = await instance.app.request(
      "/api/v1/events/vault-admin?afterVersion=1&type=note.deposited",
    );
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.version)).toEqual([2]);
  });

  it("returns an empty list for an unknown stream", async () => {
    const res = await instance.app.request("/api/v1/events/nothing-here");
    const body = (await res.json()) as EventsBody;

    expect(body.data).toEqual([]);
    expect(body.pagination.hasMore).toBe(false);
  });
});
