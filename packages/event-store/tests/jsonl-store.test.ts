/**
 * Tests for JsonlEventStore.
 *
 * Verifies:
 * - Persistence: events survive store recreation
 * - Crash safety: partial/corrupt lines are skipped
 * - File creation: directory and file created on demand
 * - Chain continuity across restarts
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlEventStore } from "../src/jsonl-store.js";
import { makeEvent, makeEvents } from "./helpers.js";

let testDir: string;
let testFile: string;

beforeEach(() => {
  testDir = join(
    tmpdir(),
    `notevault-jsonl-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
  );
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "events.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe("JsonlEventStore", () => {
  it("does not create the file until the first append", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    expect(existsSync(testFile)).toBe(false);
    expect(store.globalPosition()).toBe(0);
  });

  it("creates missing parent directories", () => {
    const nested = join(testDir, "a", "b", "events.jsonl");
    const store = new JsonlEventStore({ filePath: nested });
    store.append("s", [makeEvent("x")]);
    expect(existsSync(nested)).toBe(true);
    expect(store.filePath).toBe(nested);
  });

  it("writes one line per event", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(3));

    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(3);
    const first = JSON.parse(lines[0] ?? "") as { streamId: string; version: number };
    expect(first.streamId).toBe("s");
    expect(first.version).toBe(1);
  });

  it("reloads events after restart", () => {
    const first = new JsonlEventStore({ filePath: testFile });
    first.append("a", makeEvents(2));
    first.append("b", makeEvents(1));

    const reopened = new JsonlEventStore({ filePath: testFile });

    expect(reopened.globalPosition()).toBe(3);
    expect(reopened.streamVersion("a")).toBe(2);
    expect(reopened.readAll().map((e) => e.event.type)).toEqual(
      first.readAll().map((e) => e.event.type),
    );
  });

  it("continues the hash chain after restart", () => {
    const first = new JsonlEventStore({ filePath: testFile });
    first.append("a", makeEvents(2));

    const reopened = new JsonlEventStore({ filePath: testFile });
    reopened.append("a", makeEvents(1));

    const all = reopened.readAll();
    expect(all[2]?.previousHash).toBe(all[1]?.hash);
    expect(reopened.verifyIntegrity().valid).toBe(true);
  });

  it("skips a torn trailing line", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(2));
    appendFileSync(testFile, '{"event":{"type":"partial"', "utf-8");

    const reopened = new JsonlEventStore({ filePath: testFile });

    expect(reopened.globalPosition()).toBe(2);
    expect(reopened.skippedLines).toBe(1);
    expect(reopened.verifyIntegrity().valid).toBe(true);
  });

  it("skips well-formed JSON that is not a stored event", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(1));
    appendFileSync(testFile, '{"hello":"world"}\n', "utf-8");

    const reopened = new JsonlEventStore({ filePath: testFile });

    expect(reopened.globalPosition()).toBe(1);
    expect(reopened.skippedLines).toBe(1);
  });

  it("reports a chain break when a middle line is lost", () => {
    const store = new JsonlEventStore({ filePath: testFile });
    store.append("s", makeEvents(3));

    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    const damaged = join(testDir, "damaged.jsonl");
    appendFileSync(damaged, `${lines[0]}\nnot-json\n${lines[2]}\n`, "utf-8");

    const reopened = new JsonlEventStore({ filePath: damaged });
    const integrity = reopened.verifyIntegrity();

    expect(integrity.valid).toBe(false);
    expect(integrity.lastVerifiedPosition).toBe(1);
    expect(integrity.errors[0]?.position).toBe(3);
  });
});
