/**
 * @notevault/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - A failed append truncates the file back to its prior length
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format (one line per event, StoredEvent shape):
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fstatSync,
  fsyncSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@notevault/types";
import type { StoredEvent } from "./types.js";
import { BaseEventStore } from "./base-store.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 * The parent directory is created if it doesn't exist; the file itself
 * is created on first append.
 */
export class JsonlEventStore extends BaseEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  /** Path this store writes to. */
  get filePath(): string {
    return this._filePath;
  }

  /** Number of unreadable lines skipped during load. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const lines = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      const size = fstatSync(fd).size;
      try {
        appendFileSync(fd, lines, "utf-8");
        fsyncSync(fd);
      } catch (err) {
        try {
          ftruncateSync(fd, size);
        } catch (truncateErr) {
          throw new AggregateError(
            [err, truncateErr],
            `Append to ${this._filePath} failed and the file could not be truncated to ${size} bytes`,
          );
        }
        throw err;
      }
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Load events from the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (unclean shutdown). Skipped lines
   * leave a gap in the hash chain that verifyIntegrity() reports.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(trimmed);
      } catch {
        this._skippedLines++;
        continue;
      }

      const stored = toStoredEvent(record);
      if (stored === undefined) {
        this._skippedLines++;
        continue;
      }

      this.index(stored);
    }
  }
}

function toStoredEvent(record: unknown): StoredEvent | undefined {
  if (
    typeof record !== "object" ||
    record === null ||
    !("event" in record) ||
    !("streamId" in record) ||
    !("version" in record) ||
    !("globalPosition" in record) ||
    !("appendedAt" in record) ||
    !("hash" in record) ||
    !("previousHash" in record)
  ) {
    return undefined;
  }

  const { event, streamId, version, globalPosition, appendedAt, hash, previousHash } = record;
  if (
    !isDomainEvent(event) ||
    typeof streamId !== "string" ||
    typeof version !== "number" ||
    typeof globalPosition !== "number" ||
    typeof appendedAt !== "string" ||
    typeof hash !== "string" ||
    typeof previousHash !== "string"
  ) {
    return undefined;
  }

  return { event, streamId, version, globalPosition, appendedAt, hash, previousHash };
}
