/**
 * @notevault/event-store — Snapshot Store.
 *
 * Snapshots are point-in-time captures of the state behind a stream,
 * each tagged with the stream version it was taken at. A process
 * restarts by loading the latest snapshot and checking its version
 * against the stream head.
 *
 * Design principles:
 * - Each snapshot includes a stateHash for integrity verification
 * - Several versions per stream are kept so a failed append can fall
 *   back to the previous one; older versions are pruned on save
 * - A snapshot that cannot be read or fails its hash is an error,
 *   never a silent miss
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { EventStoreError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeSnapshotHash(state: unknown): string {
  const canonical = canonicalize(state);
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * A stored snapshot with metadata.
 */
export interface StoredSnapshot<TState = unknown> {
  /** The stream this snapshot belongs to */
  readonly streamId: string;

  /** The stream version this snapshot was taken at */
  readonly version: number;

  readonly state: TState;

  readonly createdAt: string;

  /** SHA-256 of the canonical state */
  readonly stateHash: string;
}

export interface SaveSnapshotOptions {
  readonly streamId: string;
  readonly version: number;
  readonly state: unknown;
}

/**
 * Verify that a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

export type SnapshotStoreErrorCode = "SNAPSHOT_UNREADABLE" | "SNAPSHOT_TAMPERED";

export class SnapshotStoreError extends Error {
  constructor(
    public readonly code: SnapshotStoreErrorCode,
    message: string,
    public readonly streamId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SnapshotStoreError";
  }
}

/**
 * Snapshot store interface.
 */
export interface SnapshotStore {
  /**
   * Save a snapshot, replacing any snapshot of the same stream at the
   * same version.
   *
   * @throws EventStoreError INVALID_VERSION for a negative or
   *   fractional version
   */
  save(options: SaveSnapshotOptions): void;

  /**
   * Load the latest snapshot for a stream.
   *
   * @throws SnapshotStoreError if the stored snapshot is unreadable or
   *   its hash does not match
   */
  load(streamId: string): StoredSnapshot | undefined;

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined;

  /** Delete the snapshot of a stream at one version, if present. */
  delete(streamId: string, version: number): void;

  deleteAll(streamId: string): void;

  hasSnapshot(streamId: string): boolean;
}

export interface SnapshotStoreOptions {
  /** Versions kept per stream; at least 2, default 2 */
  readonly retain?: number | undefined;

  /** Defaults to the wall clock */
  readonly clock?: (() => Date) | undefined;
}

const DEFAULT_RETAIN = 2;

function resolveRetain(retain: number | undefined): number {
  const value = retain ?? DEFAULT_RETAIN;
  if (!Number.isInteger(value) || value < 2) {
    throw new RangeError(`Snapshot retain must be an integer of at least 2, got ${value}`);
  }
  return value;
}

function assertVersion(streamId: string, version: number): void {
  if (!Number.isInteger(version) || version < 0) {
    throw new EventStoreError(
      "INVALID_VERSION",
      `Snapshot version must be a non-negative integer, got ${version}`,
      streamId,
    );
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * In-memory snapshot store. Suitable for tests and development.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  /** streamId → version-sorted snapshots */
  private readonly _snapshots = new Map<string, StoredSnapshot[]>();
  private readonly _retain: number;
  private readonly _clock: () => Date;

  constructor(options: SnapshotStoreOptions = {}) {
    this._retain = resolveRetain(options.retain);
    this._clock = options.clock ?? (() => new Date());
  }

  save(options: SaveSnapshotOptions): void {
    assertVersion(options.streamId, options.version);

    const kept = (this._snapshots.get(options.streamId) ?? []).filter(
      (s) => s.version !== options.version,
    );
    kept.push({
      streamId: options.streamId,
      version: options.version,
      state: options.state,
      createdAt: this._clock().toISOString(),
      stateHash: computeSnapshotHash(options.state),
    });
    kept.sort((a, b) => a.version - b.version);

    this._snapshots.set(options.streamId, kept.slice(-this._retain));
  }

  load(streamId: string): StoredSnapshot | undefined {
    const snapshots = this._snapshots.get(streamId);
    if (snapshots === undefined) {
      return undefined;
    }
    return snapshots[snapshots.length - 1];
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    return this._snapshots.get(streamId)?.find((s) => s.version === version);
  }

  delete(streamId: string, version: number): void {
    const snapshots = this._snapshots.get(streamId);
    if (snapshots === undefined) {
      return;
    }
    const kept = snapshots.filter((s) => s.version !== version);
    if (kept.length === 0) {
      this._snapshots.delete(streamId);
    } else {
      this._snapshots.set(streamId, kept);
    }
  }

  deleteAll(streamId: string): void {
    this._snapshots.delete(streamId);
  }

  hasSnapshot(streamId: string): boolean {
    return this._snapshots.has(streamId);
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * File-based snapshot store.
 *
 * Stores each snapshot as a JSON file:
 *   <baseDir>/<streamId>/<version>.json
 *
 * A snapshot is written to a temporary file, flushed, and renamed into
 * place, so a crash leaves either the old file set or the new one.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly _baseDir: string;
  private readonly _retain: number;
  private readonly _clock: () => Date;

  constructor(baseDir: string, options: SnapshotStoreOptions = {}) {
    this._baseDir = baseDir;
    this._retain = resolveRetain(options.retain);
    this._clock = options.clock ?? (() => new Date());
    mkdirSync(this._baseDir, { recursive: true });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  save(options: SaveSnapshotOptions): void {
    assertVersion(options.streamId, options.version);

    const dir = this._streamDir(options.streamId);
    mkdirSync(dir, { recursive: true });

    const snapshot: StoredSnapshot = {
      streamId: options.streamId,
      version: options.version,
      state: options.state,
      createdAt: this._clock().toISOString(),
      stateHash: computeSnapshotHash(options.state),
    };

    const filePath = this._snapshotPath(options.streamId, options.version);
    const tempPath = `${filePath}.tmp`;
    const fd = openSync(tempPath, "w");
    try {
      writeFileSync(fd, JSON.stringify(snapshot, null, 2), "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);

    const versions = this._listVersions(options.streamId);
    for (const stale of versions.slice(0, -this._retain)) {
      unlinkSync(this._snapshotPath(options.streamId, stale));
    }
  }

  load(streamId: string): StoredSnapshot | undefined {
    const latest = this._listVersions(streamId).at(-1);
    if (latest === undefined) {
      return undefined;
    }
    return this._readSnapshot(streamId, latest);
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    return this._readSnapshot(streamId, version);
  }

  delete(streamId: string, version: number): void {
    const filePath = this._snapshotPath(streamId, version);
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
  }

  deleteAll(streamId: string): void {
    const dir = this._streamDir(streamId);
    if (!existsSync(dir)) {
      return;
    }
    for (const file of readdirSync(dir)) {
      unlinkSync(join(dir, file));
    }
  }

  hasSnapshot(streamId: string): boolean {
    return this._listVersions(streamId).length > 0;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _streamDir(streamId: string): string {
    // Sanitize stream ID for filesystem use
    const safe = streamId.replace(/[^a-zA-Z0-9_.-]/g, "_");
    return join(this._baseDir, safe);
  }

  private _snapshotPath(streamId: string, version: number): string {
    return join(this._streamDir(streamId), `${version}.json`);
  }

  private _listVersions(streamId: string): number[] {
    const dir = this._streamDir(streamId);
    if (!existsSync(dir)) {
      return [];
    }

    const versions: number[] = [];
    for (const file of readdirSync(dir)) {
      const match = /^(\d+)\.json$/.exec(file);
      if (match?.[1] !== undefined) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  private _readSnapshot(streamId: string, version: number): StoredSnapshot | undefined {
    const filePath = this._snapshotPath(streamId, version);
    if (!existsSync(filePath)) {
      return undefined;
    }

    let record: unknown;
    try {
      record = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new SnapshotStoreError(
        "SNAPSHOT_UNREADABLE",
        `Snapshot ${filePath} is not valid JSON`,
        streamId,
        { cause: err },
      );
    }

    const snapshot = toStoredSnapshot(record);
    if (snapshot === undefined || snapshot.streamId !== streamId || snapshot.version !== version) {
      throw new SnapshotStoreError(
        "SNAPSHOT_UNREADABLE",
        `Snapshot ${filePath} does not hold stream "${streamId}" at version ${version}`,
        streamId,
      );
    }
    if (!verifySnapshotIntegrity(snapshot)) {
      throw new SnapshotStoreError(
        "SNAPSHOT_TAMPERED",
        `Snapshot ${filePath} does not match its state hash`,
        streamId,
      );
    }
    return snapshot;
  }
}

function toStoredSnapshot(record: unknown): StoredSnapshot | undefined {
  if (
    typeof record !== "object" ||
    record === null ||
    !("streamId" in record) ||
    !("version" in record) ||
    !("state" in record) ||
    !("createdAt" in record) ||
    !("stateHash" in record)
  ) {
    return undefined;
  }

  const { streamId, version, state, createdAt, stateHash } = record;
  if (
    typeof streamId !== "string" ||
    typeof version !== "number" ||
    typeof createdAt !== "string" ||
    typeof stateHash !== "string"
  ) {
    return undefined;
  }

  return { streamId, version, state, createdAt, stateHash };
}
