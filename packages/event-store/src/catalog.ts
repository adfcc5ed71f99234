/**
 * @notevault/event-store — Event Catalog.
 *
 * A registry of typed event definitions (type string → payload schema).
 * Emitters validate payloads against it before appending, so that the
 * audit trail only ever carries shapes that readers know how to decode.
 *
 * Unknown event types fail validation; the catalog never guesses.
 */

import type { EventSource } from "@notevault/types";

/**
 * A versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "note.deposited") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** Returns true if the payload matches this schema version. */
  validate(payload: unknown): boolean;
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a different version
   * replaces the previous definition.
   *
   * @throws CatalogError if the version is not a positive integer
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns false for invalid payloads and for unregistered types
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * Like validate(), but throws a CatalogError naming the problem.
   */
  assertValid(eventType: string, payload: unknown): void {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    if (!schema.validate(payload)) {
      throw new CatalogError(
        `Payload does not match schema "${eventType}" v${schema.version}`,
      );
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  readonly code = "INVALID_EVENT" as const;

  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
