/**
 * Cursor pagination for list endpoints.
 *
 * Response shape: { data, pagination: { cursor, hasMore } }. A cursor is
 * base64url JSON `{ f, v }`: the sort field and the last key served.
 * Sort keys are fixed-width strings, so string order is numeric order.
 */

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// ─── Sort Keys ───────────────────────────────────────────────────────

/** u64 key: 20 digits covers 2^64 - 1. */
export function u64SortKey(value: bigint): string {
  return value.toString().padStart(20, "0");
}

/** Event store position or version key. */
export function positionSortKey(value: number): string {
  return String(value).padStart(16, "0");
}

// ─── Cursors ─────────────────────────────────────────────────────────

export function encodeCursor(field: string, value: string): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * @returns undefined when the cursor is not one encodeCursor produced
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: string } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }

  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    typeof data.f === "string" &&
    typeof data.v === "string"
  ) {
    return { field: data.f, value: data.v };
  }
  return undefined;
}

// ─── Paging ──────────────────────────────────────────────────────────

/**
 * Page through items already sorted ascending by `sortKey`.
 *
 * A cursor for a different field, or one that does not decode, is
 * ignored and the first page is served.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  sortKey: (item: T) => string,
  field: string,
): PaginatedResponse<T> {
  const after =
    query.cursor === undefined ? undefined : decodeCursor(query.cursor);
  const remaining =
    after === undefined || after.field !== field
      ? items
      : items.filter((item) => sortKey(item) > after.value);

  const candidates = remaining.slice(0, query.limit + 1);
  const hasMore = candidates.length > query.limit;
  const data = hasMore ? candidates.slice(0, query.limit) : candidates;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(field, sortKey(last)) : null,
      hasMore,
    },
  };
}
