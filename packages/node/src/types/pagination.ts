/**
 * Cursor-based pagination over event positions.
 *
 * Cursors are base64url-encoded JSON objects: { f, v } (field, last seen
 * position). List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";

// =============================================================================
// Types
// =============================================================================

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

// =============================================================================
// Cursor Encoding
// =============================================================================

const CursorSchema = z.object({
  f: z.string(),
  v: z.number().int(),
});

export function encodeCursor(field: string, value: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * @returns the decoded cursor, or undefined when it is malformed
 */
export function decodeCursor(cursor: string): { field: string; value: number } | undefined {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(json);
  return parsed.success ? { field: parsed.data.f, value: parsed.data.v } : undefined;
}

/**
 * Page through items sorted ascending by a numeric position.
 * A cursor for a different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      filtered = filtered.filter((item) => getPosition(item) > after);
    }
  }

  // One extra item tells us whether another page exists
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor = hasMore && last !== undefined ? encodeCursor(fieldName, getPosition(last)) : null;
  return { data, pagination: { cursor, hasMore } };
}
