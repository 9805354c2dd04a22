/**
 * Cursor pagination for nearby and history results
 *
 * A page may carry `next_cursor` next to its payload. Re-issuing the query
 * with that cursor returns the next page; a page without one is the last.
 */

import { withCursor, type Query } from './query.js';

function readCursor(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Extract the continuation cursor from any decoded page
 */
export function nextCursor(result: unknown): string | null {
  if (typeof result !== 'object' || result === null || Array.isArray(result)) {
    return null;
  }

  if ('next_cursor' in result) {
    return readCursor(result.next_cursor);
  }

  if ('nextCursor' in result) {
    return readCursor(result.nextCursor);
  }

  return null;
}

/**
 * Walk every page of a query
 *
 * @example
 * ```typescript
 * for await (const page of paginate(query, (q) => client.nearby(q).then(settle))) {
 *   render(page);
 * }
 * ```
 */
export async function* paginate<Q extends Query, T>(
  query: Q,
  fetchPage: (query: Q) => Promise<T>
): AsyncGenerator<T, void, undefined> {
  let current: Q = query;

  for (;;) {
    const page = await fetchPage(current);
    yield page;

    const cursor = nextCursor(page);
    if (cursor === null) {
      return;
    }
    current = withCursor(current, cursor);
  }
}
