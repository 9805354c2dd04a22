/**
 * Query and Pagination Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '../../../core/errors.js';
import { nextCursor, paginate } from '../../../query/pagination.js';
import {
  historyQuery,
  nearbyByGeohash,
  nearbyByLatLon,
  resolveQuery,
  withCursor,
  withLimit,
  type Query,
} from '../../../query/query.js';

describe('resolveQuery', () => {
  it('should resolve a geohash search with its filters', () => {
    const query = nearbyByGeohash('9q8yy', 'com.example.transit', {
      limit: 10,
      types: ['bus', 'tram'],
      start: 100,
      end: 200,
    });

    expect(resolveQuery(query)).toEqual({
      path: '/records/com.example.transit/nearby/9q8yy.json',
      params: { limit: 10, types: 'bus,tram', start: 100, end: 200, cursor: undefined },
    });
  });

  it('should resolve a point search with its radius', () => {
    const resolved = resolveQuery(nearbyByLatLon(37.5, -122.25, 2, 'com.example.transit'));

    expect(resolved.path).toBe('/records/com.example.transit/nearby/37.500000,-122.250000.json');
    expect(resolved.params.radius).toBe(2);
    expect(resolved.params.types).toBeUndefined();
  });

  it('should encode history path segments', () => {
    expect(resolveQuery(historyQuery('bus 1', 'com.example.transit', { limit: 5 }))).toEqual({
      path: '/records/com.example.transit/bus%201/history.json',
      params: { limit: 5, cursor: undefined },
    });
  });

  it('should reject empty path segments', () => {
    expect(() => resolveQuery(nearbyByGeohash('9q8yy', ''))).toThrow('Layer must not be empty');
    expect(() => resolveQuery(nearbyByGeohash('', 'com.example.transit'))).toThrow('Geohash must not be empty');
    expect(() => resolveQuery(historyQuery('', 'com.example.transit'))).toThrow(InvalidRequestError);
  });

  it('should reject out-of-range points', () => {
    expect(() => resolveQuery(nearbyByLatLon(95, 0, undefined, 'com.example.transit'))).toThrow(InvalidRequestError);
  });
});

describe('withCursor', () => {
  it('should return a new query and leave the original alone', () => {
    const query = historyQuery('bus-1', 'com.example.transit');
    const next = withLimit(withCursor(query, 'c2'), 20);

    expect(next).toEqual({ kind: 'history', recordId: 'bus-1', layer: 'com.example.transit', cursor: 'c2', limit: 20 });
    expect(query.cursor).toBeUndefined();
  });
});

describe('nextCursor', () => {
  it('should read the wire and decoded cursor fields', () => {
    expect(nextCursor({ type: 'FeatureCollection', features: [], next_cursor: 'abc' })).toBe('abc');
    expect(nextCursor({ records: [], nextCursor: 'def' })).toBe('def');
  });

  it('should treat missing or empty cursors as the last page', () => {
    expect(nextCursor({ type: 'FeatureCollection', features: [], next_cursor: '' })).toBeNull();
    expect(nextCursor({ records: [], nextCursor: null })).toBeNull();
    expect(nextCursor([{ next_cursor: 'abc' }])).toBeNull();
    expect(nextCursor(null)).toBeNull();
  });
});

describe('paginate', () => {
  it('should re-issue the query with each cursor until none remains', async () => {
    const pages: Record<string, { readonly items: number[]; readonly next_cursor?: string }> = {
      first: { items: [1, 2, 3], next_cursor: 'p2' },
      p2: { items: [4, 5], next_cursor: 'p3' },
      p3: { items: [6] },
    };
    const seen: Array<string | null | undefined> = [];

    const fetchPage = async (query: Query): Promise<{ readonly items: number[]; readonly next_cursor?: string }> => {
      seen.push(query.cursor);
      return pages[query.cursor ?? 'first'] ?? { items: [] };
    };

    const items: number[] = [];
    for await (const page of paginate(historyQuery('bus-1', 'com.example.transit'), fetchPage)) {
      items.push(...page.items);
    }

    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect(seen).toEqual([undefined, 'p2', 'p3']);
  });
});
