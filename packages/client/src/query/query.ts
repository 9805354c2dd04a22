/**
 * Query objects for the paginated search endpoints
 *
 * Queries are immutable values owned by the caller. The dispatcher only
 * consumes their resolved `{ path, params }` form.
 *
 * @module query
 */

import { pathSegment } from '../http/request-builder.js';
import { formatCoordinate, validateCoordinates } from '../model/coordinates.js';

export type QueryParamValue = string | number | null | undefined;
export type QueryParams = Readonly<Record<string, QueryParamValue>>;

interface QueryBase {
  readonly layer: string;
  /** Soft upper bound on the page size, never a guarantee */
  readonly limit?: number;
  /** Continuation token from a previous page */
  readonly cursor?: string | null;
}

interface NearbyBase extends QueryBase {
  /** Record type filters */
  readonly types?: readonly string[];
  /** Epoch seconds */
  readonly start?: number;
  readonly end?: number;
}

export interface GeohashNearbyQuery extends NearbyBase {
  readonly kind: 'nearby-geohash';
  readonly geohash: string;
}

export interface LatLonNearbyQuery extends NearbyBase {
  readonly kind: 'nearby-latlon';
  readonly lat: number;
  readonly lon: number;
  /** Kilometres */
  readonly radius?: number;
}

export interface HistoryQuery extends QueryBase {
  readonly kind: 'history';
  readonly recordId: string;
}

export type NearbyQuery = GeohashNearbyQuery | LatLonNearbyQuery;
export type Query = NearbyQuery | HistoryQuery;

export interface ResolvedQuery {
  readonly path: string;
  readonly params: QueryParams;
}

export type NearbyOptions = Omit<NearbyBase, 'layer'>;
export type HistoryOptions = Omit<QueryBase, 'layer'>;

// ============================================================================
// Construction
// ============================================================================

export function nearbyByGeohash(geohash: string, layer: string, options: NearbyOptions = {}): GeohashNearbyQuery {
  return { kind: 'nearby-geohash', geohash, layer, ...options };
}

export function nearbyByLatLon(
  lat: number,
  lon: number,
  radius: number | undefined,
  layer: string,
  options: NearbyOptions = {}
): LatLonNearbyQuery {
  return { kind: 'nearby-latlon', lat, lon, radius, layer, ...options };
}

export function historyQuery(recordId: string, layer: string, options: HistoryOptions = {}): HistoryQuery {
  return { kind: 'history', recordId, layer, ...options };
}

export function withCursor<Q extends Query>(query: Q, cursor: string | null): Q {
  return { ...query, cursor };
}

export function withLimit<Q extends Query>(query: Q, limit: number | undefined): Q {
  return { ...query, limit };
}

// ============================================================================
// Resolution
// ============================================================================

function nearbyParams(query: NearbyQuery): Record<string, QueryParamValue> {
  return {
    limit: query.limit,
    types: query.types && query.types.length > 0 ? query.types.join(',') : undefined,
    start: query.start,
    end: query.end,
    cursor: query.cursor,
  };
}

export function resolveQuery(query: Query): ResolvedQuery {
  switch (query.kind) {
    case 'nearby-geohash':
      return {
        path: `/records/${pathSegment(query.layer, 'Layer')}/nearby/${pathSegment(query.geohash, 'Geohash')}.json`,
        params: nearbyParams(query),
      };

    case 'nearby-latlon': {
      const coords = validateCoordinates(query.lat, query.lon);
      return {
        path: `/records/${pathSegment(query.layer, 'Layer')}/nearby/${formatCoordinate(coords.lat)},${formatCoordinate(coords.lon)}.json`,
        params: { ...nearbyParams(query), radius: query.radius },
      };
    }

    case 'history':
      return {
        path: `/records/${pathSegment(query.layer, 'Layer')}/${pathSegment(query.recordId, 'Record id')}/history.json`,
        params: { limit: query.limit, cursor: query.cursor },
      };
  }
}
