/**
 * Request Builder
 *
 * Turns an operation and its resolved inputs into a method, a fully
 * qualified URI and, for writes, a JSON body.
 *
 * Query strings carry every non-null parameter exactly once, form-encoded,
 * `&`-joined and prefixed with `?`. Path segments are percent-encoded one
 * by one. Coordinates render with six fixed decimals.
 */

import { InvalidRequestError } from '../core/errors.js';
import { formatLatLon } from '../model/coordinates.js';
import type { Envelope } from '../model/envelope.js';
import type { GeoJsonDocument } from '../model/geojson.js';
import type { QueryParams, ResolvedQuery } from '../query/query.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type OperationName =
  | 'retrieve'
  | 'update'
  | 'delete'
  | 'nearby'
  | 'history'
  | 'reverseGeocode'
  | 'density'
  | 'contains'
  | 'boundary'
  | 'overlaps';

export interface BuiltRequest {
  readonly operation: OperationName;
  readonly method: HttpMethod;
  readonly uri: string;
  readonly body?: string;
  readonly contentType?: string;
}

export const JSON_CONTENT_TYPE = 'application/json';

// ============================================================================
// URL helpers
// ============================================================================

/**
 * Append form-encoded query parameters, skipping null and undefined values
 */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) {
      search.append(key, String(value));
    }
  }

  const query = search.toString();
  return query.length > 0 ? `${url}?${query}` : url;
}

/**
 * Percent-encode one path segment
 *
 * @throws {InvalidRequestError} when the value is empty
 */
export function pathSegment(value: string, name: string): string {
  if (value.length === 0) {
    throw new InvalidRequestError(`${name} must not be empty`);
  }
  return encodeURIComponent(value);
}

// ============================================================================
// Density
// ============================================================================

/**
 * Day codes indexed like `Date#getDay()` (Sunday = 0)
 */
export const DAY_CODES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;

export type DayCode = (typeof DAY_CODES)[number];

export function dayCode(day: number): DayCode {
  const code = Number.isInteger(day) ? DAY_CODES[day] : undefined;
  if (code === undefined) {
    throw new InvalidRequestError(`Day must be an integer from 0 (Sunday) to 6 (Saturday), got ${day}`);
  }
  return code;
}

/**
 * Hours 0-23 select the hour-qualified path; anything else means the whole day
 */
export function isHourOfDay(hour: number): boolean {
  return Number.isInteger(hour) && hour >= 0 && hour <= 23;
}

export function densityPath(day: number, hour: number, lat: number, lon: number): string {
  const code = dayCode(day);
  const point = formatLatLon(lat, lon);
  return isHourOfDay(hour) ? `/density/${code}/${hour}/${point}.json` : `/density/${code}/${point}.json`;
}

// ============================================================================
// Request builders
// ============================================================================

export class RequestBuilder {
  constructor(private readonly baseUrl: string) {}

  retrieve(layer: string, recordIds: readonly string[]): BuiltRequest {
    if (recordIds.length === 0) {
      throw new InvalidRequestError('At least one record id is required');
    }
    const ids = recordIds.map((id) => pathSegment(id, 'Record id')).join(',');
    return this.get('retrieve', `/records/${pathSegment(layer, 'Layer')}/${ids}.json`);
  }

  update(layer: string, document: GeoJsonDocument): BuiltRequest {
    return {
      operation: 'update',
      method: 'POST',
      uri: this.url(`/records/${pathSegment(layer, 'Layer')}.json`),
      body: JSON.stringify(document),
      contentType: JSON_CONTENT_TYPE,
    };
  }

  delete(layer: string, recordId: string): BuiltRequest {
    return {
      operation: 'delete',
      method: 'DELETE',
      uri: this.url(`/records/${pathSegment(layer, 'Layer')}/${pathSegment(recordId, 'Record id')}.json`),
    };
  }

  query(operation: 'nearby' | 'history', resolved: ResolvedQuery): BuiltRequest {
    return this.get(operation, resolved.path, resolved.params);
  }

  reverseGeocode(lat: number, lon: number): BuiltRequest {
    return this.get('reverseGeocode', `/nearby/address/${formatLatLon(lat, lon)}.json`);
  }

  density(day: number, hour: number, lat: number, lon: number): BuiltRequest {
    return this.get('density', densityPath(day, hour, lat, lon));
  }

  contains(lat: number, lon: number): BuiltRequest {
    return this.get('contains', `/contains/${formatLatLon(lat, lon)}.json`);
  }

  boundary(featureId: string): BuiltRequest {
    return this.get('boundary', `/boundary/${pathSegment(featureId, 'Feature id')}.json`);
  }

  overlaps(envelope: Envelope, limit?: number, featureType?: string | null): BuiltRequest {
    return this.get('overlaps', `/overlaps/${envelope.toPathSegment()}.json`, {
      limit: limit !== undefined && limit > 0 ? Math.floor(limit) : undefined,
      type: featureType,
    });
  }

  private get(operation: OperationName, path: string, params?: QueryParams): BuiltRequest {
    return { operation, method: 'GET', uri: buildUrl(this.url(path), params) };
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }
}
