/**
 * GeoJSON documents as the service speaks them
 *
 * The service extends RFC 7946 objects with foreign top-level members:
 * `layer` and `created` on records, `next_cursor` on paginated results.
 */

import type { Feature, FeatureCollection, GeoJSON, Geometry, Point } from 'geojson';

export interface ForeignMembers {
  readonly layer?: string;
  readonly created?: number;
  readonly next_cursor?: string | null;
}

/**
 * Any GeoJSON object returned or accepted by the service
 */
export type GeoJsonDocument = GeoJSON & ForeignMembers;

/**
 * Wire form of a single record
 */
export type RecordFeature = Feature<Point> & ForeignMembers;

export type GeoJsonFeature = Feature & ForeignMembers;
export type GeoJsonFeatureCollection = FeatureCollection & ForeignMembers;

const GEOMETRY_TYPES: ReadonlySet<string> = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isGeometry(value: unknown): value is Geometry {
  if (!isObject(value) || typeof value.type !== 'string') {
    return false;
  }
  if (value.type === 'GeometryCollection') {
    return Array.isArray(value.geometries) && value.geometries.every(isGeometry);
  }
  return GEOMETRY_TYPES.has(value.type) && Array.isArray(value.coordinates);
}

export function isFeature(value: unknown): value is GeoJsonFeature {
  return (
    isObject(value) &&
    value.type === 'Feature' &&
    'geometry' in value &&
    (value.geometry === null || isGeometry(value.geometry))
  );
}

export function isFeatureCollection(value: unknown): value is GeoJsonFeatureCollection {
  return (
    isObject(value) &&
    value.type === 'FeatureCollection' &&
    Array.isArray(value.features) &&
    value.features.every(isFeature)
  );
}

/**
 * Shallow structural check of the discriminator and its required member
 */
export function isGeoJsonDocument(value: unknown): value is GeoJsonDocument {
  return isFeature(value) || isFeatureCollection(value) || isGeometry(value);
}
