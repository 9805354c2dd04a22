/**
 * Record model
 *
 * A record is either a typed record built by the caller or a GeoJSON
 * document handed through unchanged. The two variants form a closed union
 * discriminated by `kind`.
 */

import { z } from 'zod';
import type { GeoJsonDocument, RecordFeature } from './geojson.js';

// ============================================================================
// Types
// ============================================================================

export interface TypedRecord {
  readonly kind: 'record';
  /** Assigned by the caller or the service; absent until then */
  readonly id?: string;
  readonly layer: string;
  readonly type: string;
  readonly latitude: number;
  readonly longitude: number;
  /** Epoch seconds */
  readonly created: number;
  readonly properties: Readonly<Record<string, unknown>>;
}

export interface DocumentRecord {
  readonly kind: 'document';
  readonly document: GeoJsonDocument;
}

export type GeoRecord = TypedRecord | DocumentRecord;

/**
 * Decoded page of records with the continuation cursor, if any
 */
export interface RecordList {
  readonly records: readonly TypedRecord[];
  readonly nextCursor: string | null;
}

export interface RecordInit {
  readonly id?: string;
  readonly layer: string;
  readonly type?: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly created?: number;
  readonly properties?: Readonly<Record<string, unknown>>;
}

export const DEFAULT_RECORD_TYPE = 'object';

// ============================================================================
// Construction
// ============================================================================

export function createRecord(init: RecordInit): TypedRecord {
  return {
    kind: 'record',
    id: init.id,
    layer: init.layer,
    type: init.type ?? DEFAULT_RECORD_TYPE,
    latitude: init.latitude,
    longitude: init.longitude,
    created: init.created ?? Math.floor(Date.now() / 1000),
    properties: { ...init.properties },
  };
}

export function documentRecord(document: GeoJsonDocument): DocumentRecord {
  return { kind: 'document', document };
}

// ============================================================================
// Wire encoding
// ============================================================================

export function recordToFeature(record: TypedRecord): RecordFeature {
  const feature: RecordFeature = {
    type: 'Feature',
    layer: record.layer,
    created: record.created,
    geometry: {
      type: 'Point',
      coordinates: [record.longitude, record.latitude],
    },
    properties: {
      ...record.properties,
      type: record.type,
    },
  };

  return record.id === undefined ? feature : { ...feature, id: record.id };
}

const RecordFeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  layer: z.string().min(1),
  created: z.number().optional(),
  geometry: z.object({
    type: z.literal('Point'),
    coordinates: z.array(z.number()).min(2),
  }),
  properties: z.record(z.unknown()).nullable().optional(),
});

/**
 * Decode one wire feature into a typed record
 *
 * @throws {z.ZodError} when the feature is not a point record with a layer
 */
export function featureToRecord(value: unknown): TypedRecord {
  const feature = RecordFeatureSchema.parse(value);
  const wireProperties: Record<string, unknown> = feature.properties ?? {};
  const { type, ...properties } = wireProperties;
  const [longitude = 0, latitude = 0] = feature.geometry.coordinates;

  return {
    kind: 'record',
    id: feature.id === undefined ? undefined : String(feature.id),
    layer: feature.layer,
    type: typeof type === 'string' ? type : DEFAULT_RECORD_TYPE,
    latitude,
    longitude,
    created: feature.created ?? 0,
    properties,
  };
}
