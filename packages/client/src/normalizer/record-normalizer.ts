/**
 * Record Normalizer
 *
 * Turns one record, a list of records, or a GeoJSON document into the
 * canonical request body, and independently resolves the layer name and
 * the comma-joined identifier list.
 *
 * Layer and identifier resolution are best-effort: a structure that does not
 * match yields `null` rather than throwing. The client rejects a `null`
 * layer or identifier list before building a request.
 */

import type { Feature } from 'geojson';
import {
  isFeature,
  isFeatureCollection,
  type GeoJsonDocument,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
} from '../model/geojson.js';
import { recordToFeature, type GeoRecord } from '../model/record.js';

export type RecordInput = GeoRecord | readonly GeoRecord[];

export type RecordHandlerTag = 'record' | 'geojson';

export function isRecordList(input: RecordInput | GeoJsonDocument): input is readonly GeoRecord[] {
  return Array.isArray(input);
}

/**
 * Tell a record apart from a bare GeoJSON document
 */
export function isGeoRecord(input: GeoRecord | GeoJsonDocument): input is GeoRecord {
  return 'kind' in input && (input.kind === 'record' || input.kind === 'document');
}

function featureCollection(features: readonly Feature[]): GeoJsonFeatureCollection {
  return { type: 'FeatureCollection', features: [...features] };
}

/**
 * Features a single record contributes to a collection
 */
function toFeatures(record: GeoRecord): Feature[] {
  switch (record.kind) {
    case 'record':
      return [recordToFeature(record)];
    case 'document': {
      const { document } = record;
      if (isFeatureCollection(document)) return [...document.features];
      if (isFeature(document)) return [document];
      return [];
    }
  }
}

// ============================================================================
// Documents
// ============================================================================

/**
 * Canonical document for one record or a list of records
 *
 * @returns `null` for an empty list
 */
export function toDocument(input: RecordInput): GeoJsonDocument | null {
  if (isRecordList(input)) {
    if (input.length === 0) return null;
    return featureCollection(input.flatMap(toFeatures));
  }

  switch (input.kind) {
    case 'record':
      return recordToFeature(input);
    case 'document':
      return input.document;
  }
}

/**
 * Body for a write
 *
 * A single typed record goes out as a bare Feature. A Feature document is
 * wrapped in a one-element FeatureCollection. Lists always become a
 * FeatureCollection. Other documents are sent unchanged.
 */
export function toWriteBody(input: RecordInput): GeoJsonDocument | null {
  if (isRecordList(input)) {
    return toDocument(input);
  }

  if (input.kind === 'document' && isFeature(input.document)) {
    return featureCollection([input.document]);
  }

  return toDocument(input);
}

// ============================================================================
// Layer and identifier resolution
// ============================================================================

function readString(feature: GeoJsonFeature, key: 'layer'): string | null {
  const value = feature[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function featureId(feature: Feature): string | null {
  if (typeof feature.id === 'string' && feature.id.length > 0) return feature.id;
  if (typeof feature.id === 'number') return String(feature.id);
  return null;
}

export function resolveDocumentLayer(document: GeoJsonDocument): string | null {
  if (isFeatureCollection(document)) {
    const first = document.features[0];
    return first && isFeature(first) ? readString(first, 'layer') : null;
  }
  if (isFeature(document)) {
    return readString(document, 'layer');
  }
  return null;
}

export function resolveLayer(input: RecordInput): string | null {
  if (isRecordList(input)) {
    const first = input[0];
    return first ? resolveLayer(first) : null;
  }

  switch (input.kind) {
    case 'record':
      return input.layer.length > 0 ? input.layer : null;
    case 'document':
      return resolveDocumentLayer(input.document);
  }
}

function collectIds(record: GeoRecord): string[] {
  switch (record.kind) {
    case 'record':
      return record.id ? [record.id] : [];
    case 'document': {
      const { document } = record;
      if (isFeatureCollection(document)) {
        return document.features.map(featureId).filter((id): id is string => id !== null);
      }
      if (isFeature(document)) {
        const id = featureId(document);
        return id === null ? [] : [id];
      }
      return [];
    }
  }
}

/**
 * Every identifier found across the input, in order, comma-joined
 *
 * Identifiers accumulate one after another, so a collection holding
 * `a`, `b` and `c` resolves to `a,b,c`.
 *
 * @returns `null` when no identifier is found
 */
export function resolveRecordIds(input: RecordInput): string | null {
  const ids = isRecordList(input) ? input.flatMap(collectIds) : collectIds(input);
  return ids.length > 0 ? ids.join(',') : null;
}

/**
 * Identifiers as a list, for building per-segment encoded paths
 */
export function resolveRecordIdList(input: RecordInput): string[] {
  return isRecordList(input) ? input.flatMap(collectIds) : collectIds(input);
}

/**
 * Typed records decode through the record handler, documents through the
 * GeoJSON handler
 */
export function handlerTagFor(input: RecordInput): RecordHandlerTag {
  const first = isRecordList(input) ? input[0] : input;
  return first?.kind === 'record' ? 'record' : 'geojson';
}
