/**
 * Response handlers
 *
 * A handler turns a raw response (status + body text) into a decoded
 * result. The fixed {@link BaseHandler} interprets status codes for every
 * call before the selected handler decodes the body.
 *
 * An empty body decodes to `null`, the success marker for writes and deletes.
 */

import { z } from 'zod';
import {
  MalformedResponseError,
  NoSuchRecordError,
  NotAuthorizedError,
  ServiceError,
  STATUS_CODES,
  type GeoLayerError,
} from '../core/errors.js';
import { isFeature, isFeatureCollection, isGeoJsonDocument, type GeoJsonDocument } from '../model/geojson.js';
import { featureToRecord, type RecordList, type TypedRecord } from '../model/record.js';

// ============================================================================
// Types
// ============================================================================

export interface RawResponse {
  readonly url: string;
  readonly status: number;
  readonly contentType: string | null;
  readonly body: string;
}

export interface ResponseHandler<T> {
  readonly name: string;
  decode(response: RawResponse): T;
}

export type JsonResult = unknown[] | Record<string, unknown>;
export type RecordResult = TypedRecord | RecordList;

/**
 * Decoded result per handler tag
 */
export interface HandlerResults {
  json: JsonResult | null;
  geojson: GeoJsonDocument | null;
  record: RecordResult | null;
  base: null;
}

export type HandlerTag = keyof HandlerResults;
export type ReplaceableHandlerTag = Exclude<HandlerTag, 'base'>;

// ============================================================================
// Body parsing
// ============================================================================

function isEmptyBody(response: RawResponse): boolean {
  return response.status === STATUS_CODES.NO_CONTENT || response.body.trim().length === 0;
}

/**
 * @throws {MalformedResponseError} when the body is not JSON
 */
export function parseJsonBody(response: RawResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new MalformedResponseError(
      `Failed to parse JSON response from ${response.url}: ${error instanceof Error ? error.message : String(error)}`,
      response.body,
      { cause: error }
    );
  }
}

const ServiceErrorBodySchema = z
  .object({
    code: z.number().int().optional(),
    message: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// Base handler
// ============================================================================

/**
 * Status interpretation shared by every operation
 *
 * Error bodies of the form `{ "code": 404, "message": "..." }` take
 * precedence over the HTTP status.
 */
export class BaseHandler implements ResponseHandler<null> {
  readonly name: string = 'base';

  /**
   * @throws {GeoLayerError} for any status of 400 or above
   */
  check(response: RawResponse): void {
    if (response.status < STATUS_CODES.BAD_REQUEST) {
      return;
    }
    throw this.toError(response);
  }

  decode(response: RawResponse): null {
    this.check(response);
    return null;
  }

  protected toError(response: RawResponse): GeoLayerError {
    let code = response.status;
    let message = `HTTP ${response.status}`;

    if (!isEmptyBody(response)) {
      try {
        const parsed = ServiceErrorBodySchema.safeParse(JSON.parse(response.body));
        if (parsed.success) {
          code = parsed.data.code ?? code;
          message = parsed.data.message ?? message;
        }
      } catch {
        // Non-JSON error body: keep the transport status
        message = `${message}: ${response.body.slice(0, 200)}`;
      }
    }

    switch (code) {
      case STATUS_CODES.NOT_AUTHORIZED:
      case STATUS_CODES.FORBIDDEN:
        return new NotAuthorizedError(message);
      case STATUS_CODES.NO_SUCH:
        return new NoSuchRecordError(message);
      default:
        return new ServiceError(code, message);
    }
  }
}

// ============================================================================
// Content handlers
// ============================================================================

const JsonResultSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

/**
 * Raw JSON arrays and objects (contains, overlaps)
 */
export class JsonHandler implements ResponseHandler<JsonResult | null> {
  readonly name: string = 'json';

  decode(response: RawResponse): JsonResult | null {
    if (isEmptyBody(response)) return null;

    const parsed = JsonResultSchema.safeParse(parseJsonBody(response));
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Expected a JSON array or object from ${response.url}`,
        response.body,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }
}

/**
 * GeoJSON documents, foreign members preserved
 */
export class GeoJsonHandler implements ResponseHandler<GeoJsonDocument | null> {
  readonly name: string = 'geojson';

  decode(response: RawResponse): GeoJsonDocument | null {
    if (isEmptyBody(response)) return null;

    const body = parseJsonBody(response);
    if (!isGeoJsonDocument(body)) {
      throw new MalformedResponseError(`Expected a GeoJSON object from ${response.url}`, response.body);
    }
    return body;
  }
}

/**
 * Typed records: a Feature decodes to one record, a FeatureCollection to a
 * {@link RecordList}
 */
export class RecordHandler implements ResponseHandler<RecordResult | null> {
  readonly name: string = 'record';

  decode(response: RawResponse): RecordResult | null {
    if (isEmptyBody(response)) return null;

    const body = parseJsonBody(response);

    try {
      if (isFeatureCollection(body)) {
        return {
          records: body.features.map(featureToRecord),
          nextCursor: typeof body.next_cursor === 'string' && body.next_cursor ? body.next_cursor : null,
        };
      }

      if (isFeature(body)) {
        return featureToRecord(body);
      }
    } catch (error) {
      throw new MalformedResponseError(
        `Response from ${response.url} does not describe records: ${error instanceof Error ? error.message : String(error)}`,
        response.body,
        { cause: error }
      );
    }

    throw new MalformedResponseError(`Expected a Feature or FeatureCollection from ${response.url}`, response.body);
  }
}
