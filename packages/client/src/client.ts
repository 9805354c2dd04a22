/**
 * GeoLayer Client
 *
 * Facade over the normalizer, request builder, handler registry and
 * dispatcher. Every operation resolves to a {@link Dispatch}: the decoded
 * value in sync mode, a {@link DeferredResult} handle in deferred mode.
 *
 * @example
 * ```typescript
 * const client = new GeoLayerClient({
 *   credentials: { consumerKey: 'key', consumerSecret: 'secret' },
 * });
 *
 * const record = createRecord({ id: 'bus-42', layer: 'com.example.transit', latitude: 37.77, longitude: -122.42 });
 * await client.update(record);
 *
 * client.mode = 'deferred';
 * const dispatch = await client.nearby(nearbyByLatLon(37.77, -122.42, 2, 'com.example.transit'));
 * const page = await settle(dispatch);
 * ```
 */

import { loadConfig, type ExecutionMode, type GeoLayerConfig } from './core/config.js';
import { InvalidRequestError, UnsupportedOperationError } from './core/errors.js';
import { logger as defaultLogger, type LoggerLike } from './core/utils/logger.js';
import { Dispatcher, type Dispatch, type ExecutionContext } from './dispatch/dispatcher.js';
import { WorkerPool, type WorkerPoolStats } from './dispatch/worker-pool.js';
import { HandlerRegistry, type ReplaceableHandlers } from './http/handler-registry.js';
import type { HandlerResults, HandlerTag, RecordResult, ReplaceableHandlerTag, ResponseHandler } from './http/handlers.js';
import { RequestBuilder, type BuiltRequest } from './http/request-builder.js';
import { OAuthSigner, type RequestSigner } from './http/signer.js';
import { HttpTransport, type FetchLike } from './http/transport.js';
import type { Envelope } from './model/envelope.js';
import type { GeoJsonDocument } from './model/geojson.js';
import { documentRecord, type DocumentRecord, type GeoRecord, type TypedRecord } from './model/record.js';
import {
  handlerTagFor,
  isGeoRecord,
  isRecordList,
  resolveLayer,
  resolveRecordIdList,
  toWriteBody,
  type RecordInput,
} from './normalizer/record-normalizer.js';
import { resolveQuery, type HistoryQuery, type NearbyQuery } from './query/query.js';

// ============================================================================
// Types
// ============================================================================

export interface GeoLayerClientOptions extends Partial<GeoLayerConfig> {
  /** fetch implementation for the transport (default: global fetch) */
  readonly fetch?: FetchLike;

  /** Request signer (default: OAuth 1.0a with the configured credentials) */
  readonly signer?: RequestSigner;

  readonly logger?: LoggerLike;

  /** Handlers to register in place of the defaults */
  readonly handlers?: Partial<ReplaceableHandlers>;

  /** Environment to read configuration from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

type Result<K extends HandlerTag> = HandlerResults[K];

/**
 * What a record write, read or delete decodes to, by record variant
 */
export type RecordOperationResult = Result<'record'> | Result<'geojson'>;

// ============================================================================
// Client
// ============================================================================

export class GeoLayerClient {
  readonly config: GeoLayerConfig;

  private readonly context: ExecutionContext;
  private readonly registry: HandlerRegistry;
  private readonly builder: RequestBuilder;
  private readonly pool: WorkerPool;
  private readonly dispatcher: Dispatcher;

  constructor(options: GeoLayerClientOptions = {}) {
    const { fetch, signer, logger, handlers, env, ...overrides } = options;

    this.config = loadConfig(overrides, env);
    this.context = { mode: this.config.mode };
    this.registry = new HandlerRegistry(handlers);
    this.builder = new RequestBuilder(this.config.baseUrl);
    const log = logger ?? defaultLogger;
    this.pool = new WorkerPool({ name: 'geolayer', maxConcurrent: this.config.maxConcurrent, logger: log });
    this.dispatcher = new Dispatcher({
      context: this.context,
      transport: new HttpTransport({
        signer: signer ?? new OAuthSigner(this.config.credentials),
        timeoutMs: this.config.timeoutMs,
        userAgent: this.config.userAgent,
        fetch,
      }),
      base: this.registry.base,
      pool: this.pool,
      logger: log,
    });
  }

  // ==========================================================================
  // Execution settings
  // ==========================================================================

  /**
   * Execution mode for calls started from now on. Calls already started keep
   * the mode they read.
   */
  get mode(): ExecutionMode {
    return this.context.mode;
  }

  set mode(mode: ExecutionMode) {
    this.context.mode = mode;
  }

  setHandler<K extends ReplaceableHandlerTag>(tag: K, handler: ReplaceableHandlers[K]): void {
    this.registry.setHandler(tag, handler);
  }

  getHandler<K extends ReplaceableHandlerTag>(tag: K): ReplaceableHandlers[K];
  getHandler(tag: HandlerTag | string): ResponseHandler<HandlerResults[HandlerTag]>;
  getHandler(tag: HandlerTag | string): ResponseHandler<HandlerResults[HandlerTag]> {
    return this.registry.getHandler(tag);
  }

  getPoolStats(): WorkerPoolStats {
    return this.pool.getStats();
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  /**
   * Fetch the stored state of existing records
   *
   * A single typed record resolves to the first record the service returns,
   * in either mode.
   *
   * @throws {InvalidRequestError} when no layer or no identifier resolves
   */
  retrieve(record: TypedRecord): Promise<Dispatch<TypedRecord | null>>;
  retrieve(records: readonly TypedRecord[]): Promise<Dispatch<Result<'record'>>>;
  retrieve(input: DocumentRecord | readonly DocumentRecord[]): Promise<Dispatch<Result<'geojson'>>>;
  retrieve(input: RecordInput): Promise<Dispatch<RecordOperationResult>>;
  async retrieve(input: RecordInput): Promise<Dispatch<RecordOperationResult>> {
    const layer = requireLayer(input, 'retrieve');
    const ids = resolveRecordIdList(input);
    if (ids.length === 0) {
      throw new InvalidRequestError('retrieve needs at least one record with an id');
    }

    const request = this.builder.retrieve(layer, ids);

    if (handlerTagFor(input) === 'geojson') {
      return this.dispatcher.dispatch(request, this.registry.getHandler('geojson'));
    }
    if (isRecordList(input)) {
      return this.dispatcher.dispatch(request, this.registry.getHandler('record'));
    }
    return this.dispatcher.dispatch(request, this.registry.getHandler('record'), firstRecord);
  }

  /**
   * Fetch records of a layer by identifier
   */
  retrieveByIds(layer: string, ids: readonly string[]): Promise<Dispatch<Result<'geojson'>>>;
  retrieveByIds<K extends ReplaceableHandlerTag>(
    layer: string,
    ids: readonly string[],
    tag: K
  ): Promise<Dispatch<Result<K>>>;
  async retrieveByIds(
    layer: string,
    ids: readonly string[],
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.retrieve(layer, ids), tag);
  }

  /**
   * Create or replace records, or write a GeoJSON document
   *
   * One typed record is sent as a Feature. A Feature document is sent inside
   * a FeatureCollection. A list is sent as a FeatureCollection.
   *
   * @throws {InvalidRequestError} when no layer resolves
   */
  update(input: TypedRecord | readonly TypedRecord[]): Promise<Dispatch<Result<'record'>>>;
  update(input: DocumentRecord | readonly DocumentRecord[] | GeoJsonDocument): Promise<Dispatch<Result<'geojson'>>>;
  update(input: RecordInput | GeoJsonDocument): Promise<Dispatch<RecordOperationResult>>;
  async update(input: RecordInput | GeoJsonDocument): Promise<Dispatch<RecordOperationResult>> {
    const record: RecordInput = isRecordList(input) || isGeoRecord(input) ? input : documentRecord(input);

    const layer = requireLayer(record, 'update');
    const body = toWriteBody(record);
    if (body === null) {
      throw new InvalidRequestError('update needs at least one record');
    }

    return this.dispatchTagged(this.builder.update(layer, body), handlerTagFor(record));
  }

  /**
   * Write a GeoJSON document to a named layer as-is
   */
  updateLayer(layer: string, document: GeoJsonDocument): Promise<Dispatch<Result<'geojson'>>>;
  updateLayer<K extends ReplaceableHandlerTag>(
    layer: string,
    document: GeoJsonDocument,
    tag: K
  ): Promise<Dispatch<Result<K>>>;
  async updateLayer(
    layer: string,
    document: GeoJsonDocument,
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.update(layer, document), tag);
  }

  /**
   * Delete an existing record
   *
   * @throws {InvalidRequestError} when the record has no layer or no id
   */
  delete(record: TypedRecord): Promise<Dispatch<Result<'record'>>>;
  delete(record: DocumentRecord): Promise<Dispatch<Result<'geojson'>>>;
  delete(record: GeoRecord): Promise<Dispatch<RecordOperationResult>>;
  async delete(record: GeoRecord): Promise<Dispatch<RecordOperationResult>> {
    const layer = requireLayer(record, 'delete');
    const [id] = resolveRecordIdList(record);
    if (id === undefined) {
      throw new InvalidRequestError('delete needs a record with an id');
    }

    return this.dispatchTagged(this.builder.delete(layer, id), handlerTagFor(record));
  }

  deleteById(layer: string, id: string): Promise<Dispatch<Result<'geojson'>>>;
  deleteById<K extends ReplaceableHandlerTag>(layer: string, id: string, tag: K): Promise<Dispatch<Result<K>>>;
  async deleteById(
    layer: string,
    id: string,
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.delete(layer, id), tag);
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Records near a geohash or a point. Pages carry `next_cursor` while more
   * results remain.
   */
  nearby(query: NearbyQuery): Promise<Dispatch<Result<'geojson'>>>;
  nearby<K extends ReplaceableHandlerTag>(query: NearbyQuery, tag: K): Promise<Dispatch<Result<K>>>;
  async nearby(
    query: NearbyQuery,
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.query('nearby', resolveQuery(query)), tag);
  }

  /**
   * Where a record has been, most recent first
   *
   * @throws {UnsupportedOperationError} for any handler but `geojson`
   */
  async history(query: HistoryQuery, tag: HandlerTag = 'geojson'): Promise<Dispatch<Result<'geojson'>>> {
    requireTag('history', tag, 'geojson');
    return this.dispatcher.dispatch(
      this.builder.query('history', resolveQuery(query)),
      this.registry.getHandler('geojson')
    );
  }

  /**
   * Nearest street address to a point
   */
  async reverseGeocode(lat: number, lon: number): Promise<Dispatch<Result<'geojson'>>> {
    return this.dispatcher.dispatch(this.builder.reverseGeocode(lat, lon), this.registry.getHandler('geojson'));
  }

  /**
   * Population density around a point
   *
   * @param day - 0 (Sunday) to 6 (Saturday)
   * @param hour - 0 to 23 for one hour; any other value asks for the whole day
   */
  density(day: number, hour: number, lat: number, lon: number): Promise<Dispatch<Result<'geojson'>>>;
  density<K extends ReplaceableHandlerTag>(
    day: number,
    hour: number,
    lat: number,
    lon: number,
    tag: K
  ): Promise<Dispatch<Result<K>>>;
  async density(
    day: number,
    hour: number,
    lat: number,
    lon: number,
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.density(day, hour, lat, lon), tag);
  }

  /**
   * Boundaries containing a point
   *
   * @throws {UnsupportedOperationError} for any handler but `json`
   */
  async contains(lat: number, lon: number, tag: HandlerTag = 'json'): Promise<Dispatch<Result<'json'>>> {
    requireTag('contains', tag, 'json');
    return this.dispatcher.dispatch(this.builder.contains(lat, lon), this.registry.getHandler('json'));
  }

  /**
   * Shape of one boundary feature
   */
  boundaries(featureId: string): Promise<Dispatch<Result<'geojson'>>>;
  boundaries<K extends ReplaceableHandlerTag>(featureId: string, tag: K): Promise<Dispatch<Result<K>>>;
  async boundaries(
    featureId: string,
    tag: ReplaceableHandlerTag = 'geojson'
  ): Promise<Dispatch<Result<ReplaceableHandlerTag>>> {
    return this.dispatchTagged(this.builder.boundary(featureId), tag);
  }

  /**
   * Boundaries intersecting an envelope
   *
   * @param limit - sent only when greater than zero
   * @param featureType - sent only when given
   * @throws {UnsupportedOperationError} for any handler but `json`
   */
  async overlaps(
    envelope: Envelope,
    limit: number,
    featureType?: string | null,
    tag: HandlerTag = 'json'
  ): Promise<Dispatch<Result<'json'>>> {
    requireTag('overlaps', tag, 'json');
    return this.dispatcher.dispatch(
      this.builder.overlaps(envelope, limit, featureType),
      this.registry.getHandler('json')
    );
  }

  private dispatchTagged<K extends ReplaceableHandlerTag>(
    request: BuiltRequest,
    tag: K
  ): Promise<Dispatch<Result<K>>> {
    return this.dispatcher.dispatch<Result<K>>(request, this.registry.getHandler(tag));
  }
}

// ============================================================================
// Preconditions
// ============================================================================

function requireLayer(input: RecordInput, operation: string): string {
  const layer = resolveLayer(input);
  if (layer === null) {
    throw new InvalidRequestError(`${operation} needs a record with a layer`);
  }
  return layer;
}

function requireTag(operation: string, tag: HandlerTag, supported: ReplaceableHandlerTag): void {
  if (tag !== supported) {
    throw new UnsupportedOperationError(operation, tag);
  }
}

function firstRecord(result: RecordResult | null): TypedRecord | null {
  if (result === null) {
    return null;
  }
  return 'records' in result ? (result.records[0] ?? null) : result;
}
