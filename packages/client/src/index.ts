/**
 * @geolayer/client
 *
 * Client for the GeoLayer geodata service: store, retrieve and delete
 * location records, and run nearby, history, density, reverse geocoding and
 * boundary queries.
 */

export { GeoLayerClient, type GeoLayerClientOptions, type RecordOperationResult } from './client.js';

// Configuration
export {
  CLIENT_VERSION,
  DEFAULT_CONFIG,
  getCredentialsFromEnv,
  loadConfig,
  type ExecutionMode,
  type GeoLayerConfig,
  type OAuthCredentials,
} from './core/config.js';

// Errors
export {
  GeoLayerError,
  InvalidRequestError,
  MalformedResponseError,
  NoSuchRecordError,
  NotAuthorizedError,
  ServiceError,
  STATUS_CODES,
  TransportError,
  UnsupportedOperationError,
  isGeoLayerError,
  type ErrorKind,
} from './core/errors.js';

export { Logger, createLogger, logger, type LogLevel, type LogMetadata, type LoggerLike } from './core/utils/logger.js';

// Model
export { CoordinateSchema, formatCoordinate, formatLatLon, validateCoordinates } from './model/coordinates.js';
export { Envelope, type EnvelopeBounds } from './model/envelope.js';
export {
  isFeature,
  isFeatureCollection,
  isGeoJsonDocument,
  isGeometry,
  type ForeignMembers,
  type GeoJsonDocument,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
  type RecordFeature,
} from './model/geojson.js';
export {
  DEFAULT_RECORD_TYPE,
  createRecord,
  documentRecord,
  featureToRecord,
  recordToFeature,
  type DocumentRecord,
  type GeoRecord,
  type RecordInit,
  type RecordList,
  type TypedRecord,
} from './model/record.js';

// Normalizer
export {
  handlerTagFor,
  resolveLayer,
  resolveRecordIds,
  toDocument,
  toWriteBody,
  type RecordInput,
} from './normalizer/record-normalizer.js';

// Queries
export {
  historyQuery,
  nearbyByGeohash,
  nearbyByLatLon,
  resolveQuery,
  withCursor,
  withLimit,
  type GeohashNearbyQuery,
  type HistoryQuery,
  type LatLonNearbyQuery,
  type NearbyQuery,
  type Query,
} from './query/query.js';
export { nextCursor, paginate } from './query/pagination.js';

// HTTP
export { HandlerRegistry, type ReplaceableHandlers } from './http/handler-registry.js';
export {
  BaseHandler,
  GeoJsonHandler,
  JsonHandler,
  RecordHandler,
  type HandlerResults,
  type HandlerTag,
  type RawResponse,
  type ReplaceableHandlerTag,
  type ResponseHandler,
} from './http/handlers.js';
export { RequestBuilder, buildUrl, dayCode, pathSegment, type BuiltRequest, type HttpMethod } from './http/request-builder.js';
export { OAuthSigner, SigningError, type RequestSigner, type SignableRequest } from './http/signer.js';
export { HTTPNetworkError, HTTPTimeoutError, HttpTransport, type FetchLike } from './http/transport.js';

// Dispatch
export { DeferredResult, type Outcome } from './dispatch/deferred.js';
export { settle, toDeferred, type Dispatch, type ExecutionContext } from './dispatch/dispatcher.js';
export { classifyFailure } from './dispatch/classifier.js';
export { WorkerPool, type WorkerPoolStats } from './dispatch/worker-pool.js';
