/**
 * GeoLayer Error Types
 *
 * Every failure a caller can observe surfaces as a {@link GeoLayerError}.
 * The `kind` discriminates the failure class; `statusCode` is the
 * domain status (service-declared where the service reported one), not the
 * raw transport status.
 *
 * Errors are constructed only where a failure is observed: signing,
 * transport, decoding, a service error body, or a client-side precondition.
 */

export type ErrorKind =
  | 'not_authorized'
  | 'no_such_record'
  | 'unsupported_operation'
  | 'malformed_response'
  | 'transport'
  | 'service'
  | 'invalid_request';

/**
 * Domain status codes
 */
export const STATUS_CODES = {
  OK: 200,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_AUTHORIZED: 401,
  FORBIDDEN: 403,
  NO_SUCH: 404,
  INTERNAL_ERROR: 500,
  MALFORMED_RESPONSE: 502,
  UNAVAILABLE: 503,
} as const;

/**
 * Base class for all client errors
 */
export class GeoLayerError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;

  constructor(kind: ErrorKind, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeoLayerError';
    this.kind = kind;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Credentials could not sign the request, or the service rejected them.
 * Never retried.
 */
export class NotAuthorizedError extends GeoLayerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('not_authorized', STATUS_CODES.NOT_AUTHORIZED, message, options);
    this.name = 'NotAuthorizedError';
  }
}

/**
 * The service reported that the requested record does not exist
 */
export class NoSuchRecordError extends GeoLayerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('no_such_record', STATUS_CODES.NO_SUCH, message, options);
    this.name = 'NoSuchRecordError';
  }
}

/**
 * The operation does not support the requested handler. Raised before any
 * network activity.
 */
export class UnsupportedOperationError extends GeoLayerError {
  readonly operation: string;
  readonly handler: string;

  constructor(operation: string, handler: string, message?: string) {
    super(
      'unsupported_operation',
      STATUS_CODES.BAD_REQUEST,
      message ?? `The ${operation} operation does not support the ${handler} handler`
    );
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
    this.handler = handler;
  }
}

/**
 * The response body could not be decoded into the expected shape
 */
export class MalformedResponseError extends GeoLayerError {
  readonly responseText: string;

  constructor(message: string, responseText: string, options?: { cause?: unknown }) {
    super('malformed_response', STATUS_CODES.MALFORMED_RESPONSE, message, options);
    this.name = 'MalformedResponseError';
    this.responseText = responseText.slice(0, 500);
  }
}

/**
 * Network or connection failure below the protocol layer
 */
export class TransportError extends GeoLayerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', STATUS_CODES.UNAVAILABLE, message, options);
    this.name = 'TransportError';
  }
}

/**
 * Any other error the service reported in a response body
 */
export class ServiceError extends GeoLayerError {
  constructor(statusCode: number, message: string) {
    super('service', statusCode, message);
    this.name = 'ServiceError';
  }
}

/**
 * The request cannot be built from the given inputs (no layer, no ids,
 * out-of-range coordinates, bad configuration)
 */
export class InvalidRequestError extends GeoLayerError {
  constructor(message: string) {
    super('invalid_request', STATUS_CODES.BAD_REQUEST, message);
    this.name = 'InvalidRequestError';
  }
}

export function isGeoLayerError(error: unknown): error is GeoLayerError {
  return error instanceof GeoLayerError;
}
