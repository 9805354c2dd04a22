/**
 * Failure classification
 *
 * Every failure that leaves the dispatcher is one of the typed
 * {@link GeoLayerError} kinds. The original error rides along as `cause`.
 * Decoder failures are typed by the dispatcher before they get here, so an
 * unrecognised error is one from signing or sending.
 */

import { ZodError } from 'zod';
import {
  GeoLayerError,
  MalformedResponseError,
  NotAuthorizedError,
  TransportError,
} from '../core/errors.js';
import { SigningError } from '../http/signer.js';
import { HTTPNetworkError, HTTPTimeoutError } from '../http/transport.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyFailure(error: unknown): GeoLayerError {
  if (error instanceof GeoLayerError) {
    return error;
  }

  if (error instanceof SigningError) {
    return new NotAuthorizedError(`Request could not be signed: ${error.message}`, { cause: error });
  }

  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return new TransportError(error.message, { cause: error });
  }

  if (error instanceof SyntaxError || error instanceof ZodError) {
    return new MalformedResponseError(`Response could not be decoded: ${describe(error)}`, '', { cause: error });
  }

  return new TransportError(`Request failed: ${describe(error)}`, { cause: error });
}
