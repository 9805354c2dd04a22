/**
 * Dispatcher
 *
 * Runs one built request end to end: sign, send, check status, decode.
 * The execution mode is read from the owning client's
 * {@link ExecutionContext} when each call starts.
 *
 * - `sync`: the returned promise carries the decoded value, or rejects with
 *   a typed {@link GeoLayerError}.
 * - `deferred`: the unit of work is queued on the {@link WorkerPool} and a
 *   {@link DeferredResult} handle comes back at once. Failures are stored in
 *   the handle.
 *
 * Changing the mode while calls are in flight only affects calls started
 * afterwards; calls already started keep the mode they read.
 *
 * One attempt per call. There is no retry and no cancellation.
 */

import type { ExecutionMode } from '../core/config.js';
import { GeoLayerError, MalformedResponseError } from '../core/errors.js';
import type { LoggerLike } from '../core/utils/logger.js';
import type { BaseHandler, RawResponse, ResponseHandler } from '../http/handlers.js';
import type { BuiltRequest } from '../http/request-builder.js';
import type { HttpTransport } from '../http/transport.js';
import { classifyFailure } from './classifier.js';
import { DeferredResult } from './deferred.js';
import type { WorkerPool } from './worker-pool.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Mutable execution settings owned by one client
 */
export interface ExecutionContext {
  mode: ExecutionMode;
}

export type Dispatch<T> =
  | { readonly mode: 'sync'; readonly value: T }
  | { readonly mode: 'deferred'; readonly handle: DeferredResult<T> };

export interface DispatcherDeps {
  readonly context: ExecutionContext;
  readonly transport: Pick<HttpTransport, 'send'>;
  readonly base: BaseHandler;
  readonly pool: WorkerPool;
  readonly logger: LoggerLike;
}

/**
 * Value of a dispatch regardless of mode; waits for deferred handles
 */
export async function settle<T>(dispatch: Dispatch<T>): Promise<T> {
  return dispatch.mode === 'sync' ? dispatch.value : dispatch.handle.get();
}

/**
 * Turn a sync dispatch into an already-completed handle
 */
export function toDeferred<T>(dispatch: Dispatch<T>): DeferredResult<T> {
  return dispatch.mode === 'deferred' ? dispatch.handle : DeferredResult.resolved(dispatch.value);
}

// ============================================================================
// Dispatcher
// ============================================================================

export class Dispatcher {
  private readonly deps: DispatcherDeps;

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
  }

  /**
   * Dispatch a request and decode its response with `handler`, optionally
   * reshaping the decoded value with `transform`
   */
  dispatch<T>(request: BuiltRequest, handler: ResponseHandler<T>): Promise<Dispatch<T>>;
  dispatch<T, R>(
    request: BuiltRequest,
    handler: ResponseHandler<T>,
    transform: (decoded: T) => R
  ): Promise<Dispatch<R>>;
  async dispatch<T, R>(
    request: BuiltRequest,
    handler: ResponseHandler<T>,
    transform?: (decoded: T) => R
  ): Promise<Dispatch<T | R>> {
    const mode = this.deps.context.mode;
    const decode = (response: RawResponse): T | R => {
      const decoded = handler.decode(response);
      return transform ? transform(decoded) : decoded;
    };

    if (mode === 'sync') {
      return { mode, value: await this.execute(request, handler.name, mode, decode) };
    }

    const { handle, complete } = DeferredResult.create<T | R>();
    void this.deps.pool
      .execute(() => this.execute(request, handler.name, mode, decode))
      .then(
        (value) => complete({ ok: true, value }),
        (error: unknown) => complete({ ok: false, error: classifyFailure(error) })
      );

    return { mode, handle };
  }

  private async execute<R>(
    request: BuiltRequest,
    handlerName: string,
    mode: ExecutionMode,
    decode: (response: RawResponse) => R
  ): Promise<R> {
    const { transport, base, logger } = this.deps;
    const startTime = Date.now();
    let status: number | undefined;

    try {
      const response = await transport.send(request);
      status = response.status;
      base.check(response);
      const result = decodeResponse(response, decode);

      logger.info('GeoLayer request completed', {
        operation: request.operation,
        method: request.method,
        uri: request.uri,
        handler: handlerName,
        mode,
        status,
        durationMs: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      const failure: GeoLayerError = classifyFailure(error);

      logger.warn('GeoLayer request failed', {
        operation: request.operation,
        method: request.method,
        uri: request.uri,
        handler: handlerName,
        mode,
        status,
        kind: failure.kind,
        statusCode: failure.statusCode,
        error: failure.message,
        durationMs: Date.now() - startTime,
      });

      throw failure;
    }
  }
}

/**
 * Run a decoder; anything it throws that is not already typed is a body the
 * handler could not read
 */
function decodeResponse<R>(response: RawResponse, decode: (response: RawResponse) => R): R {
  try {
    return decode(response);
  } catch (error) {
    if (error instanceof GeoLayerError) {
      throw error;
    }
    throw new MalformedResponseError(
      `Response from ${response.url} could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      response.body,
      { cause: error }
    );
  }
}
