/**
 * Dispatcher Tests
 *
 * Covers both execution modes, mode transparency, failure classification
 * and request logging.
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  InvalidRequestError,
  MalformedResponseError,
  NoSuchRecordError,
  NotAuthorizedError,
  TransportError,
} from '../../../core/errors.js';
import { classifyFailure } from '../../../dispatch/classifier.js';
import { Dispatcher, settle, toDeferred, type ExecutionContext } from '../../../dispatch/dispatcher.js';
import { WorkerPool } from '../../../dispatch/worker-pool.js';
import { BaseHandler, JsonHandler } from '../../../http/handlers.js';
import type { BuiltRequest } from '../../../http/request-builder.js';
import { OAuthSigner, SigningError, type RequestSigner } from '../../../http/signer.js';
import { HTTPNetworkError, HTTPTimeoutError, HttpTransport } from '../../../http/transport.js';
import {
  captureLogger,
  createFakeService,
  staticSigner,
  type CapturingLogger,
  type FakeReply,
  type FakeService,
} from '../../helpers/fake-service.js';

const CONTAINS: BuiltRequest = {
  operation: 'contains',
  method: 'GET',
  uri: 'https://api.test/0.1/contains/37.500000,-122.250000.json',
};

interface Harness {
  readonly context: ExecutionContext;
  readonly dispatcher: Dispatcher;
  readonly service: FakeService;
  readonly logger: CapturingLogger;
}

function harness(replyWith: FakeReply, signer: RequestSigner = staticSigner): Harness {
  const context: ExecutionContext = { mode: 'sync' };
  const service = createFakeService(() => replyWith);
  const logger = captureLogger();
  const dispatcher = new Dispatcher({
    context,
    transport: new HttpTransport({ signer, fetch: service.fetch }),
    base: new BaseHandler(),
    pool: new WorkerPool({ maxConcurrent: 2 }),
    logger,
  });
  return { context, dispatcher, service, logger };
}

const json = new JsonHandler();

describe('Dispatcher', () => {
  describe('sync mode', () => {
    it('should return the decoded value directly', async () => {
      const { dispatcher } = harness({ body: [{ id: 'CA' }] });

      await expect(dispatcher.dispatch(CONTAINS, json)).resolves.toEqual({
        mode: 'sync',
        value: [{ id: 'CA' }],
      });
    });

    it('should reject with the typed error', async () => {
      const { dispatcher } = harness({ status: 404, body: { code: 404, message: 'No such record' } });

      await expect(dispatcher.dispatch(CONTAINS, json)).rejects.toBeInstanceOf(NoSuchRecordError);
    });

    it('should apply the transform to the decoded value', async () => {
      const { dispatcher } = harness({ body: [1, 2, 3] });

      const dispatch = await dispatcher.dispatch(CONTAINS, json, (value) =>
        Array.isArray(value) ? value.length : 0
      );

      expect(dispatch).toEqual({ mode: 'sync', value: 3 });
    });
  });

  describe('deferred mode', () => {
    it('should return a handle that completes with the value', async () => {
      const { context, dispatcher } = harness({ body: { boundaries: [] } });
      context.mode = 'deferred';

      const dispatch = await dispatcher.dispatch(CONTAINS, json);

      expect(dispatch.mode).toBe('deferred');
      if (dispatch.mode !== 'deferred') throw new Error('expected a handle');
      await expect(dispatch.handle.get()).resolves.toEqual({ boundaries: [] });
      expect(dispatch.handle.isDone()).toBe(true);
    });

    it('should store failures in the handle instead of rejecting', async () => {
      const { context, dispatcher } = harness({ status: 404, body: { code: 404, message: 'gone' } });
      context.mode = 'deferred';

      const dispatch = await dispatcher.dispatch(CONTAINS, json);
      if (dispatch.mode !== 'deferred') throw new Error('expected a handle');

      const outcome = await dispatch.handle.settle();
      expect(outcome.ok).toBe(false);
      if (outcome.ok) throw new Error('expected a failure');
      expect(outcome.error).toBeInstanceOf(NoSuchRecordError);
      expect(outcome.error.message).toBe('gone');
    });
  });

  it('should read the mode when each call starts', async () => {
    const { context, dispatcher } = harness({ body: [] });

    const first = await dispatcher.dispatch(CONTAINS, json);
    context.mode = 'deferred';
    const second = await dispatcher.dispatch(CONTAINS, json);
    context.mode = 'sync';
    const third = await dispatcher.dispatch(CONTAINS, json);

    expect([first.mode, second.mode, third.mode]).toEqual(['sync', 'deferred', 'sync']);
  });

  it('should resolve to the same value in both modes', async () => {
    const { context, dispatcher } = harness({ body: { type: 'contains', features: ['CA', 'US'] } });

    const syncValue = await settle(await dispatcher.dispatch(CONTAINS, json));
    context.mode = 'deferred';
    const deferredValue = await settle(await dispatcher.dispatch(CONTAINS, json));

    expect(deferredValue).toEqual(syncValue);
    await expect(toDeferred({ mode: 'sync', value: 1 }).get()).resolves.toBe(1);
  });

  it('should report a signing failure as not authorized without sending', async () => {
    const { dispatcher, service } = harness({ body: [] }, new OAuthSigner(undefined));

    await expect(dispatcher.dispatch(CONTAINS, json)).rejects.toBeInstanceOf(NotAuthorizedError);
    expect(service.fetch).not.toHaveBeenCalled();
  });

  it('should make a single attempt on a rejected signature', async () => {
    const { dispatcher, service } = harness({ status: 401, body: { code: 401, message: 'Bad signature' } });

    await expect(dispatcher.dispatch(CONTAINS, json)).rejects.toBeInstanceOf(NotAuthorizedError);
    expect(service.fetch).toHaveBeenCalledTimes(1);
  });

  it('should surface undecodable bodies as malformed responses', async () => {
    const { dispatcher } = harness({ body: 'not json' });

    await expect(dispatcher.dispatch(CONTAINS, json)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('should report a decoder that throws as a malformed response', async () => {
    const { dispatcher } = harness({ body: { type: 'FeatureCollection' } });
    const strict = {
      name: 'strict',
      decode: (): never => {
        throw new TypeError("Cannot read properties of undefined (reading 'map')");
      },
    };

    const failure = await dispatcher.dispatch(CONTAINS, strict).then(
      () => null,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(MalformedResponseError);
    if (!(failure instanceof MalformedResponseError)) return;
    expect(failure.kind).toBe('malformed_response');
    expect(failure.responseText).toBe('{"type":"FeatureCollection"}');
    expect(failure.cause).toBeInstanceOf(TypeError);
  });

  describe('logging', () => {
    it('should log completed requests at info', async () => {
      const { dispatcher, logger } = harness({ body: [] });

      await dispatcher.dispatch(CONTAINS, json);

      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0]).toMatchObject({
        level: 'info',
        message: 'GeoLayer request completed',
        metadata: { operation: 'contains', method: 'GET', uri: CONTAINS.uri, handler: 'json', mode: 'sync', status: 200 },
      });
    });

    it('should log failed requests at warn with the error kind', async () => {
      const { dispatcher, logger } = harness({ status: 404, body: { code: 404, message: 'gone' } });

      await expect(dispatcher.dispatch(CONTAINS, json)).rejects.toThrow('gone');

      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0]).toMatchObject({
        level: 'warn',
        message: 'GeoLayer request failed',
        metadata: { operation: 'contains', status: 404, kind: 'no_such_record', statusCode: 404 },
      });
    });
  });
});

describe('classifyFailure', () => {
  it('should pass typed errors through', () => {
    const error = new InvalidRequestError('no layer');
    expect(classifyFailure(error)).toBe(error);
  });

  it('should map signing errors to not authorized', () => {
    const classified = classifyFailure(new SigningError('no credentials'));

    expect(classified).toBeInstanceOf(NotAuthorizedError);
    expect(classified.cause).toBeInstanceOf(SigningError);
  });

  it('should map network failures and timeouts to transport errors', () => {
    const network = new HTTPNetworkError('https://api.test', new Error('ECONNREFUSED'));
    const timeout = new HTTPTimeoutError('https://api.test', 10);

    expect(classifyFailure(network)).toBeInstanceOf(TransportError);
    expect(classifyFailure(network).cause).toBe(network);
    expect(classifyFailure(timeout)).toBeInstanceOf(TransportError);
  });

  it('should map parse and schema errors to malformed responses', () => {
    expect(classifyFailure(new SyntaxError('Unexpected token'))).toBeInstanceOf(MalformedResponseError);
    expect(classifyFailure(new ZodError([]))).toBeInstanceOf(MalformedResponseError);
  });

  it('should treat other send failures as transport failures', () => {
    const classified = classifyFailure('socket hang up');

    expect(classified).toBeInstanceOf(TransportError);
    expect(classified.message).toBe('Request failed: socket hang up');
  });
});
