/**
 * HTTP Transport and OAuth Signer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { OAuthSigner, SigningError } from '../../../http/signer.js';
import { HTTPNetworkError, HTTPTimeoutError, HttpTransport } from '../../../http/transport.js';
import { createFakeService, staticSigner } from '../../helpers/fake-service.js';

const URI = 'https://api.test/0.1/records/com.example.transit/bus-1.json';

describe('HttpTransport', () => {
  it('should send signed requests and return status and body', async () => {
    const service = createFakeService(() => ({ status: 200, body: { ok: true } }));
    const transport = new HttpTransport({ signer: staticSigner, fetch: service.fetch });

    const response = await transport.send({ operation: 'retrieve', method: 'GET', uri: URI });

    expect(response).toEqual({ url: URI, status: 200, contentType: 'application/json', body: '{"ok":true}' });
    expect(service.requests).toHaveLength(1);
    expect(service.requests[0]?.headers).toEqual({
      'user-agent': 'geolayer-client/0.1.0',
      accept: 'application/json',
      authorization: 'OAuth oauth_consumer_key="test-key"',
    });
  });

  it('should send write bodies as JSON', async () => {
    const service = createFakeService(() => ({ status: 202 }));
    const transport = new HttpTransport({ signer: staticSigner, fetch: service.fetch, userAgent: 'test-agent' });

    const response = await transport.send({
      operation: 'update',
      method: 'POST',
      uri: 'https://api.test/0.1/records/com.example.transit.json',
      body: '{"type":"FeatureCollection","features":[]}',
      contentType: 'application/json',
    });

    expect(response.status).toBe(202);
    expect(response.body).toBe('');
    expect(service.requests[0]?.method).toBe('POST');
    expect(service.requests[0]?.body).toBe('{"type":"FeatureCollection","features":[]}');
    expect(service.requests[0]?.headers['content-type']).toBe('application/json');
    expect(service.requests[0]?.headers['user-agent']).toBe('test-agent');
  });

  it('should pass error statuses through without interpreting them', async () => {
    const service = createFakeService(() => ({ status: 404, body: { code: 404, message: 'No such record' } }));
    const transport = new HttpTransport({ signer: staticSigner, fetch: service.fetch });

    const response = await transport.send({ operation: 'delete', method: 'DELETE', uri: URI });

    expect(response.status).toBe(404);
    expect(response.body).toBe('{"code":404,"message":"No such record"}');
  });

  it('should not send anything when signing fails', async () => {
    const service = createFakeService(() => ({ status: 200, body: {} }));
    const transport = new HttpTransport({ signer: new OAuthSigner(undefined), fetch: service.fetch });

    await expect(transport.send({ operation: 'retrieve', method: 'GET', uri: URI })).rejects.toBeInstanceOf(
      SigningError
    );
    expect(service.fetch).not.toHaveBeenCalled();
  });

  it('should wrap connection failures', async () => {
    const transport = new HttpTransport({
      signer: staticSigner,
      fetch: vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    });

    const sent = transport.send({ operation: 'retrieve', method: 'GET', uri: URI });

    await expect(sent).rejects.toBeInstanceOf(HTTPNetworkError);
    await expect(sent).rejects.toThrow('Network error: fetch failed');
  });

  it('should abort requests that exceed the timeout', async () => {
    const transport = new HttpTransport({
      signer: staticSigner,
      timeoutMs: 10,
      fetch: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    await expect(transport.send({ operation: 'retrieve', method: 'GET', uri: URI })).rejects.toBeInstanceOf(
      HTTPTimeoutError
    );
  });

  it('should bound a stalled body by the same timeout', async () => {
    const transport = new HttpTransport({
      signer: staticSigner,
      timeoutMs: 10,
      fetch: async (_url, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"type":'));
            init.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
          },
        });
        return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
      },
    });

    await expect(transport.send({ operation: 'retrieve', method: 'GET', uri: URI })).rejects.toBeInstanceOf(
      HTTPTimeoutError
    );
  });
});

describe('OAuthSigner', () => {
  it('should refuse to sign without credentials', () => {
    expect(() => new OAuthSigner(undefined).sign({ method: 'GET', url: URI })).toThrow(SigningError);
  });

  it('should produce an HMAC-SHA1 OAuth header', () => {
    const signer = new OAuthSigner({ consumerKey: 'test-key', consumerSecret: 'test-secret' });

    const { Authorization } = signer.sign({ method: 'GET', url: URI });

    expect(Authorization).toMatch(/^OAuth /);
    expect(Authorization).toContain('oauth_consumer_key="test-key"');
    expect(Authorization).toContain('oauth_signature_method="HMAC-SHA1"');
    expect(Authorization).toContain('oauth_signature="');
  });
});
