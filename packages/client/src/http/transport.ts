/**
 * HTTP transport
 *
 * Signs a built request, sends it with a timeout and hands back the raw
 * status and body. Status codes are not interpreted here; that is the base
 * handler's job. One call is one attempt.
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({
 *   signer: new OAuthSigner({ consumerKey: 'key', consumerSecret: 'secret' }),
 *   timeoutMs: 10000,
 * });
 * const raw = await transport.send(builder.contains(37.77, -122.42));
 * ```
 */

import { CLIENT_VERSION } from '../core/config.js';
import type { RawResponse } from './handlers.js';
import type { BuiltRequest } from './request-builder.js';
import type { RequestSigner } from './signer.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportConfig {
  readonly signer: RequestSigner;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number;

  /** User-Agent header */
  readonly userAgent?: string;

  /** fetch implementation (default: global fetch) */
  readonly fetch?: FetchLike;
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

// ============================================================================
// Transport
// ============================================================================

export class HttpTransport {
  private readonly signer: RequestSigner;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(config: TransportConfig) {
    this.signer = config.signer;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.userAgent = config.userAgent ?? `geolayer-client/${CLIENT_VERSION}`;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * @throws {SigningError} before anything is sent when signing fails
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   */
  async send(request: BuiltRequest): Promise<RawResponse> {
    const authorization = this.signer.sign({ method: request.method, url: request.uri });

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...authorization,
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = request.contentType ?? 'application/json';
    }

    return this.fetchWithTimeout(request.uri, {
      method: request.method,
      headers,
      body: request.body,
    });
  }

  /**
   * Fetch with timeout using AbortController. The timeout covers reading the
   * body as well as receiving the headers.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      return {
        url,
        status: response.status,
        contentType: response.headers.get('content-type'),
        body: await response.text(),
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, this.timeoutMs);
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
