/**
 * OAuth 1.0a request signing
 *
 * Every request is signed with the consumer key and secret (two-legged,
 * no token). A signer that cannot produce a signature throws
 * {@link SigningError}; the dispatcher reports that as NotAuthorized without
 * sending anything.
 */

import { createHmac } from 'node:crypto';
import OAuth from 'oauth-1.0a';
import type { OAuthCredentials } from '../core/config.js';
import type { HttpMethod } from './request-builder.js';

export interface SignableRequest {
  readonly method: HttpMethod;
  readonly url: string;
}

/**
 * Produces the headers that authorize one request
 */
export interface RequestSigner {
  sign(request: SignableRequest): Record<string, string>;
}

export class SigningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SigningError';
  }
}

export class OAuthSigner implements RequestSigner {
  private readonly oauth: OAuth | null;

  constructor(credentials: OAuthCredentials | undefined) {
    this.oauth = credentials
      ? new OAuth({
          consumer: { key: credentials.consumerKey, secret: credentials.consumerSecret },
          signature_method: 'HMAC-SHA1',
          hash_function: (baseString: string, key: string) =>
            createHmac('sha1', key).update(baseString).digest('base64'),
        })
      : null;
  }

  /**
   * @throws {SigningError} when no credentials are configured or signing fails
   */
  sign(request: SignableRequest): Record<string, string> {
    if (this.oauth === null) {
      throw new SigningError('No OAuth credentials configured (set GEOLAYER_OAUTH_KEY and GEOLAYER_OAUTH_SECRET)');
    }

    try {
      const authorization = this.oauth.authorize({ url: request.url, method: request.method });
      return { ...this.oauth.toHeader(authorization) };
    } catch (error) {
      throw new SigningError(
        `Failed to sign ${request.method} ${request.url}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
