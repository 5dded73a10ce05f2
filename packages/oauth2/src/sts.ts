/**
 * @file rfc 8693 token exchange against a security token service
 */

import { AccessToken, MS_PER_SECOND, systemClock } from '@credkit/core';

import {
  ACCESS_TOKEN_TYPE,
  TOKEN_EXCHANGE_GRANT,
} from '#constants/endpoints';
import { HTTP_STATUS_OK } from '#constants/http';
import {
  optionalString,
  readJsonObject,
  requireInteger,
  requireString,
  throwForStatus,
} from '#parsing';
import { defaultTransport, postForm } from '#transport';

import type { Clock } from '@credkit/core';

import type { HttpTransport } from '#transport';

const PARSE_ERROR_PREFIX = 'error parsing token exchange response';

/** client credentials sent with http basic authentication */
export interface ClientAuthentication {
  /** oauth2 client id */
  clientId: string;
  /** oauth2 client secret */
  clientSecret?: string;
}

/** fields of a token exchange request */
export interface StsTokenExchangeRequest {
  /** token being exchanged */
  subjectToken: string;
  /** type of the subject token */
  subjectTokenType: string;
  /** resource the token is intended for */
  audience?: string;
  /** scopes of the issued token */
  scopes?: string[];
  /** type of the issued token (default: access token) */
  requestedTokenType?: string;
  /** token of the party acting on behalf of the subject */
  actingParty?: { actorToken: string; actorTokenType: string };
  /** extra options serialized as json */
  internalOptions?: string;
}

/** fields of a successful token exchange response */
export interface StsTokenExchangeResponse {
  /** issued access token */
  accessToken: AccessToken;
  /** type of the issued token */
  issuedTokenType: string;
  /** usage type, e.g. Bearer */
  tokenType: string;
  /** lifetime in seconds of the issued token, if given */
  expiresIn?: number;
  /** refresh token, if issued */
  refreshToken?: string;
  /** scopes of the issued token, if given */
  scopes?: string[];
}

/** options of a token exchange */
export interface StsRequestHandlerOptions {
  /** endpoint of the security token service */
  tokenExchangeEndpoint: string;
  /** the exchange to perform */
  request: StsTokenExchangeRequest;
  /** client authenticating the exchange, if any */
  clientAuthentication?: ClientAuthentication;
  /** additional headers */
  headers?: Record<string, string>;
  /** transport for the request (default: fetch) */
  transport?: HttpTransport;
  /** time source the expiry is relative to (default: system clock) */
  clock?: Clock;
}

/**
 * performs one token exchange
 * @example
 * ```typescript
 * const { accessToken } = await new StsRequestHandler({
 *   tokenExchangeEndpoint: 'https://sts.googleapis.com/v1/token',
 *   request: { subjectToken, subjectTokenType, audience },
 * }).exchangeToken();
 * ```
 */
export class StsRequestHandler {
  readonly #options: StsRequestHandlerOptions;

  /**
   * creates a handler
   * @param options exchange options
   */
  constructor(options: StsRequestHandlerOptions) {
    this.#options = options;
  }

  /**
   * sends the exchange request
   * @returns the parsed response
   * @throws {OAuthError} when the service answers with an oauth2 error
   */
  public async exchangeToken(): Promise<StsTokenExchangeResponse> {
    const {
      tokenExchangeEndpoint,
      request,
      clientAuthentication,
      headers = {},
      transport = defaultTransport,
      clock = systemClock,
    } = this.#options;

    /* eslint-disable @typescript-eslint/naming-convention */
    const response = await postForm(
      transport,
      tokenExchangeEndpoint,
      {
        grant_type: TOKEN_EXCHANGE_GRANT,
        subject_token_type: request.subjectTokenType,
        subject_token: request.subjectToken,
        audience: request.audience,
        scope: request.scopes?.length ? request.scopes.join(' ') : undefined,
        requested_token_type: request.requestedTokenType ?? ACCESS_TOKEN_TYPE,
        actor_token: request.actingParty?.actorToken,
        actor_token_type: request.actingParty?.actorTokenType,
        options: request.internalOptions,
      },
      clientAuthentication
        ? {
            ...headers,
            Authorization: `Basic ${encodeBasicCredentials(clientAuthentication)}`,
          }
        : headers,
    );
    /* eslint-enable @typescript-eslint/naming-convention */

    if (response.status !== HTTP_STATUS_OK) {
      return throwForStatus(response, 'error exchanging token');
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);
    const expiresIn =
      data.expires_in === undefined
        ? undefined
        : requireInteger(data, 'expires_in', PARSE_ERROR_PREFIX);
    const scope = optionalString(data, 'scope', PARSE_ERROR_PREFIX);

    return {
      accessToken: new AccessToken(
        requireString(data, 'access_token', PARSE_ERROR_PREFIX),
        expiresIn === undefined
          ? undefined
          : new Date(clock.now() + expiresIn * MS_PER_SECOND),
      ),
      issuedTokenType: requireString(
        data,
        'issued_token_type',
        PARSE_ERROR_PREFIX,
      ),
      tokenType: requireString(data, 'token_type', PARSE_ERROR_PREFIX),
      expiresIn,
      refreshToken: optionalString(data, 'refresh_token', PARSE_ERROR_PREFIX),
      scopes: scope?.split(' ').filter((entry) => entry.length > 0),
    };
  }
}

/**
 * encodes client credentials for http basic authentication
 * @param client client credentials
 * @returns base64 of id:secret
 */
function encodeBasicCredentials(client: ClientAuthentication): string {
  return Buffer.from(
    `${encodeURIComponent(client.clientId)}:${encodeURIComponent(client.clientSecret ?? '')}`,
  ).toString('base64');
}
