/**
 * @file three-legged oauth2 flow for installed and web applications
 *
 * sends users to the consent page, redeems the returned authorization code
 * and keeps the resulting tokens in a token store
 */

import { AccessToken, isJsonObject, systemClock } from '@credkit/core';

import {
  AUTHORIZATION_SERVER_URL,
  TOKEN_REVOKE_URL,
  TOKEN_SERVER_URL,
} from '#constants/endpoints';
import { HTTP_STATUS_OK } from '#constants/http';
import { CredentialConfigError } from '#errors';
import {
  optionalString,
  parseJsonObject,
  parseTokenResponse,
  readJsonObject,
  throwForStatus,
} from '#parsing';
import { defaultTransport, postForm } from '#transport';
import { UserCredentials } from '#user';

import type { Clock, JsonObject, Log } from '@credkit/core';

import type { TokenStore } from '#token-store';
import type { HttpTransport } from '#transport';

const PARSE_ERROR_PREFIX = 'error parsing token response';
const STORE_ERROR_PREFIX = 'error reading stored tokens';

/** oauth2 client identity of an application */
export interface ClientId {
  /** client id */
  clientId: string;
  /** client secret, absent for public clients */
  clientSecret?: string;
}

/**
 * reads a client id from a downloaded client secrets document
 * @param json document with an `installed` or `web` section
 * @returns the client identity
 * @throws {CredentialConfigError} when the document has neither section
 */
export function clientIdFromJson(json: unknown): ClientId {
  const section = isJsonObject(json) ? (json.installed ?? json.web) : undefined;

  if (!isJsonObject(section) || typeof section.client_id !== 'string') {
    throw new CredentialConfigError(
      "client secrets must contain an 'installed' or 'web' section with a client_id",
    );
  }

  return {
    clientId: section.client_id,
    clientSecret:
      typeof section.client_secret === 'string'
        ? section.client_secret
        : undefined,
  };
}

/** options of a user authorizer */
export interface UserAuthorizerOptions {
  /** identity of the application */
  clientId: ClientId;
  /** scopes to ask the user for */
  scopes: string[];
  /** store of granted tokens, required by the operations that use it */
  tokenStore?: TokenStore;
  /** redirect target, absolute or relative to the base uri of each call (default: /oauth2callback) */
  callbackUri?: string;
  /** consent page (default: the google authorization endpoint) */
  authUri?: string;
  /** token endpoint (default: the google oauth2 token endpoint) */
  tokenServerUri?: string;
  /** revocation endpoint (default: the google revoke endpoint) */
  revokeUri?: string;
  /** transport for token requests (default: fetch) */
  transport?: HttpTransport;
  /** time source for token expiry (default: system clock) */
  clock?: Clock;
  /** optional logging function */
  log?: Log;
}

/** default redirect target, relative to the application's base uri */
export const DEFAULT_CALLBACK_URI = '/oauth2callback';

/**
 * drives the authorization code flow and manages stored user tokens
 * @example
 * ```typescript
 * const authorizer = new UserAuthorizer({
 *   clientId: { clientId: 'client-id', clientSecret: 'client-secret' },
 *   scopes: ['https://www.googleapis.com/auth/drive.readonly'],
 *   tokenStore: new MemoryTokenStore(),
 * });
 *
 * const credentials = await authorizer.getCredentials('user@example.com');
 * ```
 */
export class UserAuthorizer {
  readonly #options: UserAuthorizerOptions;
  readonly #transport: HttpTransport;

  /**
   * creates a user authorizer
   * @param options authorizer options
   * @throws {CredentialConfigError} when no scopes are given
   */
  constructor(options: UserAuthorizerOptions) {
    if (!options.scopes.length) {
      throw new CredentialConfigError('user authorizer requires scopes');
    }

    this.#options = { ...options, scopes: [...options.scopes] };
    this.#transport = options.transport ?? defaultTransport;
  }

  /** identity of the application */
  public get clientId(): ClientId {
    return { ...this.#options.clientId };
  }

  /** scopes asked for */
  public get scopes(): string[] {
    return [...this.#options.scopes];
  }

  /** store of granted tokens */
  public get tokenStore(): TokenStore | undefined {
    return this.#options.tokenStore;
  }

  /**
   * resolves the redirect target
   * @param baseUri base uri of the application, needed for a relative callback
   * @returns absolute callback uri
   * @throws {CredentialConfigError} when the callback is relative and no base uri is given
   */
  public getCallbackUri(baseUri?: string): string {
    const callbackUri = this.#options.callbackUri ?? DEFAULT_CALLBACK_URI;

    if (URL.canParse(callbackUri)) {
      return callbackUri;
    }

    if (!baseUri) {
      throw new CredentialConfigError(
        `a base uri is required to resolve the relative callback uri ${callbackUri}`,
      );
    }

    return new URL(callbackUri, baseUri).toString();
  }

  /**
   * builds the consent page url to send the user to
   * @param userId user expected to sign in, sent as a login hint
   * @param state opaque value echoed back to the callback
   * @param baseUri base uri of the application
   * @returns consent page url
   */
  public getAuthorizationUrl(
    userId: string | undefined,
    state: string | undefined,
    baseUri?: string,
  ): URL {
    const url = new URL(this.#options.authUri ?? AUTHORIZATION_SERVER_URL);
    /* eslint-disable @typescript-eslint/naming-convention */
    const params: Record<string, string | undefined> = {
      response_type: 'code',
      client_id: this.#options.clientId.clientId,
      redirect_uri: this.getCallbackUri(baseUri),
      scope: this.#options.scopes.join(' '),
      state,
      login_hint: userId,
      access_type: 'offline',
      approval_prompt: 'force',
    };
    /* eslint-enable @typescript-eslint/naming-convention */

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }

    return url;
  }

  /**
   * loads the stored credentials of a user
   *
   * the returned credentials write refreshed tokens back to the store
   * @param userId user id
   * @returns the credentials, or undefined if the user has none stored
   * @throws {CredentialConfigError} when no token store is configured
   */
  public async getCredentials(
    userId: string,
  ): Promise<UserCredentials | undefined> {
    const stored = await this.#loadTokens(userId);

    if (!stored) {
      return undefined;
    }

    const credentials = this.#createCredentials(
      stored.refreshToken,
      stored.accessToken,
    );
    this.#monitorCredentials(userId, credentials);

    return credentials;
  }

  /**
   * redeems an authorization code
   * @param code code received by the callback
   * @param baseUri base uri of the application, as used for the consent url
   * @returns credentials of the user
   */
  public async getCredentialsFromCode(
    code: string,
    baseUri?: string,
  ): Promise<UserCredentials> {
    const { clientId, clientSecret } = this.#options.clientId;

    /* eslint-disable @typescript-eslint/naming-convention */
    const response = await postForm(
      this.#transport,
      this.#options.tokenServerUri ?? TOKEN_SERVER_URL,
      {
        code,
        client_id: clientId,
        client_secret: clientSecret,
        redirect_uri: this.getCallbackUri(baseUri),
        grant_type: 'authorization_code',
      },
    );
    /* eslint-enable @typescript-eslint/naming-convention */

    if (response.status !== HTTP_STATUS_OK) {
      return throwForStatus(response, 'error redeeming authorization code');
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);
    const accessToken = parseTokenResponse(
      data,
      this.#options.clock ?? systemClock,
      PARSE_ERROR_PREFIX,
    );

    return this.#createCredentials(
      optionalString(data, 'refresh_token', PARSE_ERROR_PREFIX),
      accessToken,
    );
  }

  /**
   * redeems an authorization code and stores the resulting tokens
   * @param userId user id
   * @param code code received by the callback
   * @param baseUri base uri of the application
   * @returns credentials of the user, kept in sync with the store
   */
  public async getAndStoreCredentialsFromCode(
    userId: string,
    code: string,
    baseUri?: string,
  ): Promise<UserCredentials> {
    const credentials = await this.getCredentialsFromCode(code, baseUri);

    await this.storeCredentials(userId, credentials);
    this.#monitorCredentials(userId, credentials);

    return credentials;
  }

  /**
   * writes the current tokens of credentials to the store
   * @param userId user id
   * @param credentials credentials to store
   * @throws {CredentialConfigError} when no token store is configured
   */
  public async storeCredentials(
    userId: string,
    credentials: UserCredentials,
  ): Promise<void> {
    const tokenStore = this.#requireTokenStore();
    const accessToken = credentials.getAccessToken();

    /* eslint-disable @typescript-eslint/naming-convention */
    const tokens: JsonObject = {
      access_token: accessToken?.value ?? null,
      expiration_time_millis: accessToken?.expirationTime ?? null,
      refresh_token: credentials.refreshToken ?? null,
    };
    /* eslint-enable @typescript-eslint/naming-convention */

    await tokenStore.store(userId, JSON.stringify(tokens));
  }

  /**
   * revokes the stored grant of a user and forgets its tokens
   *
   * the stored tokens are removed even when revocation fails
   * @param userId user id
   * @throws {CredentialConfigError} when no token store is configured
   */
  public async revokeAuthorization(userId: string): Promise<void> {
    const tokenStore = this.#requireTokenStore();
    const stored = await this.#loadTokens(userId);

    if (!stored) {
      return;
    }

    const token = stored.refreshToken ?? stored.accessToken?.value;

    try {
      if (token) {
        const response = await postForm(
          this.#transport,
          this.#options.revokeUri ?? TOKEN_REVOKE_URL,
          { token },
        );

        if (response.status !== HTTP_STATUS_OK) {
          await throwForStatus(response, 'error revoking authorization');
        }
      }
    } finally {
      await tokenStore.delete(userId);
    }
  }

  /**
   * returns the token store or fails
   * @returns the configured token store
   */
  #requireTokenStore(): TokenStore {
    const { tokenStore } = this.#options;

    if (!tokenStore) {
      throw new CredentialConfigError(
        'a token store is required to load or save user credentials',
      );
    }

    return tokenStore;
  }

  /**
   * loads and parses the stored tokens of a user
   * @param userId user id
   * @returns the tokens, or undefined if none are stored
   */
  async #loadTokens(
    userId: string,
  ): Promise<
    { accessToken?: AccessToken; refreshToken?: string } | undefined
  > {
    const serialized = await this.#requireTokenStore().load(userId);

    if (serialized === undefined) {
      return undefined;
    }

    const data = parseJsonObject(serialized, STORE_ERROR_PREFIX);
    const value = optionalString(data, 'access_token', STORE_ERROR_PREFIX);
    const expiration = data.expiration_time_millis;

    return {
      accessToken: value
        ? new AccessToken(
            value,
            typeof expiration === 'number' ? new Date(expiration) : undefined,
          )
        : undefined,
      refreshToken: optionalString(data, 'refresh_token', STORE_ERROR_PREFIX),
    };
  }

  /**
   * creates user credentials sharing this authorizer's settings
   * @param refreshToken refresh token, if granted
   * @param accessToken current access token, if any
   * @returns the credentials
   */
  #createCredentials(
    refreshToken: string | undefined,
    accessToken: AccessToken | undefined,
  ): UserCredentials {
    const { clientId, clientSecret } = this.#options.clientId;

    return new UserCredentials({
      clientId,
      clientSecret,
      refreshToken,
      accessToken,
      tokenServerUri: this.#options.tokenServerUri,
      transport: this.#transport,
      clock: this.#options.clock,
      log: this.#options.log,
    });
  }

  /**
   * keeps the store in sync with refreshes of the credentials
   * @param userId user id
   * @param credentials credentials to watch
   */
  #monitorCredentials(userId: string, credentials: UserCredentials): void {
    credentials.addChangeListener(async () =>
      this.storeCredentials(userId, credentials),
    );
  }
}
