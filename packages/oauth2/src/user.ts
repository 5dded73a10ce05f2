/**
 * @file credentials of an end user, refreshed with the refresh token grant
 */

import { CloudCredentials } from '#cloud-credentials';
import { TOKEN_SERVER_URL } from '#constants/endpoints';
import { HTTP_STATUS_OK } from '#constants/http';
import { CredentialConfigError } from '#errors';
import { parseTokenResponse, readJsonObject, throwForStatus } from '#parsing';
import { postForm } from '#transport';

import type { AccessToken } from '@credkit/core';

import type { CloudCredentialsOptions } from '#cloud-credentials';

const PARSE_ERROR_PREFIX = 'error parsing token refresh response';

/** options for user credentials */
export interface UserCredentialsOptions extends CloudCredentialsOptions {
  /** oauth2 client id of the application */
  clientId: string;
  /** oauth2 client secret of the application */
  clientSecret?: string;
  /** refresh token granted by the user */
  refreshToken?: string;
  /** token endpoint (default: the google oauth2 token endpoint) */
  tokenServerUri?: string;
}

/**
 * credentials of an end user who granted the application access
 * @example
 * ```typescript
 * const credentials = new UserCredentials({
 *   clientId: 'client-id',
 *   clientSecret: 'client-secret',
 *   refreshToken: 'refresh-token',
 * });
 * ```
 */
export class UserCredentials extends CloudCredentials {
  readonly #options: UserCredentialsOptions;

  /**
   * creates user credentials
   * @param options construction options
   * @throws {CredentialConfigError} when neither a token nor a refresh token is given
   */
  constructor(options: UserCredentialsOptions) {
    super(options);

    if (!options.accessToken && !options.refreshToken) {
      throw new CredentialConfigError(
        'either an access token or a refresh token is required',
      );
    }

    this.#options = { ...options };
  }

  /** oauth2 client id of the application */
  public get clientId(): string {
    return this.#options.clientId;
  }

  /** oauth2 client secret of the application */
  public get clientSecret(): string | undefined {
    return this.#options.clientSecret;
  }

  /** refresh token granted by the user */
  public get refreshToken(): string | undefined {
    return this.#options.refreshToken;
  }

  /** token endpoint */
  public get tokenServerUri(): string {
    return this.#options.tokenServerUri ?? TOKEN_SERVER_URL;
  }

  /**
   * redeems the refresh token for a new access token
   * @returns new token
   * @throws {CredentialConfigError} when there is no refresh token
   */
  public override async refreshAccessToken(): Promise<AccessToken> {
    if (!this.refreshToken) {
      throw new CredentialConfigError(
        'cannot refresh user credentials without a refresh token',
      );
    }

    /* eslint-disable @typescript-eslint/naming-convention */
    const response = await postForm(this.transport, this.tokenServerUri, {
      client_id: this.clientId,
      client_secret: this.clientSecret,
      refresh_token: this.refreshToken,
      grant_type: 'refresh_token',
    });
    /* eslint-enable @typescript-eslint/naming-convention */

    if (response.status !== HTTP_STATUS_OK) {
      return throwForStatus(response, 'error refreshing user credentials');
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);

    return parseTokenResponse(data, this.clock, PARSE_ERROR_PREFIX);
  }
}
