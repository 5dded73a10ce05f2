/**
 * @file credentials of a service account impersonated by other credentials
 *
 * short-lived tokens are minted by the iam credentials api on behalf of the
 * target account; the source credentials authorize that call
 */

import { AccessToken, HOUR_IN_SECONDS } from '@credkit/core';

import { CloudCredentials } from '#cloud-credentials';
import {
  CLOUD_PLATFORM_SCOPE,
  generateAccessTokenUrl,
} from '#constants/endpoints';
import { HTTP_STATUS_OK } from '#constants/http';
import {
  CredentialConfigError,
  CredentialError,
  MalformedResponseError,
} from '#errors';
import { signBlob, toHeaders } from '#iam';
import { readJsonObject, requireString, throwForStatus } from '#parsing';
import { postJson } from '#transport';

import type { RequestMetadata } from '@credkit/core';

import type { CloudCredentialsOptions } from '#cloud-credentials';
import type { ServiceAccountSigner } from '#signer';

const ERROR_PREFIX = 'error processing impersonated credentials';
const PARSE_ERROR_PREFIX = 'error parsing generateAccessToken response';

/** longest lifetime in seconds a minted token may have */
export const MAX_TOKEN_LIFETIME_SECONDS = HOUR_IN_SECONDS;

/** options for impersonated credentials */
export interface ImpersonatedCredentialsOptions extends CloudCredentialsOptions {
  /** credentials of the caller */
  sourceCredentials: CloudCredentials;
  /** email of the service account to impersonate */
  targetPrincipal: string;
  /** chain of accounts through which the target is reached */
  delegates?: string[];
  /** scopes of the minted token */
  scopes: string[];
  /** lifetime in seconds of the minted token (default and maximum: 3600) */
  lifetime?: number;
  /** generateAccessToken endpoint replacing the one derived from the target */
  iamEndpointOverride?: string;
}

/**
 * credentials acting as another service account
 * @example
 * ```typescript
 * const credentials = new ImpersonatedCredentials({
 *   sourceCredentials,
 *   targetPrincipal: 'target@project.iam.gserviceaccount.com',
 *   scopes: ['https://www.googleapis.com/auth/cloud-platform'],
 * });
 * ```
 */
export class ImpersonatedCredentials
  extends CloudCredentials
  implements ServiceAccountSigner
{
  #sourceCredentials: CloudCredentials;
  readonly #targetPrincipal: string;
  readonly #delegates: string[];
  readonly #scopes: string[];
  readonly #lifetime: number;
  readonly #iamEndpointOverride?: string;

  /**
   * creates impersonated credentials
   * @param options construction options
   * @throws {CredentialConfigError} when the lifetime is not 1 to 3600 whole seconds
   */
  constructor(options: ImpersonatedCredentialsOptions) {
    super(options);

    const lifetime = options.lifetime ?? MAX_TOKEN_LIFETIME_SECONDS;
    if (!Number.isInteger(lifetime) || lifetime <= 0) {
      throw new CredentialConfigError(
        `lifetime must be a positive number of seconds, got ${lifetime}`,
      );
    }

    if (lifetime > MAX_TOKEN_LIFETIME_SECONDS) {
      throw new CredentialConfigError(
        `lifetime must be less than or equal to ${MAX_TOKEN_LIFETIME_SECONDS} seconds`,
      );
    }

    this.#sourceCredentials = options.sourceCredentials;
    this.#targetPrincipal = options.targetPrincipal;
    this.#delegates = [...(options.delegates ?? [])];
    this.#scopes = [...options.scopes];
    this.#lifetime = lifetime;
    this.#iamEndpointOverride = options.iamEndpointOverride;
  }

  /** credentials of the caller */
  public get sourceCredentials(): CloudCredentials {
    return this.#sourceCredentials;
  }

  /** lifetime in seconds of minted tokens */
  public get lifetime(): number {
    return this.#lifetime;
  }

  /** generateAccessToken endpoint used for refreshes */
  public get iamEndpoint(): string {
    return (
      this.#iamEndpointOverride ?? generateAccessTokenUrl(this.#targetPrincipal)
    );
  }

  /** @inheritdoc */
  public getAccount(): string {
    return this.#targetPrincipal;
  }

  /**
   * signs bytes with the target account's key through iam
   * @param bytes data to sign
   * @returns signature
   */
  public async sign(bytes: Uint8Array): Promise<Uint8Array> {
    return signBlob({
      transport: this.transport,
      account: this.#targetPrincipal,
      requestMetadata: await this.#getSourceMetadata(),
      bytes,
    });
  }

  /**
   * mints a token for the target account
   * @returns new token
   */
  public override async refreshAccessToken(): Promise<AccessToken> {
    const response = await postJson(
      this.transport,
      this.iamEndpoint,
      {
        delegates: this.#delegates,
        scope: this.#scopes,
        lifetime: `${this.#lifetime}s`,
      },
      toHeaders(await this.#getSourceMetadata()),
    );

    if (response.status !== HTTP_STATUS_OK) {
      return throwForStatus(
        response,
        `${ERROR_PREFIX}: error code ${response.status}`,
      );
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);
    const value = requireString(data, 'accessToken', PARSE_ERROR_PREFIX);
    const expireTime = requireString(data, 'expireTime', PARSE_ERROR_PREFIX);
    const expiration = Date.parse(expireTime);

    if (Number.isNaN(expiration)) {
      throw new MalformedResponseError(
        `${PARSE_ERROR_PREFIX}: invalid expireTime '${expireTime}'`,
      );
    }

    return new AccessToken(value, new Date(expiration));
  }

  /**
   * obtains headers from the source credentials, scoping them first if needed
   * @returns headers authorizing iam calls
   */
  async #getSourceMetadata(): Promise<RequestMetadata> {
    if (this.#sourceCredentials.createScopedRequired()) {
      this.#sourceCredentials = this.#sourceCredentials.createScoped([
        CLOUD_PLATFORM_SCOPE,
      ]);
    }

    try {
      return await this.#sourceCredentials.getRequestMetadata(this.iamEndpoint);
    } catch (exception) {
      throw new CredentialError(
        `${ERROR_PREFIX}: unable to refresh source credentials`,
        { cause: exception },
      );
    }
  }
}
