/**
 * @file service account credentials using the jwt bearer grant
 *
 * a self-signed assertion is exchanged for an access token at the token
 * endpoint; the assertion is signed with the account's private key
 */

import { HOUR_IN_SECONDS, MS_PER_SECOND } from '@credkit/core';

import { CloudCredentials } from '#cloud-credentials';
import { JWT_BEARER_GRANT, TOKEN_SERVER_URL } from '#constants/endpoints';
import { HTTP_STATUS_OK } from '#constants/http';
import { ScopesRequiredError } from '#errors';
import { parseTokenResponse, readJsonObject, throwForStatus } from '#parsing';
import { parsePrivateKey, signBytes, signJwt } from '#signer';
import { postForm } from '#transport';

import type { AccessToken } from '@credkit/core';
import type { KeyObject } from 'node:crypto';

import type { CloudCredentialsOptions } from '#cloud-credentials';
import type { ServiceAccountSigner } from '#signer';

const PARSE_ERROR_PREFIX = 'error parsing token refresh response';

/** options for service account credentials */
export interface ServiceAccountCredentialsOptions
  extends CloudCredentialsOptions {
  /** oauth2 client id of the account */
  clientId?: string;
  /** email of the account */
  clientEmail: string;
  /** pkcs#8 pem private key of the account */
  privateKey: string;
  /** identifier of the private key */
  privateKeyId?: string;
  /** scopes to request, none means createScoped is required */
  scopes?: string[];
  /** user to impersonate through domain-wide delegation */
  serviceAccountUser?: string;
  /** token endpoint (default: the google oauth2 token endpoint) */
  tokenServerUri?: string;
  /** project the account belongs to */
  projectId?: string;
}

/**
 * credentials of a service account, authenticating with a signed assertion
 * @example
 * ```typescript
 * const credentials = new ServiceAccountCredentials({
 *   clientEmail: 'robot@project.iam.gserviceaccount.com',
 *   privateKey: pem,
 * }).createScoped(['https://www.googleapis.com/auth/devstorage.read_only']);
 *
 * const headers = await credentials.getRequestMetadata();
 * ```
 */
export class ServiceAccountCredentials
  extends CloudCredentials
  implements ServiceAccountSigner
{
  readonly #options: ServiceAccountCredentialsOptions;
  readonly #privateKey: KeyObject;

  /**
   * creates service account credentials
   * @param options construction options
   * @throws {CredentialConfigError} when the private key cannot be parsed
   */
  constructor(options: ServiceAccountCredentialsOptions) {
    super(options);

    this.#options = { ...options, scopes: [...(options.scopes ?? [])] };
    this.#privateKey = parsePrivateKey(options.privateKey);
  }

  /** email of the account */
  public get clientEmail(): string {
    return this.#options.clientEmail;
  }

  /** oauth2 client id of the account */
  public get clientId(): string | undefined {
    return this.#options.clientId;
  }

  /** identifier of the private key */
  public get privateKeyId(): string | undefined {
    return this.#options.privateKeyId;
  }

  /** project the account belongs to */
  public get projectId(): string | undefined {
    return this.#options.projectId;
  }

  /** scopes requested with each token */
  public get scopes(): string[] {
    return [...(this.#options.scopes ?? [])];
  }

  /** user impersonated through domain-wide delegation */
  public get serviceAccountUser(): string | undefined {
    return this.#options.serviceAccountUser;
  }

  /** token endpoint */
  public get tokenServerUri(): string {
    return this.#options.tokenServerUri ?? TOKEN_SERVER_URL;
  }

  /** @inheritdoc */
  public override createScopedRequired(): boolean {
    return this.scopes.length === 0;
  }

  /**
   * creates a copy requesting the given scopes
   * @param scopes scopes to request
   * @returns new credentials without a cached token
   */
  public override createScoped(scopes: string[]): ServiceAccountCredentials {
    return this.#copy({ scopes });
  }

  /**
   * creates a copy acting on behalf of a user of the account's domain
   * @param user email of the user to impersonate
   * @returns new credentials without a cached token
   */
  public createDelegated(user: string): ServiceAccountCredentials {
    return this.#copy({ serviceAccountUser: user });
  }

  /** @inheritdoc */
  public getAccount(): string {
    return this.clientEmail;
  }

  /** @inheritdoc */
  public async sign(bytes: Uint8Array): Promise<Uint8Array> {
    return signBytes(this.#privateKey, bytes);
  }

  /**
   * exchanges a signed assertion for an access token
   * @returns new token
   * @throws {ScopesRequiredError} when no scopes are configured
   */
  public override async refreshAccessToken(): Promise<AccessToken> {
    if (this.createScopedRequired()) {
      throw new ScopesRequiredError();
    }

    const assertion = await this.#createAssertion();
    const response = await postForm(this.transport, this.tokenServerUri, {
      grant_type: JWT_BEARER_GRANT, // eslint-disable-line @typescript-eslint/naming-convention
      assertion,
    });

    if (response.status !== HTTP_STATUS_OK) {
      return throwForStatus(
        response,
        'error getting access token for service account',
      );
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);

    return parseTokenResponse(data, this.clock, PARSE_ERROR_PREFIX);
  }

  /**
   * signs the assertion for the token request
   * @returns compact jwt
   */
  async #createAssertion(): Promise<string> {
    const issuedAt = Math.floor(this.clock.now() / MS_PER_SECOND);

    return signJwt(
      {
        iss: this.clientEmail,
        sub: this.serviceAccountUser ?? this.clientEmail,
        aud: this.tokenServerUri,
        scope: this.scopes.join(' '),
        iat: issuedAt,
        exp: issuedAt + HOUR_IN_SECONDS,
      },
      this.#privateKey,
      this.privateKeyId,
    );
  }

  /**
   * creates a copy with some options replaced
   * @param overrides options to replace
   * @returns new credentials without a cached token
   */
  #copy(
    overrides: Partial<ServiceAccountCredentialsOptions>,
  ): ServiceAccountCredentials {
    return new ServiceAccountCredentials({
      ...this.#options,
      accessToken: undefined,
      clock: this.clock,
      log: this.log,
      transport: this.transport,
      ...overrides,
    });
  }
}
