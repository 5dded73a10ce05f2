/**
 * @file service account credentials sending self-signed jwts
 *
 * no token server is involved: every request carries a freshly signed jwt
 * whose audience is the target of the request
 */

import {
  AUTHORIZATION_HEADER,
  BEARER_PREFIX,
  Credentials,
  HOUR_IN_SECONDS,
  MS_PER_SECOND,
  systemClock,
} from '@credkit/core';

import { CredentialConfigError } from '#errors';
import { parsePrivateKey, signBytes, signJwt } from '#signer';

import type {
  Clock,
  CredentialsOptions,
  RequestMetadata,
} from '@credkit/core';
import type { KeyObject } from 'node:crypto';

import type { ServiceAccountSigner } from '#signer';

/** options for jwt access credentials */
export interface ServiceAccountJwtAccessCredentialsOptions
  extends CredentialsOptions {
  /** oauth2 client id of the account */
  clientId?: string;
  /** email of the account */
  clientEmail: string;
  /** pkcs#8 pem private key of the account */
  privateKey: string;
  /** identifier of the private key */
  privateKeyId?: string;
  /** audience used when a request names no target */
  defaultAudience?: string;
  /** time source for iat and exp (default: system clock) */
  clock?: Clock;
}

/**
 * service account credentials that sign a jwt for each request
 * @example
 * ```typescript
 * const credentials = new ServiceAccountJwtAccessCredentials({
 *   clientEmail: 'robot@project.iam.gserviceaccount.com',
 *   privateKey: pem,
 * });
 *
 * await credentials.getRequestMetadata('https://pubsub.googleapis.com/');
 * ```
 */
export class ServiceAccountJwtAccessCredentials
  extends Credentials
  implements ServiceAccountSigner
{
  readonly #options: ServiceAccountJwtAccessCredentialsOptions;
  readonly #privateKey: KeyObject;
  readonly #clock: Clock;

  /**
   * creates jwt access credentials
   * @param options construction options
   * @throws {CredentialConfigError} when the private key cannot be parsed
   */
  constructor(options: ServiceAccountJwtAccessCredentialsOptions) {
    super({ log: options.log });

    this.#options = { ...options };
    this.#privateKey = parsePrivateKey(options.privateKey);
    this.#clock = options.clock ?? systemClock;
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

  /** audience used when a request names no target */
  public get defaultAudience(): string | undefined {
    return this.#options.defaultAudience;
  }

  /** @inheritdoc */
  public getAuthenticationType(): string {
    return 'JWTAccess';
  }

  /**
   * signs a jwt for the target of a request
   * @param uri target of the request, used as the audience
   * @returns headers carrying the signed jwt
   * @throws {CredentialConfigError} when neither a uri nor a default audience is known
   */
  public async getRequestMetadata(uri?: string): Promise<RequestMetadata> {
    const audience = uri ?? this.defaultAudience;

    if (!audience) {
      throw new CredentialConfigError(
        'jwt access credentials require a request uri or a default audience',
      );
    }

    const issuedAt = Math.floor(this.#clock.now() / MS_PER_SECOND);
    const jwt = await signJwt(
      {
        iss: this.clientEmail,
        sub: this.clientEmail,
        aud: audience,
        iat: issuedAt,
        exp: issuedAt + HOUR_IN_SECONDS,
      },
      this.#privateKey,
      this.privateKeyId,
    );

    return { [AUTHORIZATION_HEADER]: [`${BEARER_PREFIX}${jwt}`] };
  }

  /** nothing is cached, so there is nothing to refresh */
  public async refresh(): Promise<void> {
    return;
  }

  /** @inheritdoc */
  public getAccount(): string {
    return this.clientEmail;
  }

  /** @inheritdoc */
  public async sign(bytes: Uint8Array): Promise<Uint8Array> {
    return signBytes(this.#privateKey, bytes);
  }
}
