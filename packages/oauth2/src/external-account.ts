/**
 * @file credentials of a workload outside google cloud
 *
 * a token issued by a third-party identity provider is exchanged at the
 * security token service, optionally followed by impersonation of a
 * service account
 */

import { CloudCredentials } from '#cloud-credentials';
import { ACCESS_TOKEN_TYPE, CLOUD_PLATFORM_SCOPE } from '#constants/endpoints';
import { CredentialConfigError } from '#errors';
import {
  ImpersonatedCredentials,
  MAX_TOKEN_LIFETIME_SECONDS,
} from '#impersonated';
import { StsRequestHandler } from '#sts';

import type { AccessToken } from '@credkit/core';

import type { CloudCredentialsOptions } from '#cloud-credentials';
import type { SubjectTokenSource } from '#subject-token-source';

const GENERATE_ACCESS_TOKEN_SUFFIX = ':generateAccessToken';

/** options for external account credentials */
export interface ExternalAccountCredentialsOptions
  extends CloudCredentialsOptions {
  /** audience of the exchanged token, i.e. the workload identity provider */
  audience: string;
  /** type of the subject token */
  subjectTokenType: string;
  /** endpoint of the security token service */
  tokenUrl: string;
  /** supplier of the subject token */
  credentialSource: SubjectTokenSource;
  /** endpoint for token introspection */
  tokenInfoUrl?: string;
  /** generateAccessToken url of a service account to impersonate */
  serviceAccountImpersonationUrl?: string;
  /** oauth2 client id authenticating the exchange */
  clientId?: string;
  /** oauth2 client secret authenticating the exchange */
  clientSecret?: string;
  /** scopes to request (default: cloud-platform) */
  scopes?: string[];
}

/**
 * extracts the impersonated account from a generateAccessToken url
 * @param url service account impersonation url
 * @returns email of the account
 * @throws {CredentialConfigError} when the url does not name an account
 */
export function extractTargetPrincipal(url: string): string {
  const end = url.lastIndexOf(GENERATE_ACCESS_TOKEN_SUFFIX);
  const start = url.lastIndexOf('/', end) + 1;

  if (end < 0 || start <= 0 || start >= end) {
    throw new CredentialConfigError(
      `unable to determine target principal from service account impersonation url: ${url}`,
    );
  }

  return url.slice(start, end);
}

/**
 * credentials exchanging an external identity for google access tokens
 * @example
 * ```typescript
 * const credentials = new ExternalAccountCredentials({
 *   audience: '//iam.googleapis.com/projects/1/locations/global/workloadIdentityPools/pool/providers/oidc',
 *   subjectTokenType: 'urn:ietf:params:oauth:token-type:jwt',
 *   tokenUrl: 'https://sts.googleapis.com/v1/token',
 *   credentialSource: new FileSubjectTokenSource('/var/run/token'),
 * });
 * ```
 */
export class ExternalAccountCredentials extends CloudCredentials {
  readonly #options: ExternalAccountCredentialsOptions;
  readonly #scopes: string[];
  readonly #impersonated?: ImpersonatedCredentials;

  /**
   * creates external account credentials
   * @param options construction options
   * @throws {CredentialConfigError} when a required option is empty
   */
  constructor(options: ExternalAccountCredentialsOptions) {
    super(options);

    for (const key of ['audience', 'subjectTokenType', 'tokenUrl'] as const) {
      if (!options[key]) {
        throw new CredentialConfigError(
          `external account credentials require ${key}`,
        );
      }
    }

    this.#options = { ...options };
    this.#scopes = options.scopes?.length
      ? [...options.scopes]
      : [CLOUD_PLATFORM_SCOPE];

    if (options.serviceAccountImpersonationUrl) {
      this.#impersonated = this.#createImpersonated(
        options.serviceAccountImpersonationUrl,
      );
    }
  }

  /** audience of the exchanged token */
  public get audience(): string {
    return this.#options.audience;
  }

  /** type of the subject token */
  public get subjectTokenType(): string {
    return this.#options.subjectTokenType;
  }

  /** endpoint of the security token service */
  public get tokenUrl(): string {
    return this.#options.tokenUrl;
  }

  /** endpoint for token introspection */
  public get tokenInfoUrl(): string | undefined {
    return this.#options.tokenInfoUrl;
  }

  /** generateAccessToken url of the impersonated account */
  public get serviceAccountImpersonationUrl(): string | undefined {
    return this.#options.serviceAccountImpersonationUrl;
  }

  /** scopes requested with each token */
  public get scopes(): string[] {
    return [...this.#scopes];
  }

  /** email of the impersonated service account, if any */
  public get serviceAccountEmail(): string | undefined {
    return this.#impersonated?.getAccount();
  }

  /**
   * creates a copy requesting the given scopes
   * @param scopes scopes to request
   * @returns new credentials without a cached token
   */
  public override createScoped(scopes: string[]): ExternalAccountCredentials {
    return new ExternalAccountCredentials({
      ...this.#options,
      accessToken: undefined,
      clock: this.clock,
      log: this.log,
      transport: this.transport,
      scopes,
    });
  }

  /**
   * retrieves the subject token from the configured source
   * @returns the subject token
   */
  public async retrieveSubjectToken(): Promise<string> {
    return this.#options.credentialSource.retrieveSubjectToken();
  }

  /**
   * exchanges the subject token, then impersonates if configured
   * @returns new token
   */
  public override async refreshAccessToken(): Promise<AccessToken> {
    if (this.#impersonated) {
      return this.#impersonated.refreshAccessToken();
    }

    const { clientId, clientSecret } = this.#options;
    const handler = new StsRequestHandler({
      tokenExchangeEndpoint: this.tokenUrl,
      request: {
        subjectToken: await this.retrieveSubjectToken(),
        subjectTokenType: this.subjectTokenType,
        audience: this.audience,
        scopes: this.#scopes,
        requestedTokenType: ACCESS_TOKEN_TYPE,
      },
      clientAuthentication: clientId ? { clientId, clientSecret } : undefined,
      transport: this.transport,
      clock: this.clock,
    });

    const { accessToken } = await handler.exchangeToken();

    return accessToken;
  }

  /**
   * wraps a non-impersonating copy of these credentials for impersonation
   * @param url generateAccessToken url of the account
   * @returns impersonated credentials
   */
  #createImpersonated(url: string): ImpersonatedCredentials {
    const source = new ExternalAccountCredentials({
      ...this.#options,
      accessToken: undefined,
      quotaProjectId: undefined,
      serviceAccountImpersonationUrl: undefined,
      clock: this.clock,
      log: this.log,
      transport: this.transport,
    });

    return new ImpersonatedCredentials({
      sourceCredentials: source,
      targetPrincipal: extractTargetPrincipal(url),
      scopes: this.#scopes,
      lifetime: MAX_TOKEN_LIFETIME_SECONDS,
      iamEndpointOverride: url,
      clock: this.clock,
      log: this.log,
      transport: this.transport,
    });
  }
}
