import { OAuth2Credentials } from '@credkit/core';

import { QUOTA_PROJECT_HEADER } from '#constants/http';
import { defaultTransport } from '#transport';

import type { OAuth2CredentialsOptions, RequestMetadata } from '@credkit/core';

import type { HttpTransport } from '#transport';

/** options shared by every credential that talks to a server */
export interface CloudCredentialsOptions extends OAuth2CredentialsOptions {
  /** transport for token requests (default: fetch) */
  transport?: HttpTransport;
  /** project billed for api usage, sent as x-goog-user-project */
  quotaProjectId?: string;
}

/**
 * oauth2 credentials obtained from a remote server
 *
 * adds scoping and quota project attribution on top of the token cache
 */
export abstract class CloudCredentials extends OAuth2Credentials {
  /** transport for token requests */
  protected readonly transport: HttpTransport;

  /** project billed for api usage */
  public readonly quotaProjectId?: string;

  /**
   * creates cloud credentials
   * @param options construction options
   */
  constructor(options: CloudCredentialsOptions = {}) {
    super(options);

    this.transport = options.transport ?? defaultTransport;
    this.quotaProjectId = options.quotaProjectId;
  }

  /**
   * tells whether scopes must be supplied before a token can be obtained
   * @returns true if {@link createScoped} is needed
   */
  public createScopedRequired(): boolean {
    return false;
  }

  /**
   * creates a copy limited to the given scopes
   *
   * credentials whose scopes are fixed return themselves
   * @param _scopes scopes to request
   * @returns scoped credentials
   */
  public createScoped(_scopes: string[]): CloudCredentials {
    return this;
  }

  /**
   * attaches the quota project header when one is configured
   * @param metadata cached bearer headers
   * @returns headers returned to the caller
   */
  protected override decorateRequestMetadata(
    metadata: RequestMetadata,
  ): RequestMetadata {
    return this.quotaProjectId
      ? { ...metadata, [QUOTA_PROJECT_HEADER]: [this.quotaProjectId] }
      : { ...metadata };
  }
}
