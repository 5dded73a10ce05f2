/**
 * @file credentials of the compute engine default service account
 *
 * tokens come from the instance metadata server, which is only reachable
 * from inside google cloud
 */

import { jsonifyError } from '@credkit/core';

import { CloudCredentials } from '#cloud-credentials';
import { readEnvironmentConfig } from '#config';
import { DEFAULT_METADATA_HOST, METADATA_TOKEN_PATH } from '#constants/endpoints';
import {
  HTTP_STATUS_NOT_FOUND,
  HTTP_STATUS_OK,
  METADATA_FLAVOR_HEADER,
  METADATA_FLAVOR_VALUE,
} from '#constants/http';
import { HttpStatusError, MetadataServerUnavailableError } from '#errors';
import { parseTokenResponse, readJsonObject } from '#parsing';
import { retry } from '#retry';
import { defaultTransport, isHostNotFound } from '#transport';

import type { AccessToken, Log } from '@credkit/core';

import type { CloudCredentialsOptions } from '#cloud-credentials';
import type { EnvironmentConfig } from '#config';
import type { HttpResponse, HttpTransport } from '#transport';

const PARSE_ERROR_PREFIX = 'error parsing token refresh response';

/** number of attempts made to reach the metadata server when probing */
export const MAX_COMPUTE_PING_TRIES = 3;

/** timeout in milliseconds of each probe attempt */
export const COMPUTE_PING_TIMEOUT_MS = 500;

/** options for compute engine credentials */
export interface ComputeEngineCredentialsOptions
  extends CloudCredentialsOptions {
  /** environment settings (default: read from process.env) */
  environment?: EnvironmentConfig;
}

/** options for the compute engine probe */
export interface ComputeEngineProbeOptions {
  /** transport for the probe (default: fetch) */
  transport?: HttpTransport;
  /** environment settings (default: read from process.env) */
  environment?: EnvironmentConfig;
  /** optional logging function */
  log?: Log;
}

/**
 * returns the base url of the metadata server
 * @param environment environment settings
 * @returns url without a trailing slash
 */
export function getMetadataServerUrl(
  environment: EnvironmentConfig = readEnvironmentConfig(),
): string {
  return `http://${environment.metadataHost ?? DEFAULT_METADATA_HOST}`;
}

/**
 * credentials of the service account attached to the running instance
 * @example
 * ```typescript
 * if (await ComputeEngineCredentials.isRunningOnComputeEngine()) {
 *   const credentials = new ComputeEngineCredentials();
 *   const headers = await credentials.getRequestMetadata();
 * }
 * ```
 */
export class ComputeEngineCredentials extends CloudCredentials {
  readonly #metadataServerUrl: string;

  /**
   * creates compute engine credentials
   * @param options construction options
   */
  constructor(options: ComputeEngineCredentialsOptions = {}) {
    super(options);

    this.#metadataServerUrl = getMetadataServerUrl(options.environment);
  }

  /** url of the token on the metadata server */
  public get tokenServerUrl(): string {
    return `${this.#metadataServerUrl}${METADATA_TOKEN_PATH}`;
  }

  /**
   * probes the metadata server to tell whether code runs on compute engine
   *
   * never throws; failures of every attempt are logged and yield false
   * @param options probe options
   * @returns true if the metadata server answered as such
   */
  public static async isRunningOnComputeEngine(
    options: ComputeEngineProbeOptions = {},
  ): Promise<boolean> {
    const {
      transport = defaultTransport,
      environment = readEnvironmentConfig(),
      log,
    } = options;

    if (environment.skipComputeEngineCheck) {
      return false;
    }

    const url = getMetadataServerUrl(environment);

    try {
      return await retry(
        async ({ abortSignal }) => {
          const response = await transport.request({
            method: 'GET',
            url,
            headers: { [METADATA_FLAVOR_HEADER]: METADATA_FLAVOR_VALUE },
            signal: abortSignal,
          });
          const flavor = response.headers.get(METADATA_FLAVOR_HEADER);

          // drain the body so the connection is released
          await response.text();

          return flavor === METADATA_FLAVOR_VALUE;
        },
        {
          name: 'compute engine probe',
          maxRetries: MAX_COMPUTE_PING_TRIES - 1,
          timeout: COMPUTE_PING_TIMEOUT_MS,
          log,
        },
      );
    } catch (exception) {
      log?.(
        'warn',
        'failed to detect whether running on compute engine',
        jsonifyError(exception),
      );

      return false;
    }
  }

  /**
   * fetches a token for the default service account from the metadata server
   * @returns new token
   * @throws {MetadataServerUnavailableError} when the metadata server host is unknown
   */
  public override async refreshAccessToken(): Promise<AccessToken> {
    const response = await this.#getMetadataToken();

    if (response.status === HTTP_STATUS_NOT_FOUND) {
      throw new HttpStatusError(
        `error code ${response.status} trying to get security access token from compute engine metadata for the default service account, this may be because the virtual machine instance does not have permission scopes specified`,
        response.status,
        await response.text(),
      );
    }

    if (response.status !== HTTP_STATUS_OK) {
      const body = await response.text();

      throw new HttpStatusError(
        `unexpected error code ${response.status} trying to get security access token from compute engine metadata for the default service account: ${body}`,
        response.status,
        body,
      );
    }

    const data = await readJsonObject(response, PARSE_ERROR_PREFIX);

    return parseTokenResponse(data, this.clock, PARSE_ERROR_PREFIX);
  }

  /**
   * requests the token from the metadata server
   * @returns the raw response
   */
  async #getMetadataToken(): Promise<HttpResponse> {
    try {
      return await this.transport.request({
        method: 'GET',
        url: this.tokenServerUrl,
        headers: { [METADATA_FLAVOR_HEADER]: METADATA_FLAVOR_VALUE },
      });
    } catch (exception) {
      if (isHostNotFound(exception)) {
        throw new MetadataServerUnavailableError(
          'unable to reach the metadata server, the application is probably not running on compute engine',
          { cause: exception },
        );
      }

      throw exception;
    }
  }
}
