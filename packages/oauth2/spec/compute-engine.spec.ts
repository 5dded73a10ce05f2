import { describe, expect, it, vi } from 'vitest';

import {
  ComputeEngineCredentials,
  getMetadataServerUrl,
} from '#compute-engine';
import {
  HttpStatusError,
  MalformedResponseError,
  MetadataServerUnavailableError,
  TransportError,
} from '#errors';

import { MockTransport } from './mocks/transport';

import type { Clock, Log } from '@credkit/core';

import type { HttpTransport } from '#transport';

const now = Date.parse('2024-01-01T00:00:00Z');
const clock: Clock = { now: () => now };
const environment = { skipComputeEngineCheck: false };
const tokenUrl =
  'http://169.254.169.254/computeMetadata/v1/instance/service-accounts/default/token';

/** error carrying a system error code, as raised by dns lookups */
class SystemError extends Error {
  public readonly code: string;

  constructor(code: string) {
    super(`getaddrinfo ${code} metadata.google.internal`);
    this.code = code;
  }
}

describe('fn:getMetadataServerUrl', () => {
  it('should default to the link-local address', () => {
    expect(getMetadataServerUrl(environment)).toBe('http://169.254.169.254');
  });

  it('should honor a configured host', () => {
    expect(
      getMetadataServerUrl({ ...environment, metadataHost: 'localhost:8080' }),
    ).toBe('http://localhost:8080');
  });
});

describe('cl:ComputeEngineCredentials', () => {
  describe('mt:refreshAccessToken', () => {
    it('should fetch the default service account token', async () => {
      const transport = new MockTransport().reply(200, {
        access_token: 'gce-token',
        expires_in: 3599,
        token_type: 'Bearer',
      });
      const credentials = new ComputeEngineCredentials({
        environment,
        clock,
        transport,
      });

      const token = await credentials.refreshAccessToken();

      expect(token.value).toBe('gce-token');
      expect(token.expirationTime).toBe(now + 3_599_000);
      expect(transport.requestAt(0)).toEqual({
        method: 'GET',
        url: tokenUrl,
        headers: { 'Metadata-Flavor': 'Google' },
      });
    });

    it('should use a configured metadata host', async () => {
      const transport = new MockTransport().reply(200, {
        access_token: 'gce-token',
        expires_in: 3599,
      });
      const credentials = new ComputeEngineCredentials({
        environment: { ...environment, metadataHost: 'metadata.test:8080' },
        transport,
      });

      await credentials.refreshAccessToken();

      expect(transport.requestAt(0).url).toBe(
        'http://metadata.test:8080/computeMetadata/v1/instance/service-accounts/default/token',
      );
    });

    it('should explain a 404 as missing permission scopes', async () => {
      const transport = new MockTransport().reply(404, 'not found');
      const credentials = new ComputeEngineCredentials({
        environment,
        transport,
      });

      const error = await credentials
        .refreshAccessToken()
        .catch((exception: unknown) => exception);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ status: 404, body: 'not found' });
      expect(String(error)).toContain(
        'this may be because the virtual machine instance does not have permission scopes specified',
      );
    });

    it('should report other statuses with the body', async () => {
      const transport = new MockTransport().reply(503, 'unavailable');
      const credentials = new ComputeEngineCredentials({
        environment,
        transport,
      });

      await expect(credentials.refreshAccessToken()).rejects.toThrow(
        'unexpected error code 503 trying to get security access token from compute engine metadata for the default service account: unavailable',
      );
    });

    it('should report an unresolvable host as an unavailable metadata server', async () => {
      const cause = new TransportError('GET failed', {
        cause: new SystemError('ENOTFOUND'),
      });
      const transport = new MockTransport().fail(cause);
      const credentials = new ComputeEngineCredentials({
        environment,
        transport,
      });

      const error = await credentials
        .refreshAccessToken()
        .catch((exception: unknown) => exception);

      expect(error).toBeInstanceOf(MetadataServerUnavailableError);
      expect(error).toMatchObject({ cause });
    });

    it('should pass other transport failures through', async () => {
      const failure = new TransportError('connection reset');
      const transport = new MockTransport().fail(failure);
      const credentials = new ComputeEngineCredentials({
        environment,
        transport,
      });

      await expect(credentials.refreshAccessToken()).rejects.toBe(failure);
    });

    it('should reject an empty response', async () => {
      const transport = new MockTransport().reply(200, '');
      const credentials = new ComputeEngineCredentials({
        environment,
        transport,
      });

      await expect(credentials.refreshAccessToken()).rejects.toThrow(
        new MalformedResponseError(
          'error parsing token refresh response: empty content',
        ),
      );
    });
  });

  describe('mt:isRunningOnComputeEngine', () => {
    it('should skip the probe when configured to', async () => {
      const transport = new MockTransport();

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment: { skipComputeEngineCheck: true },
        transport,
      });

      expect(result).toBe(false);
      expect(transport.requests).toHaveLength(0);
    });

    it('should recognize the metadata server by its flavor header', async () => {
      const transport = new MockTransport().reply(200, '', {
        'Metadata-Flavor': 'Google',
      });

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment,
        transport,
      });

      expect(result).toBe(true);
      expect(transport.requestAt(0).url).toBe('http://169.254.169.254');
      expect(transport.requestAt(0).headers).toEqual({
        'Metadata-Flavor': 'Google',
      });
    });

    it('should read the probe response to the end', async () => {
      const text = vi.fn(async () => 'computeMetadata/');
      const transport: HttpTransport = {
        request: async () => ({
          status: 200,
          headers: new Headers({ 'Metadata-Flavor': 'Google' }),
          text,
        }),
      };

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment,
        transport,
      });

      expect(result).toBe(true);
      expect(text).toHaveBeenCalledTimes(1);
    });

    it('should not trust a server without the flavor header', async () => {
      const transport = new MockTransport().reply(200, 'hello');

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment,
        transport,
      });

      expect(result).toBe(false);
      expect(transport.requests).toHaveLength(1);
    });

    it('should retry failed probes and give up after three attempts', async () => {
      const log = vi.fn<Log>();
      const transport = new MockTransport()
        .fail(new TransportError('connection refused'))
        .fail(new TransportError('connection refused'))
        .fail(new TransportError('connection refused'));

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment,
        transport,
        log,
      });

      expect(result).toBe(false);
      expect(transport.requests).toHaveLength(3);
      expect(log).toHaveBeenCalledWith(
        'warn',
        'failed to detect whether running on compute engine',
        expect.objectContaining({ message: 'connection refused' }),
      );
    });

    it('should succeed when a retry reaches the server', async () => {
      const transport = new MockTransport()
        .fail(new TransportError('connection refused'))
        .reply(200, '', { 'Metadata-Flavor': 'Google' });

      const result = await ComputeEngineCredentials.isRunningOnComputeEngine({
        environment,
        transport,
      });

      expect(result).toBe(true);
      expect(transport.requests).toHaveLength(2);
    });
  });
});
