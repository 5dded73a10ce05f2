import { verify } from 'node:crypto';

import { directExecutor } from '@credkit/core';
import { compactVerify, decodeJwt, decodeProtectedHeader, importSPKI } from 'jose';
import { describe, expect, it, vi } from 'vitest';

import { CredentialConfigError } from '#errors';
import { ServiceAccountJwtAccessCredentials } from '#jwt-access';

import { testKeys } from './mocks/keys';

import type { Clock, Log, RequestMetadata } from '@credkit/core';

const now = Date.parse('2024-01-01T00:00:00Z');
const issuedAt = now / 1000;
const clock: Clock = { now: () => now };
const email = 'robot@project.iam.gserviceaccount.com';

/**
 * extracts the jwt from bearer metadata
 * @param metadata request metadata
 * @returns the jwt
 */
function jwtOf(metadata: RequestMetadata): string {
  return (metadata.Authorization?.[0] ?? '').replace(/^Bearer /, '');
}

describe('cl:ServiceAccountJwtAccessCredentials', () => {
  const create = (
    defaultAudience?: string,
  ): ServiceAccountJwtAccessCredentials =>
    new ServiceAccountJwtAccessCredentials({
      clientEmail: email,
      privateKey: testKeys.privateKey,
      privateKeyId: 'key-1',
      defaultAudience,
      clock,
    });

  describe('mt:getRequestMetadata', () => {
    it('should sign a jwt for the request uri', async () => {
      const metadata = await create().getRequestMetadata(
        'https://pubsub.googleapis.com/',
      );
      const jwt = jwtOf(metadata);

      expect(decodeProtectedHeader(jwt)).toEqual({
        alg: 'RS256',
        typ: 'JWT',
        kid: 'key-1',
      });
      expect(decodeJwt(jwt)).toEqual({
        iss: email,
        sub: email,
        aud: 'https://pubsub.googleapis.com/',
        iat: issuedAt,
        exp: issuedAt + 3600,
      });
      await expect(
        compactVerify(jwt, await importSPKI(testKeys.publicKey, 'RS256')),
      ).resolves.toBeDefined();
    });

    it('should fall back to the default audience', async () => {
      const metadata = await create(
        'https://default.example.com/',
      ).getRequestMetadata();

      expect(decodeJwt(jwtOf(metadata)).aud).toBe(
        'https://default.example.com/',
      );
    });

    it('should require an audience', async () => {
      await expect(create().getRequestMetadata()).rejects.toThrow(
        new CredentialConfigError(
          'jwt access credentials require a request uri or a default audience',
        ),
      );
    });
  });

  describe('mt:getRequestMetadataAsync', () => {
    it('should deliver the metadata through the callback', async () => {
      const onSuccess = vi.fn();
      const onFailure = vi.fn();

      create().getRequestMetadataAsync(
        'https://pubsub.googleapis.com/',
        directExecutor,
        { onSuccess, onFailure },
      );

      await vi.waitFor(() => expect(onSuccess).toHaveBeenCalledTimes(1));
      expect(onFailure).not.toHaveBeenCalled();
    });

    it('should deliver a missing audience to onFailure', async () => {
      const onSuccess = vi.fn();
      const onFailure = vi.fn();

      create().getRequestMetadataAsync(undefined, directExecutor, {
        onSuccess,
        onFailure,
      });

      await vi.waitFor(() => expect(onFailure).toHaveBeenCalledTimes(1));
      expect(onFailure.mock.calls[0]?.[0]).toBeInstanceOf(CredentialConfigError);
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it('should log a callback that throws', async () => {
      const log = vi.fn<Log>();
      const credentials = new ServiceAccountJwtAccessCredentials({
        clientEmail: email,
        privateKey: testKeys.privateKey,
        clock,
        log,
      });

      credentials.getRequestMetadataAsync(
        'https://pubsub.googleapis.com/',
        directExecutor,
        {
          onSuccess: () => {
            throw new Error('callback failed');
          },
          onFailure: vi.fn(),
        },
      );

      await vi.waitFor(() =>
        expect(log).toHaveBeenCalledWith(
          'warn',
          'request metadata callback failed',
          expect.objectContaining({ message: 'callback failed' }),
        ),
      );
    });
  });

  describe('mt:refresh', () => {
    it('should do nothing', async () => {
      await expect(create().refresh()).resolves.toBeUndefined();
    });
  });

  describe('mt:getAuthenticationType', () => {
    it('should identify jwt access', () => {
      expect(create().getAuthenticationType()).toBe('JWTAccess');
    });
  });

  describe('mt:sign', () => {
    it('should sign with the private key', async () => {
      const bytes = new TextEncoder().encode('payload');

      const signature = await create().sign(bytes);

      expect(verify('sha256', bytes, testKeys.publicKey, signature)).toBe(true);
    });
  });
});
