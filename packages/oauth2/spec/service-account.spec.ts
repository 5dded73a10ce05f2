import { verify } from 'node:crypto';

import { compactVerify, decodeJwt, decodeProtectedHeader, importSPKI } from 'jose';
import { beforeEach, describe, expect, it } from 'vitest';

import {
  CredentialConfigError,
  MalformedResponseError,
  OAuthError,
  ScopesRequiredError,
} from '#errors';
import { ServiceAccountCredentials } from '#service-account';

import { testKeys } from './mocks/keys';
import { MockTransport, formOf } from './mocks/transport';

import type { Clock } from '@credkit/core';

import type { ServiceAccountCredentialsOptions } from '#service-account';

const now = Date.parse('2024-01-01T00:00:00Z');
const issuedAt = now / 1000;
const clock: Clock = { now: () => now };

const scope = 'https://www.googleapis.com/auth/devstorage.read_only';
const email = 'robot@project.iam.gserviceaccount.com';

describe('cl:ServiceAccountCredentials', () => {
  let transport: MockTransport;

  const create = (
    options: Partial<ServiceAccountCredentialsOptions> = {},
  ): ServiceAccountCredentials =>
    new ServiceAccountCredentials({
      clientEmail: email,
      clientId: 'client-id',
      privateKey: testKeys.privateKey,
      privateKeyId: 'key-1',
      scopes: [scope],
      clock,
      transport,
      ...options,
    });

  beforeEach(() => {
    transport = new MockTransport();
  });

  describe('constructor', () => {
    it('should reject an unparsable private key', () => {
      expect(() => create({ privateKey: 'not a key' })).toThrow(
        new CredentialConfigError('invalid pkcs#8 private key'),
      );
    });
  });

  describe('mt:refreshAccessToken', () => {
    it('should exchange a signed assertion for a token', async () => {
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      const token = await create().refreshAccessToken();

      expect(token.value).toBe('sa-token');
      expect(token.expiration).toEqual(new Date('2024-01-01T01:00:00Z'));

      const request = transport.requestAt(0);
      expect(request.method).toBe('POST');
      expect(request.url).toBe('https://oauth2.googleapis.com/token');

      const form = formOf(request);
      expect(form.grant_type).toBe(
        'urn:ietf:params:oauth:grant-type:jwt-bearer',
      );

      const assertion = form.assertion ?? '';
      expect(decodeProtectedHeader(assertion)).toEqual({
        alg: 'RS256',
        typ: 'JWT',
        kid: 'key-1',
      });
      expect(decodeJwt(assertion)).toEqual({
        iss: email,
        sub: email,
        aud: 'https://oauth2.googleapis.com/token',
        scope,
        iat: issuedAt,
        exp: issuedAt + 3600,
      });
      await expect(
        compactVerify(assertion, await importSPKI(testKeys.publicKey, 'RS256')),
      ).resolves.toBeDefined();
    });

    it('should send the assertion to a custom token endpoint', async () => {
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      await create({
        tokenServerUri: 'https://oauth.example.com/token',
      }).refreshAccessToken();

      const assertion = formOf(transport.requestAt(0)).assertion ?? '';
      expect(transport.requestAt(0).url).toBe('https://oauth.example.com/token');
      expect(decodeJwt(assertion).aud).toBe('https://oauth.example.com/token');
    });

    it('should raise an OAuthError when the token endpoint rejects the grant', async () => {
      transport.reply(400, {
        error: 'invalid_grant',
        error_description: 'Invalid JWT Signature.',
      });

      const promise = create().refreshAccessToken();

      await expect(promise).rejects.toBeInstanceOf(OAuthError);
      await expect(promise).rejects.toThrow(
        'error getting access token for service account: invalid_grant: Invalid JWT Signature.',
      );
    });

    it('should reject a response without an access token', async () => {
      transport.reply(200, { expires_in: 3600 });

      await expect(create().refreshAccessToken()).rejects.toThrow(
        new MalformedResponseError(
          "error parsing token refresh response: missing field 'access_token'",
        ),
      );
    });
  });

  describe('mt:getRequestMetadata', () => {
    it('should render the bearer header', async () => {
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      const metadata = await create().getRequestMetadata();

      expect(metadata).toEqual({ Authorization: ['Bearer sa-token'] });
    });

    it('should add the quota project header', async () => {
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      const metadata = await create({
        quotaProjectId: 'billing-project',
      }).getRequestMetadata();

      expect(metadata).toEqual({
        'Authorization': ['Bearer sa-token'],
        'x-goog-user-project': ['billing-project'],
      });
    });

    it('should fail without a request when no scopes are configured', async () => {
      const credentials = create({ scopes: undefined });

      await expect(credentials.getRequestMetadata()).rejects.toBeInstanceOf(
        ScopesRequiredError,
      );
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('mt:createScoped', () => {
    it('should return a scoped copy of unscoped credentials', async () => {
      const unscoped = create({ scopes: [] });
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      const scoped = unscoped.createScoped(['scope-a', 'scope-b']);
      await scoped.refresh();

      expect(unscoped.createScopedRequired()).toBe(true);
      expect(scoped.createScopedRequired()).toBe(false);
      expect(scoped).not.toBe(unscoped);
      expect(scoped.scopes).toEqual(['scope-a', 'scope-b']);
      expect(scoped.clientEmail).toBe(email);
      expect(
        decodeJwt(formOf(transport.requestAt(0)).assertion ?? '').scope,
      ).toBe('scope-a scope-b');
    });
  });

  describe('mt:createDelegated', () => {
    it('should put the delegated user in the subject', async () => {
      transport.reply(200, { access_token: 'sa-token', expires_in: 3600 });

      const delegated = create().createDelegated('user@example.com');
      await delegated.refresh();

      const claims = decodeJwt(formOf(transport.requestAt(0)).assertion ?? '');
      expect(delegated.serviceAccountUser).toBe('user@example.com');
      expect(claims.iss).toBe(email);
      expect(claims.sub).toBe('user@example.com');
    });
  });

  describe('mt:sign', () => {
    it('should sign with the private key', async () => {
      const bytes = new TextEncoder().encode('data to sign');

      const signature = await create().sign(bytes);

      expect(verify('sha256', bytes, testKeys.publicKey, signature)).toBe(true);
    });
  });

  describe('mt:getAccount', () => {
    it('should return the client email', () => {
      expect(create().getAccount()).toBe(email);
    });
  });
});
