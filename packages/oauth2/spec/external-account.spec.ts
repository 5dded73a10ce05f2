import { beforeEach, describe, expect, it } from 'vitest';

import { CredentialConfigError } from '#errors';
import {
  ExternalAccountCredentials,
  extractTargetPrincipal,
} from '#external-account';

import { MockTransport, formOf, jsonOf } from './mocks/transport';

import type { Clock } from '@credkit/core';

import type { ExternalAccountCredentialsOptions } from '#external-account';
import type { SubjectTokenSource } from '#subject-token-source';

const now = Date.parse('2024-01-01T00:00:00Z');
const clock: Clock = { now: () => now };

const audience =
  '//iam.googleapis.com/projects/123/locations/global/workloadIdentityPools/pool/providers/provider';
const tokenUrl = 'https://sts.googleapis.com/v1/token';
const impersonationUrl =
  'https://iamcredentials.googleapis.com/v1/projects/-/serviceAccounts/robot@project.iam.gserviceaccount.com:generateAccessToken';
const cloudPlatform = 'https://www.googleapis.com/auth/cloud-platform';

const credentialSource: SubjectTokenSource = {
  retrieveSubjectToken: async () => 'subject-token',
};

const stsBody = {
  access_token: 'sts-token',
  issued_token_type: 'urn:ietf:params:oauth:token-type:access_token',
  token_type: 'Bearer',
  expires_in: 3600,
};

describe('fn:extractTargetPrincipal', () => {
  it('should return the account between the last slash and the method', () => {
    expect(extractTargetPrincipal(impersonationUrl)).toBe(
      'robot@project.iam.gserviceaccount.com',
    );
  });

  it('should reject urls naming no account', () => {
    expect(() =>
      extractTargetPrincipal('https://iamcredentials.googleapis.com/v1/'),
    ).toThrow(CredentialConfigError);
  });
});

describe('cl:ExternalAccountCredentials', () => {
  let transport: MockTransport;

  const create = (
    options: Partial<ExternalAccountCredentialsOptions> = {},
  ): ExternalAccountCredentials =>
    new ExternalAccountCredentials({
      audience,
      subjectTokenType: 'urn:ietf:params:oauth:token-type:jwt',
      tokenUrl,
      credentialSource,
      clock,
      transport,
      ...options,
    });

  beforeEach(() => {
    transport = new MockTransport();
  });

  describe('constructor', () => {
    it('should require the token url', () => {
      expect(() => create({ tokenUrl: '' })).toThrow(
        new CredentialConfigError('external account credentials require tokenUrl'),
      );
    });

    it('should default the scopes to cloud-platform', () => {
      expect(create().scopes).toEqual([cloudPlatform]);
      expect(create({ scopes: [] }).scopes).toEqual([cloudPlatform]);
    });
  });

  describe('mt:refreshAccessToken', () => {
    it('should exchange the subject token at the token url', async () => {
      transport.reply(200, stsBody);

      const token = await create().refreshAccessToken();

      expect(token.value).toBe('sts-token');
      expect(token.expiration).toEqual(new Date('2024-01-01T01:00:00Z'));
      expect(transport.requestAt(0).url).toBe(tokenUrl);
      expect(formOf(transport.requestAt(0))).toEqual({
        grant_type: 'urn:ietf:params:oauth:grant-type:token-exchange',
        subject_token_type: 'urn:ietf:params:oauth:token-type:jwt',
        subject_token: 'subject-token',
        audience,
        scope: cloudPlatform,
        requested_token_type: 'urn:ietf:params:oauth:token-type:access_token',
      });
    });

    it('should authenticate the exchange when a client is configured', async () => {
      transport.reply(200, stsBody);

      await create({
        clientId: 'client-id',
        clientSecret: 'test-secret',
      }).refreshAccessToken();

      expect(transport.requestAt(0).headers?.Authorization).toBe(
        `Basic ${Buffer.from('client-id:test-secret').toString('base64')}`,
      );
    });

    it('should impersonate the configured service account', async () => {
      transport.reply(200, stsBody).reply(200, {
        accessToken: 'impersonated-token',
        expireTime: '2024-01-01T01:00:00Z',
      });

      const credentials = create({
        serviceAccountImpersonationUrl: impersonationUrl,
      });
      const token = await credentials.refreshAccessToken();

      expect(credentials.serviceAccountEmail).toBe(
        'robot@project.iam.gserviceaccount.com',
      );
      expect(token.value).toBe('impersonated-token');
      expect(transport.requestAt(0).url).toBe(tokenUrl);

      const iamRequest = transport.requestAt(1);
      expect(iamRequest.url).toBe(impersonationUrl);
      expect(iamRequest.headers?.Authorization).toBe('Bearer sts-token');
      expect(jsonOf(iamRequest)).toEqual({
        delegates: [],
        scope: [cloudPlatform],
        lifetime: '3600s',
      });
    });
  });

  describe('mt:getRequestMetadata', () => {
    it('should add the quota project header', async () => {
      transport.reply(200, stsBody);

      const metadata = await create({
        quotaProjectId: 'billing-project',
      }).getRequestMetadata();

      expect(metadata).toEqual({
        'Authorization': ['Bearer sts-token'],
        'x-goog-user-project': ['billing-project'],
      });
    });
  });

  describe('mt:createScoped', () => {
    it('should request the new scopes', async () => {
      transport.reply(200, stsBody);

      const scoped = create().createScoped(['scope-a']);
      await scoped.refresh();

      expect(scoped.scopes).toEqual(['scope-a']);
      expect(formOf(transport.requestAt(0)).scope).toBe('scope-a');
    });
  });
});
