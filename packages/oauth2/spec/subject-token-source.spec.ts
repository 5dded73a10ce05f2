import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { CredentialError, HttpStatusError, MalformedResponseError } from '#errors';
import {
  FileSubjectTokenSource,
  UrlSubjectTokenSource,
} from '#subject-token-source';

import { MockTransport } from './mocks/transport';

describe('cl:FileSubjectTokenSource', () => {
  let directory: string;

  beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'subject-token-'));
    await writeFile(join(directory, 'token.txt'), 'file-token');
    await writeFile(
      join(directory, 'token.json'),
      JSON.stringify({ id_token: 'json-token' }),
    );
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('mt:retrieveSubjectToken', () => {
    it('should read a text file verbatim', async () => {
      const source = new FileSubjectTokenSource(join(directory, 'token.txt'));

      expect(await source.retrieveSubjectToken()).toBe('file-token');
    });

    it('should read a field of a json file', async () => {
      const source = new FileSubjectTokenSource(join(directory, 'token.json'), {
        type: 'json',
        subjectTokenFieldName: 'id_token',
      });

      expect(await source.retrieveSubjectToken()).toBe('json-token');
    });

    it('should report a json file missing the field', async () => {
      const path = join(directory, 'token.json');
      const source = new FileSubjectTokenSource(path, {
        type: 'json',
        subjectTokenFieldName: 'access_token',
      });

      await expect(source.retrieveSubjectToken()).rejects.toThrow(
        new MalformedResponseError(
          `error parsing subject token from file ${path}: missing field 'access_token'`,
        ),
      );
    });

    it('should report a missing file', async () => {
      const path = join(directory, 'missing.txt');
      const source = new FileSubjectTokenSource(path);

      const error = await source
        .retrieveSubjectToken()
        .catch((exception: unknown) => exception);

      expect(error).toBeInstanceOf(CredentialError);
      expect(error).toMatchObject({
        message: `error reading subject token from file ${path}`,
        cause: expect.objectContaining({ code: 'ENOENT' }),
      });
    });
  });
});

describe('cl:UrlSubjectTokenSource', () => {
  const url = 'http://localhost:5000/token';

  describe('mt:retrieveSubjectToken', () => {
    it('should fetch the token with the configured headers', async () => {
      const transport = new MockTransport().reply(200, 'url-token');
      const source = new UrlSubjectTokenSource({
        url,
        headers: { 'Metadata': 'True' },
        transport,
      });

      expect(await source.retrieveSubjectToken()).toBe('url-token');
      expect(transport.requestAt(0)).toEqual({
        method: 'GET',
        url,
        headers: { Metadata: 'True' },
      });
    });

    it('should read a field of a json response', async () => {
      const transport = new MockTransport().reply(200, {
        access_token: 'json-token',
      });
      const source = new UrlSubjectTokenSource({
        url,
        format: { type: 'json', subjectTokenFieldName: 'access_token' },
        transport,
      });

      expect(await source.retrieveSubjectToken()).toBe('json-token');
    });

    it('should report an unexpected status', async () => {
      const transport = new MockTransport().reply(500, 'oops');
      const source = new UrlSubjectTokenSource({ url, transport });

      const error = await source
        .retrieveSubjectToken()
        .catch((exception: unknown) => exception);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({
        message: `error retrieving subject token from ${url}: unexpected status 500: oops`,
        status: 500,
      });
    });
  });
});
