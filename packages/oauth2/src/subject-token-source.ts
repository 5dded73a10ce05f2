/**
 * @file sources of the third-party token exchanged by external accounts
 */

import { readFile } from 'node:fs/promises';

import { HTTP_STATUS_OK } from '#constants/http';
import { CredentialError, HttpStatusError } from '#errors';
import { parseJsonObject, requireString } from '#parsing';

import type { HttpTransport } from '#transport';

/** how the subject token is stored in its source */
export type SubjectTokenFormat =
  | { type: 'text' }
  | {
      type: 'json';
      /** field holding the token */
      subjectTokenFieldName: string;
    };

/** supplies the subject token of an external account */
export interface SubjectTokenSource {
  /**
   * retrieves the current subject token
   * @returns the token
   */
  retrieveSubjectToken(): Promise<string>;
}

/**
 * extracts the token from the raw content of a source
 * @param content raw content
 * @param format format of the content
 * @param origin description of the source for error messages
 * @returns the token
 */
function extractSubjectToken(
  content: string,
  format: SubjectTokenFormat,
  origin: string,
): string {
  if (format.type === 'text') {
    return content;
  }

  const context = `error parsing subject token from ${origin}`;

  return requireString(
    parseJsonObject(content, context),
    format.subjectTokenFieldName,
    context,
  );
}

/** reads the subject token from a file, e.g. one kept up to date by a sidecar */
export class FileSubjectTokenSource implements SubjectTokenSource {
  readonly #path: string;
  readonly #format: SubjectTokenFormat;

  /**
   * creates a file source
   * @param path path of the file
   * @param format format of the file (default: text)
   */
  constructor(path: string, format: SubjectTokenFormat = { type: 'text' }) {
    this.#path = path;
    this.#format = format;
  }

  /** @inheritdoc */
  public async retrieveSubjectToken(): Promise<string> {
    let content: string;
    try {
      content = await readFile(this.#path, 'utf8');
    } catch (exception) {
      throw new CredentialError(
        `error reading subject token from file ${this.#path}`,
        { cause: exception },
      );
    }

    return extractSubjectToken(content, this.#format, `file ${this.#path}`);
  }
}

/** options of an url source */
export interface UrlSubjectTokenSourceOptions {
  /** url serving the token */
  url: string;
  /** headers sent with the request */
  headers?: Record<string, string>;
  /** format of the response (default: text) */
  format?: SubjectTokenFormat;
  /** transport for the request */
  transport: HttpTransport;
}

/** fetches the subject token from a local url, e.g. a workload metadata endpoint */
export class UrlSubjectTokenSource implements SubjectTokenSource {
  readonly #options: UrlSubjectTokenSourceOptions;

  /**
   * creates an url source
   * @param options source options
   */
  constructor(options: UrlSubjectTokenSourceOptions) {
    this.#options = options;
  }

  /** @inheritdoc */
  public async retrieveSubjectToken(): Promise<string> {
    const { url, headers, format = { type: 'text' }, transport } = this.#options;

    const response = await transport.request({ method: 'GET', url, headers });
    const body = await response.text();

    if (response.status !== HTTP_STATUS_OK) {
      throw new HttpStatusError(
        `error retrieving subject token from ${url}: unexpected status ${response.status}: ${body}`,
        response.status,
        body,
      );
    }

    return extractSubjectToken(body, format, url);
  }
}
