/**
 * @file calls to the iam credentials api
 */

import { signBlobUrl } from '#constants/endpoints';
import {
  HTTP_STATUS_BAD_REQUEST,
  HTTP_STATUS_OK,
  HTTP_STATUS_SERVER_ERROR,
} from '#constants/http';
import { HttpStatusError } from '#errors';
import { readJsonObject, requireString, throwForStatus } from '#parsing';
import { postJson } from '#transport';

import type { RequestMetadata } from '@credkit/core';

import type { HttpTransport } from '#transport';

const PARSE_ERROR_PREFIX = 'error parsing signBlob response';

/** parameters of a signBlob call */
export interface SignBlobParams {
  /** transport to send the request with */
  transport: HttpTransport;
  /** service account whose key signs */
  account: string;
  /** headers authorizing the caller, e.g. from getRequestMetadata */
  requestMetadata: RequestMetadata;
  /** data to sign */
  bytes: Uint8Array;
}

/**
 * flattens request metadata into plain headers, joining repeated values
 * @param metadata request metadata
 * @returns headers for a request
 */
export function toHeaders(metadata: RequestMetadata): Record<string, string> {
  return Object.fromEntries(
    Object.entries(metadata).map(([name, values]) => [name, values.join(', ')]),
  );
}

/**
 * signs bytes with a service account's google-managed key
 * @param params call parameters
 * @returns signature
 */
export async function signBlob(params: SignBlobParams): Promise<Uint8Array> {
  const { transport, account, requestMetadata, bytes } = params;

  const response = await postJson(
    transport,
    signBlobUrl(account),
    { payload: Buffer.from(bytes).toString('base64') },
    toHeaders(requestMetadata),
  );

  if (
    response.status >= HTTP_STATUS_BAD_REQUEST &&
    response.status < HTTP_STATUS_SERVER_ERROR
  ) {
    return throwForStatus(response, 'error signing blob');
  }

  if (response.status !== HTTP_STATUS_OK) {
    const body = await response.text();

    throw new HttpStatusError(
      `unexpected error code ${response.status} while signing blob: ${body}`,
      response.status,
      body,
    );
  }

  const data = await readJsonObject(response, PARSE_ERROR_PREFIX);

  return new Uint8Array(
    Buffer.from(requireString(data, 'signedBlob', PARSE_ERROR_PREFIX), 'base64'),
  );
}
