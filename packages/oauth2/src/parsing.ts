/**
 * @file helpers reading token server responses
 *
 * every credential variant parses small json documents whose required
 * fields must be present with the right type; any deviation becomes a
 * MalformedResponseError naming the field
 */

import { AccessToken, MS_PER_SECOND, isJsonObject } from '@credkit/core';

import { HttpStatusError, MalformedResponseError, OAuthError } from '#errors';

import type { Clock, JsonObject } from '@credkit/core';

import type { HttpResponse } from '#transport';

/**
 * parses a json object
 * @param text raw text
 * @param context prefix of error messages
 * @returns the parsed object
 * @throws {MalformedResponseError} when the text is empty or not a json object
 */
export function parseJsonObject(text: string, context: string): JsonObject {
  if (!text.trim()) {
    throw new MalformedResponseError(`${context}: empty content`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (exception) {
    throw new MalformedResponseError(`${context}: invalid json`, {
      cause: exception,
    });
  }

  if (!isJsonObject(data)) {
    throw new MalformedResponseError(`${context}: expected a json object`);
  }

  return data;
}

/**
 * reads a response body as a json object
 * @param response response to read
 * @param context prefix of error messages
 * @returns the parsed body
 */
export async function readJsonObject(
  response: HttpResponse,
  context: string,
): Promise<JsonObject> {
  return parseJsonObject(await response.text(), context);
}

/**
 * reads a required string field
 * @param data object to read from
 * @param key field name
 * @param context prefix of error messages
 * @returns the field value
 */
export function requireString(
  data: JsonObject,
  key: string,
  context: string,
): string {
  const value = data[key];

  if (value === undefined || value === null) {
    throw new MalformedResponseError(`${context}: missing field '${key}'`);
  }

  if (typeof value !== 'string') {
    throw new MalformedResponseError(
      `${context}: expected a string for '${key}'`,
    );
  }

  return value;
}

/**
 * reads an optional string field
 * @param data object to read from
 * @param key field name
 * @param context prefix of error messages
 * @returns the field value if present
 */
export function optionalString(
  data: JsonObject,
  key: string,
  context: string,
): string | undefined {
  const value = data[key];

  return value === undefined || value === null
    ? undefined
    : requireString(data, key, context);
}

/**
 * reads a required integer field
 * @param data object to read from
 * @param key field name
 * @param context prefix of error messages
 * @returns the field value
 */
export function requireInteger(
  data: JsonObject,
  key: string,
  context: string,
): number {
  const value = data[key];

  if (value === undefined || value === null) {
    throw new MalformedResponseError(`${context}: missing field '${key}'`);
  }

  // some servers send numbers as strings; blank ones would read as 0
  const number =
    typeof value === 'string'
      ? value.trim()
        ? Number(value)
        : Number.NaN
      : value;

  if (typeof number !== 'number' || !Number.isInteger(number)) {
    throw new MalformedResponseError(
      `${context}: expected an integer for '${key}'`,
    );
  }

  return number;
}

/**
 * reads an access_token / expires_in pair into a token
 * @param data token response
 * @param clock time source the expiry is relative to
 * @param context prefix of error messages
 * @returns the access token
 */
export function parseTokenResponse(
  data: JsonObject,
  clock: Clock,
  context: string,
): AccessToken {
  const value = requireString(data, 'access_token', context);
  const expiresIn = requireInteger(data, 'expires_in', context);

  return new AccessToken(
    value,
    new Date(clock.now() + expiresIn * MS_PER_SECOND),
  );
}

/**
 * turns an unexpected response into the matching error
 *
 * oauth2 error bodies become an OAuthError, google api error bodies
 * contribute their message, anything else is reported with its raw body
 * @param response response with an unexpected status
 * @param context prefix of the error message
 * @returns never, always throws
 */
export async function throwForStatus(
  response: HttpResponse,
  context: string,
): Promise<never> {
  const body = await response.text();
  const { status } = response;

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new HttpStatusError(
      `${context}: unexpected status ${status}: ${body}`,
      status,
      body,
    );
  }

  if (isJsonObject(data) && typeof data.error === 'string') {
    const errorDescription =
      typeof data.error_description === 'string'
        ? data.error_description
        : undefined;
    const errorUri =
      typeof data.error_uri === 'string' ? data.error_uri : undefined;

    const message = [context, data.error, errorDescription, errorUri]
      .filter((part) => part !== undefined)
      .join(': ');

    throw new OAuthError(message, status, body, {
      error: data.error,
      errorDescription,
      errorUri,
    });
  }

  if (
    isJsonObject(data) &&
    isJsonObject(data.error) &&
    typeof data.error.message === 'string'
  ) {
    throw new HttpStatusError(
      `${context}: ${data.error.message}`,
      status,
      body,
    );
  }

  throw new HttpStatusError(
    `${context}: unexpected status ${status}: ${body}`,
    status,
    body,
  );
}
