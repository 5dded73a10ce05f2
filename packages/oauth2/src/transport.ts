/**
 * @file pluggable HTTP transport used by every credential variant
 *
 * credentials only ever issue small GET and POST requests with string
 * bodies, so the transport contract is kept to that and implemented on
 * undici's fetch by default
 */

import { fetch } from 'undici';

import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON } from '#constants/http';
import { TransportError } from '#errors';

/** an outgoing request */
export interface HttpRequest {
  /** HTTP method */
  method: 'GET' | 'POST';
  /** absolute url */
  url: string;
  /** request headers */
  headers?: Record<string, string>;
  /** serialized body */
  body?: string;
  /** signal aborting the request */
  signal?: AbortSignal;
}

/** a received response */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** response headers */
  headers: { get(name: string): string | null };
  /**
   * reads the body as text
   * @returns the body
   */
  text(): Promise<string>;
}

/** sends requests on behalf of credentials */
export interface HttpTransport {
  /**
   * sends a request
   * @param request request to send
   * @returns the response, whatever its status
   * @throws {TransportError} when no response could be obtained
   */
  request(request: HttpRequest): Promise<HttpResponse>;
}

/** options for the fetch-based transport */
export interface FetchTransportOptions {
  /** timeout in milliseconds for each request (default: none) */
  timeout?: number;
}

/** transport built on undici's fetch */
export class FetchTransport implements HttpTransport {
  readonly #timeout?: number;

  /**
   * creates a fetch transport
   * @param options transport options
   */
  constructor(options: FetchTransportOptions = {}) {
    this.#timeout = options.timeout;
  }

  /**
   * sends a request through fetch
   * @param request request to send
   * @returns the response, whatever its status
   */
  public async request(request: HttpRequest): Promise<HttpResponse> {
    const signals = [
      ...(request.signal ? [request.signal] : []),
      ...(this.#timeout ? [AbortSignal.timeout(this.#timeout)] : []),
    ];

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: signals.length ? AbortSignal.any(signals) : undefined,
      });

      return {
        status: response.status,
        headers: response.headers,
        text: async () => response.text(),
      };
    } catch (exception) {
      const reason =
        exception instanceof Error ? exception.message : String(exception);

      throw new TransportError(
        `${request.method} ${request.url} failed: ${reason}`,
        { cause: exception },
      );
    }
  }
}

/** transport used when credentials are not given one */
export const defaultTransport: HttpTransport = new FetchTransport();

/** error codes of failed host name resolution */
const HOST_NOT_FOUND_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);

/**
 * tells whether a failure was caused by an unresolvable host name
 * @param error failure to inspect, including its chain of causes
 * @returns true if the host could not be resolved
 */
export function isHostNotFound(error: unknown): boolean {
  let current: unknown = error;

  while (current instanceof Error) {
    if ('code' in current && HOST_NOT_FOUND_CODES.has(String(current.code))) {
      return true;
    }
    current = current.cause;
  }

  return false;
}

/**
 * posts an url-encoded form
 * @param transport transport to send the request with
 * @param url target url
 * @param form form fields, undefined values are left out
 * @param headers additional headers
 * @returns the response
 */
export async function postForm(
  transport: HttpTransport,
  url: string,
  form: Record<string, string | undefined>,
  headers: Record<string, string> = {},
): Promise<HttpResponse> {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    if (value !== undefined) {
      body.append(key, value);
    }
  }

  return transport.request({
    method: 'POST',
    url,
    headers: { ...headers, 'Content-Type': CONTENT_TYPE_FORM },
    body: body.toString(),
  });
}

/**
 * posts a json document
 * @param transport transport to send the request with
 * @param url target url
 * @param data document to serialize
 * @param headers additional headers
 * @returns the response
 */
export async function postJson(
  transport: HttpTransport,
  url: string,
  data: unknown,
  headers: Record<string, string> = {},
): Promise<HttpResponse> {
  return transport.request({
    method: 'POST',
    url,
    headers: { ...headers, 'Content-Type': CONTENT_TYPE_JSON },
    body: JSON.stringify(data),
  });
}
