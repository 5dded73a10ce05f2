/** in-process transport recording requests and replaying queued responses */

import type { HttpRequest, HttpResponse, HttpTransport } from '#transport';

type Handler = (request: HttpRequest) => HttpResponse;

/**
 * creates a response
 * @param status HTTP status code
 * @param body json document or raw text
 * @param headers response headers
 * @returns the response
 */
export function createResponse(
  status: number,
  body: unknown = '',
  headers: Record<string, string> = {},
): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);

  return {
    status,
    headers: new Headers(headers),
    text: async () => text,
  };
}

/** transport answering from a queue, one handler per request */
export class MockTransport implements HttpTransport {
  public readonly requests: HttpRequest[] = [];
  readonly #handlers: Handler[] = [];

  /**
   * queues a response
   * @param status HTTP status code
   * @param body json document or raw text
   * @param headers response headers
   * @returns this transport
   */
  public reply(
    status: number,
    body: unknown = '',
    headers: Record<string, string> = {},
  ): this {
    this.#handlers.push(() => createResponse(status, body, headers));

    return this;
  }

  /**
   * queues a failure
   * @param error error to throw
   * @returns this transport
   */
  public fail(error: Error): this {
    this.#handlers.push(() => {
      throw error;
    });

    return this;
  }

  /**
   * returns a recorded request
   * @param index position of the request
   * @returns the request
   */
  public requestAt(index: number): HttpRequest {
    const request = this.requests[index];

    if (!request) {
      throw new Error(`no request #${index} was sent`);
    }

    return request;
  }

  /**
   * answers a request with the next queued handler
   * @param request request to answer
   * @returns the queued response
   */
  public async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const handler = this.#handlers.shift();

    if (!handler) {
      throw new Error(`unexpected request ${request.method} ${request.url}`);
    }

    return handler(request);
  }
}

/**
 * decodes the url-encoded body of a request
 * @param request request with a form body
 * @returns form fields
 */
export function formOf(request: HttpRequest): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(request.body ?? ''));
}

/**
 * decodes the json body of a request
 * @param request request with a json body
 * @returns parsed body
 */
export function jsonOf(request: HttpRequest): unknown {
  return JSON.parse(request.body ?? 'null');
}
