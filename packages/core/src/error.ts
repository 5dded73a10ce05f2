import type { JsonifibleObject, JsonObject } from '#json';

/**
 * raised when a credential holds a fixed token and cannot obtain a new one
 *
 * credentials built from a bare access token have no refresh operation, so
 * once that token expires the only remedy is a new credential instance
 */
export class RefreshNotSupportedError extends Error {
  /**
   * creates new refresh-not-supported error
   * @param message error message describing the failure
   */
  constructor(
    message = 'credentials do not support refreshing the access token; use an instance with a new access token or a refreshable credential type',
  ) {
    super(message);
    this.name = 'RefreshNotSupportedError';
  }
}

/**
 * raised to a single caller whose wait for a refresh was aborted
 *
 * the in-flight refresh keeps running for every other waiter
 */
export class RefreshAbortedError extends Error {
  /**
   * creates new refresh-aborted error
   * @param cause abort reason supplied by the signal
   */
  constructor(cause?: unknown) {
    super('interrupted while waiting for the access token to refresh', {
      cause,
    });
    this.name = 'RefreshAbortedError';
  }
}

/**
 * converts any error caught in a try-catch block to a json-compatible format
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  const type = typeof error;

  switch (typeof error) {
    case 'object':
      if (error instanceof Error) {
        return {
          type: 'Error',
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error instanceof AggregateError && {
            errors: error.errors.map(jsonifyError),
          }),
          ...('cause' in error &&
            error.cause !== undefined && { cause: jsonifyError(error.cause) }),
        };
      } else if (error === null) {
        return { type: 'null', value: error };
      } else {
        const serialized = JSON.parse(
          JSON.stringify(error, getCircularReplacer()),
        ) as JsonObject;

        return {
          type: Array.isArray(error) ? 'array' : 'object',
          value: serialized,
        };
      }
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type, value: error };
    case 'function':
      return { type, name: error.name || 'anonymous' };
    case 'bigint':
      return { type, value: String(error) };
    case 'symbol':
      return { type, description: error.description };
    default:
      return { type: 'unknown' };
  }
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet();

  return (_key: string, value: unknown) => {
    if (typeof value === 'function') {
      return undefined;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
