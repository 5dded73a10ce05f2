/**
 * @file retry with exponential backoff, per-attempt timeout and abort support
 *
 * used for probes whose individual attempts may hang, such as the metadata
 * server check that decides whether compute engine credentials apply
 */

import { jsonifyError } from '@credkit/core';

import type { Log } from '@credkit/core';

/** configuration for retry operations */
export type RetryConfig = {
  /** name of the retry operation, used in log messages */
  name: string;
  /** maximum number of retries after the first attempt */
  maxRetries: number;
  /** timeout in milliseconds for each individual attempt */
  timeout: number;
};

/** metadata for retry operations including attempt count and error context */
export type RetryMeta = RetryConfig & {
  /** attempt number (starting from 0) */
  attempt: number;
  /** error that failed the attempt */
  error: unknown;
};

/** options for configuring retry behavior */
export interface RetryOptions extends Partial<RetryConfig> {
  /** optional logging function */
  log?: Log;
  /** signal to abort the retry process */
  abortSignal?: AbortSignal;
  /** delay in milliseconds between retries or a function to calculate it */
  retryDelay?: number | RetryDelayFunction;
  /** decides whether a failed attempt is retried (default: all but non-retryable errors) */
  shouldRetry?: ShouldRetry;
}

/**
 * function to determine whether retry should be attempted
 * @param meta metadata about the failed attempt
 * @returns true if the operation should be retried
 */
export type ShouldRetry = (meta: RetryMeta) => boolean;

/**
 * function to calculate the delay before the next attempt
 * @param meta metadata about the failed attempt
 * @returns delay in milliseconds
 */
export type RetryDelayFunction = (meta: RetryMeta) => number;

/** default maximum number of retries, i.e. three attempts in total */
export const DEFAULT_MAX_RETRIES = 2;

/** initial delay in milliseconds for exponential backoff */
export const INITIAL_RETRY_DELAY = 50;

/** maximum delay in milliseconds for exponential backoff */
export const MAX_RETRY_DELAY = 1000;

/** error class to indicate operation should not be retried */
export class NonRetryableError extends Error {
  /**
   * creates a non-retryable error
   * @param message error message
   * @param options standard error options
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

/**
 * waits for a delay unless aborted first
 * @param delay delay in milliseconds
 * @param signal signal ending the wait early
 */
async function sleep(delay: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, delay);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * executes function with retry capability on failure
 * @param fn the function to execute, receiving the attempt number and a signal aborted on timeout
 * @param options configuration options for retry behavior
 * @returns promise resolving with the function's result
 * @example
 * ```typescript
 * const reachable = await retry(
 *   async ({ abortSignal }) => ping({ signal: abortSignal }),
 *   { name: 'ping', maxRetries: 2, timeout: 500 },
 * );
 * ```
 */
export async function retry<R>(
  fn: (params: { attempt: number; abortSignal: AbortSignal }) => Promise<R>,
  options?: RetryOptions,
): Promise<R> {
  const {
    name = 'retryable task',
    abortSignal,
    log,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelay = ({ attempt }: RetryMeta) =>
      Math.min(INITIAL_RETRY_DELAY * 2 ** attempt, MAX_RETRY_DELAY),
    shouldRetry = (meta: RetryMeta) =>
      !(meta.error instanceof NonRetryableError),
    timeout = Infinity,
  } = { ...options };

  const config: RetryConfig = { name, maxRetries, timeout };
  const signal = abortSignal ?? new AbortController().signal;

  for (let attempt = 0; ; attempt++) {
    if (signal.aborted) {
      log?.('info', `${name} aborted`, { ...config, attempt });
      throw new NonRetryableError(`${name} aborted`, { cause: signal.reason });
    }

    try {
      log?.('debug', `${name} attempt #${attempt}`);
      const result = await tryRun({ fn, log, config, attempt, signal });
      log?.('debug', `${name} success on attempt #${attempt}`);

      return result;
    } catch (error) {
      log?.('debug', `${name} failed on attempt #${attempt}`);
      const meta: RetryMeta = { ...config, attempt, error };

      if (attempt >= maxRetries || signal.aborted || !shouldRetry(meta)) {
        log?.(
          'debug',
          `${name} stopped retrying after ${attempt + 1} attempts`,
          jsonifyError(error),
        );
        throw error;
      }

      const delay =
        typeof retryDelay === 'function' ? retryDelay(meta) : retryDelay;
      log?.('debug', `${name} retrying in ${delay}ms`);
      await sleep(delay, signal);
    }
  }
}

/**
 * runs a single attempt with timeout
 * @param params execution parameters
 * @param params.fn function to execute
 * @param params.log optional logging function
 * @param params.config retry configuration
 * @param params.attempt attempt number
 * @param params.signal signal of the whole retry process
 * @returns promise resolving to the function's result
 */
async function tryRun<R>(params: {
  fn: (params: { attempt: number; abortSignal: AbortSignal }) => Promise<R>;
  log?: Log;
  config: RetryConfig;
  attempt: number;
  signal: AbortSignal;
}): Promise<R> {
  const { fn, log, config, attempt, signal } = params;
  const { name, timeout } = config;

  if (!(timeout > 0 && timeout < Infinity)) {
    return fn({ attempt, abortSignal: signal });
  }

  const controller = new AbortController();
  const effectiveSignal = AbortSignal.any([controller.signal, signal]);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const message = `${name} attempt #${attempt} exceeded timeout ${timeout}ms`;
      log?.('warn', message);
      controller.abort();
      reject(new Error(message));
    }, timeout);
  });

  try {
    return await Promise.race([
      fn({ attempt, abortSignal: effectiveSignal }),
      timedOut,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
