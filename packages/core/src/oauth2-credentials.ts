/**
 * @file single-flight oauth2 token cache
 *
 * holds the current access token, classifies it as fresh, stale or expired
 * and coordinates at most one in-flight refresh per instance. stale tokens
 * keep being served while a background refresh replaces them; expired tokens
 * make every caller wait on the same refresh.
 */

import { systemClock } from '#clock';
import { AUTHORIZATION_HEADER, BEARER_PREFIX } from '#constants/http';
import { MINIMUM_VALIDITY_MS, REFRESH_MARGIN_MS } from '#constants/time';
import { Credentials } from '#credentials';
import {
  RefreshAbortedError,
  RefreshNotSupportedError,
  jsonifyError,
} from '#error';
import { directExecutor } from '#executor';

import type { AccessToken } from '#access-token';
import type { Clock } from '#clock';
import type {
  CredentialsOptions,
  RequestMetadata,
  RequestMetadataCallback,
  RequestMetadataOptions,
} from '#credentials';
import type { Executor } from '#executor';

/** freshness of the cached token relative to the current time */
export type FreshnessState = 'fresh' | 'stale' | 'expired';

/** immutable snapshot of a cached token and its pre-rendered headers */
export interface OAuthValue {
  /** token the headers were rendered from */
  readonly token: AccessToken;
  /** authorization headers for the token */
  readonly requestMetadata: RequestMetadata;
}

/**
 * observer called after a refresh has installed a new token
 * @param credentials the credentials whose token changed
 */
export type CredentialsChangedListener = (
  credentials: OAuth2Credentials,
) => void | Promise<void>;

/** construction options shared by every cached credential */
export interface OAuth2CredentialsOptions extends CredentialsOptions {
  /** initial token, e.g. one returned by an authorization-code exchange */
  accessToken?: AccessToken;
  /** time source used for freshness checks (default: system clock) */
  clock?: Clock;
}

/**
 * creates the cached snapshot for a token
 * @param token token to render
 * @returns snapshot with the rendered bearer header
 */
function createOAuthValue(token: AccessToken): OAuthValue {
  return {
    token,
    requestMetadata: {
      [AUTHORIZATION_HEADER]: [`${BEARER_PREFIX}${token.value}`],
    },
  };
}

/**
 * waits for a shared task on behalf of one caller
 *
 * aborting rejects only this caller; the task itself keeps running
 * @param task shared task
 * @param signal optional abort signal of the caller
 * @returns the task's result
 */
async function awaitTask<T>(task: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return task;
  }

  if (signal.aborted) {
    throw new RefreshAbortedError(signal.reason);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new RefreshAbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([task, aborted]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * oauth2 credentials backed by a cached access token
 *
 * subclasses provide {@link refreshAccessToken}; this class decides when to
 * call it. the decision section of every public operation runs synchronously,
 * so two callers can never both start a refresh. the refresh itself runs on
 * the executor given by the caller.
 * @example
 * ```typescript
 * const credentials = OAuth2Credentials.of(
 *   new AccessToken('token', new Date(Date.now() + 3600_000)),
 * );
 *
 * await credentials.getRequestMetadata();
 * // { Authorization: ['Bearer token'] }
 * ```
 */
export class OAuth2Credentials extends Credentials {
  /** current snapshot, replaced as a whole */
  #value?: OAuthValue;

  /** the single in-flight refresh, if any */
  #refreshTask?: Promise<OAuthValue>;

  /** append-only list of change observers */
  readonly #changeListeners: CredentialsChangedListener[] = [];

  /** time source for freshness checks */
  protected readonly clock: Clock;

  /**
   * creates credentials with an optional initial token
   * @param options construction options
   */
  constructor(options: OAuth2CredentialsOptions = {}) {
    super({ log: options.log });

    this.clock = options.clock ?? systemClock;

    if (options.accessToken) {
      this.#value = createOAuthValue(options.accessToken);
    }
  }

  /**
   * creates non-refreshable credentials around a fixed token
   * @param accessToken token to serve
   * @param options remaining construction options
   * @returns credentials serving the token until it expires
   */
  public static of(
    accessToken: AccessToken,
    options: Omit<OAuth2CredentialsOptions, 'accessToken'> = {},
  ): OAuth2Credentials {
    return new OAuth2Credentials({ ...options, accessToken });
  }

  /** @inheritdoc */
  public getAuthenticationType(): string {
    return 'OAuth2';
  }

  /**
   * returns the last successfully cached token without refreshing
   * @returns cached token, possibly stale or expired
   */
  public getAccessToken(): AccessToken | undefined {
    return this.#value?.token;
  }

  /**
   * classifies the cached token against the current time
   * @returns freshness of the cached token
   */
  public getFreshness(): FreshnessState {
    const value = this.#value;

    if (!value) {
      return 'expired';
    }

    const expiresAt = value.token.expirationTime;

    if (expiresAt === undefined) {
      return 'fresh';
    }

    const remaining = expiresAt - this.clock.now();

    if (remaining < MINIMUM_VALIDITY_MS) {
      return 'expired';
    }

    if (remaining < REFRESH_MARGIN_MS) {
      return 'stale';
    }

    return 'fresh';
  }

  /**
   * produces bearer headers, waiting for a refresh only when the token is expired
   * @param _uri target of the request, unused by cached credentials
   * @param options per-call options
   * @returns headers to attach to the request
   */
  public async getRequestMetadata(
    _uri?: string,
    options?: RequestMetadataOptions,
  ): Promise<RequestMetadata> {
    const value = await awaitTask(this.#fetch(directExecutor), options?.signal);

    return this.decorateRequestMetadata(value.requestMetadata);
  }

  /**
   * produces bearer headers through a callback, never waiting on the caller's stack
   * @param _uri target of the request, unused by cached credentials
   * @param executor context on which a required refresh starts
   * @param callback receiver of the result
   */
  public override getRequestMetadataAsync(
    _uri: string | undefined,
    executor: Executor,
    callback: RequestMetadataCallback,
  ): void {
    void this.#fetch(executor).then(
      (value) =>
        this.invokeCallback(() =>
          callback.onSuccess(
            this.decorateRequestMetadata(value.requestMetadata),
          ),
        ),
      (error: unknown) => this.invokeCallback(() => callback.onFailure(error)),
    );
  }

  /**
   * starts a new refresh regardless of freshness and waits for it
   * @param options per-call options
   */
  public async refresh(options?: RequestMetadataOptions): Promise<void> {
    await awaitTask(this.#startRefresh(directExecutor), options?.signal);
  }

  /**
   * refreshes only when the cached token is stale or expired
   * @param options per-call options
   */
  public async refreshIfExpired(options?: RequestMetadataOptions): Promise<void> {
    if (this.getFreshness() === 'fresh') {
      return;
    }

    await awaitTask(
      this.#refreshTask ?? this.#startRefresh(directExecutor),
      options?.signal,
    );
  }

  /**
   * obtains a new access token
   *
   * the base implementation only serves the token it was built with
   * @returns new token
   */
  public async refreshAccessToken(): Promise<AccessToken> {
    throw new RefreshNotSupportedError();
  }

  /**
   * registers an observer of successful refreshes
   * @param listener observer, invoked in registration order
   */
  public addChangeListener(listener: CredentialsChangedListener): void {
    this.#changeListeners.push(listener);
  }

  /**
   * adjusts the cached headers before they are handed out
   * @param metadata cached bearer headers
   * @returns headers returned to the caller
   */
  protected decorateRequestMetadata(
    metadata: RequestMetadata,
  ): RequestMetadata {
    return { ...metadata };
  }

  /**
   * decides between the cached value and a (possibly new) refresh task
   * @param executor context on which a new refresh starts
   * @returns promise settling with the value the caller should use
   */
  #fetch(executor: Executor): Promise<OAuthValue> {
    let task = this.#refreshTask;

    if (this.getFreshness() !== 'fresh' && !task) {
      task = this.#startRefresh(executor);
    }

    // a refresh may have settled already on some executors, so look again
    const value = this.#value;
    if (value && this.getFreshness() !== 'expired') {
      return Promise.resolve(value);
    }

    return task ?? this.#startRefresh(executor);
  }

  /**
   * starts a refresh and makes it the in-flight task
   * @param executor context on which the refresh operation starts
   * @returns the new task
   */
  #startRefresh(executor: Executor): Promise<OAuthValue> {
    this.log?.('debug', 'refreshing access token');

    const task: Promise<OAuthValue> = this.#runRefreshOperation(executor).then(
      async (value) => {
        this.#value = value;
        // a listener re-entering the cache must not find this task in flight
        this.#clearTask(task);
        this.log?.('debug', 'access token refreshed');
        await this.#notifyListeners();

        return value;
      },
      (error: unknown) => {
        this.#clearTask(task);
        throw error;
      },
    );

    this.#refreshTask = task;

    // waiters see the failure themselves; background refreshes only reach the log
    void task.catch((error: unknown) =>
      this.log?.('warn', 'access token refresh failed', jsonifyError(error)),
    );

    return task;
  }

  /**
   * runs the refresh operation on an executor
   * @param executor context on which the operation starts
   * @returns promise settling with the new snapshot
   */
  #runRefreshOperation(executor: Executor): Promise<OAuthValue> {
    return new Promise<OAuthValue>((resolve, reject) => {
      executor.execute(() => {
        try {
          this.refreshAccessToken().then(
            (token) => resolve(createOAuthValue(token)),
            reject,
          );
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  /**
   * forgets the in-flight task if it has not been superseded
   * @param task task that just settled
   */
  #clearTask(task: Promise<OAuthValue>): void {
    if (this.#refreshTask === task) {
      this.#refreshTask = undefined;
    }
  }

  /** invokes every listener in order, isolating their failures */
  async #notifyListeners(): Promise<void> {
    for (const listener of [...this.#changeListeners]) {
      try {
        await listener(this);
      } catch (error) {
        this.log?.(
          'warn',
          'credentials change listener failed',
          jsonifyError(error),
        );
      }
    }
  }
}
