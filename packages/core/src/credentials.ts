import { jsonifyError } from '#error';

import type { Executor } from '#executor';
import type { Log } from '#logging';

/** header name to header values, merged into outbound requests */
export type RequestMetadata = Record<string, string[]>;

/** receives the result of an asynchronous metadata request exactly once */
export interface RequestMetadataCallback {
  /**
   * called with the rendered headers
   * @param metadata headers to attach to the request
   */
  onSuccess(metadata: RequestMetadata): void;
  /**
   * called when the headers could not be produced
   * @param error failure cause
   */
  onFailure(error: unknown): void;
}

/** per-call options for metadata requests */
export interface RequestMetadataOptions {
  /** aborts this caller's wait without cancelling the shared refresh */
  signal?: AbortSignal;
}

/** construction options shared by every credential */
export interface CredentialsOptions {
  /** optional logging function */
  log?: Log;
}

/**
 * something that can authenticate outbound requests by producing headers
 *
 * concrete credentials decide how the headers are produced: from a cached
 * oauth2 token, or minted per request
 */
export abstract class Credentials {
  /** optional logging function */
  protected readonly log?: Log;

  /**
   * creates credentials
   * @param options construction options
   */
  constructor(options: CredentialsOptions = {}) {
    this.log = options.log;
  }

  /**
   * names the authentication scheme
   * @returns scheme identifier such as `OAuth2`
   */
  public abstract getAuthenticationType(): string;

  /**
   * produces the headers for a request, waiting for a refresh if required
   * @param uri target of the request
   * @param options per-call options
   * @returns headers to attach to the request
   */
  public abstract getRequestMetadata(
    uri?: string,
    options?: RequestMetadataOptions,
  ): Promise<RequestMetadata>;

  /**
   * forces the credential to obtain new authentication material
   * @param options per-call options
   */
  public abstract refresh(options?: RequestMetadataOptions): Promise<void>;

  /**
   * whether this credential produces request metadata at all
   * @returns true for every credential in this library
   */
  public hasRequestMetadata(): boolean {
    return true;
  }

  /**
   * whether request metadata is the only thing needed to authenticate
   * @returns true for every credential in this library
   */
  public hasRequestMetadataOnly(): boolean {
    return true;
  }

  /**
   * delivers request metadata through a callback
   *
   * the default implementation waits on {@link getRequestMetadata} and reports
   * on the given executor
   * @param uri target of the request
   * @param executor context on which the callback runs
   * @param callback receiver of the result
   */
  public getRequestMetadataAsync(
    uri: string | undefined,
    executor: Executor,
    callback: RequestMetadataCallback,
  ): void {
    void this.getRequestMetadata(uri).then(
      (metadata) =>
        executor.execute(() =>
          this.invokeCallback(() => callback.onSuccess(metadata)),
        ),
      (error: unknown) =>
        executor.execute(() =>
          this.invokeCallback(() => callback.onFailure(error)),
        ),
    );
  }

  /**
   * runs a caller-supplied callback, keeping its failure away from the refresh
   * @param notify invocation of the callback
   */
  protected invokeCallback(notify: () => void): void {
    try {
      notify();
    } catch (error) {
      this.log?.(
        'warn',
        'request metadata callback failed',
        jsonifyError(error),
      );
    }
  }
}
