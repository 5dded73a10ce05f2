/**
 * immutable oauth2 access token with an optional expiration instant
 * @example
 * ```typescript
 * const token = new AccessToken('ya29.token', new Date(Date.now() + 3600_000));
 * token.expirationTime; // epoch milliseconds
 * ```
 */
export class AccessToken {
  /** opaque token value sent as the bearer credential */
  public readonly value: string;

  /** instant after which the token is no longer accepted */
  readonly #expiration?: Date;

  /**
   * creates an access token
   * @param value token value
   * @param expiration optional expiration instant, omitted for non-expiring tokens
   */
  constructor(value: string, expiration?: Date) {
    this.value = value;
    // copy so that callers cannot mutate the instant afterwards
    this.#expiration = expiration ? new Date(expiration.getTime()) : undefined;
  }

  /** expiration instant, if any */
  public get expiration(): Date | undefined {
    return this.#expiration ? new Date(this.#expiration.getTime()) : undefined;
  }

  /** expiration as milliseconds since the unix epoch, if any */
  public get expirationTime(): number | undefined {
    return this.#expiration?.getTime();
  }

  /**
   * compares two tokens by value and expiration
   * @param other token to compare against
   * @returns true when both value and expiration match
   */
  public equals(other: AccessToken | undefined): boolean {
    return (
      other !== undefined &&
      this.value === other.value &&
      this.expirationTime === other.expirationTime
    );
  }

  /**
   * renders the token without its secret value
   * @returns debug representation
   */
  public toString(): string {
    const expiry = this.#expiration?.toISOString() ?? 'never';

    return `AccessToken(expiration=${expiry})`;
  }
}
