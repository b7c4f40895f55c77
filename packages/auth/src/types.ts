/**
 * Application-level bearer credential. Never leaves the process except as
 * an outbound `Authorization` header.
 * @public
 */
export interface AccessCredential {
  readonly accessToken: string;
  readonly tokenType: string;
  readonly expiresAt: Date;
  readonly scope?: string;
}

/**
 * Source of the outbound credential used for every remote call.
 * @public
 */
export interface ITokenProvider {
  /**
   * Returns a credential valid beyond the safety margin, refreshing first
   * when needed. Concurrent callers share one refresh.
   * @throws {AuthenticationError} When the identity provider refuses the exchange
   */
  getCredential(): Promise<AccessCredential>;

  /** `Authorization` header for the current credential */
  getHeaders(): Promise<Record<string, string>>;

  /** Discards the cached credential so the next call refreshes */
  invalidate(): void;
}
