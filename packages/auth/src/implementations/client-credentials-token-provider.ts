import {
  type BackoffPolicy,
  computeBackoffDelay,
  DEFAULT_BACKOFF_POLICY,
  generateRequestId,
  logEvent,
  sleep,
  type SleepFn,
} from '@drivebridge/core';
import {
  AuthenticationError,
  AuthErrorCode,
} from '../errors/authentication-error.js';
import {
  ClientCredentialsConfigSchema,
  tokenEndpointFor,
  type ClientCredentialsConfig,
  type ClientCredentialsConfigInput,
} from '../schemas.js';
import type { AccessCredential, ITokenProvider } from '../types.js';
import {
  AUTH_DEFAULT_EXPIRY_SECONDS,
  OAuth2TokenResponseSchema,
  type OAuth2TokenResponse,
} from '../utils/oauth-types.js';
import {
  createOAuth2Error,
  isRetryableError,
  parseErrorResponse,
} from '../utils/error/index.js';

export interface ClientCredentialsTokenProviderOptions {
  fetch?: typeof fetch;
  now?: () => number;
  sleep?: SleepFn;
  /** Retry policy for transient token request failures */
  retryPolicy?: BackoffPolicy;
}

/**
 * OAuth2 client-credentials provider for the service's own identity
 * (RFC 6749 section 4.4).
 *
 * Holds at most one cached credential. The credential and the in-flight
 * refresh live on the instance and start out empty; every read and
 * replacement goes through {@link getCredential}, so concurrent callers that
 * find no usable credential await the same refresh promise.
 *
 * @example
 * ```typescript
 * const provider = new ClientCredentialsTokenProvider({
 *   tenantId: 'contoso.onmicrosoft.com',
 *   clientId: '00000000-0000-0000-0000-000000000000',
 *   clientSecret: 'test-secret',
 * });
 *
 * const headers = await provider.getHeaders();
 * ```
 * @public
 */
export class ClientCredentialsTokenProvider implements ITokenProvider {
  private readonly config: ClientCredentialsConfig;
  private readonly tokenEndpoint: string;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly retryPolicy: BackoffPolicy;

  private credential?: AccessCredential;
  private refreshPromise?: Promise<AccessCredential>;

  public constructor(
    config: ClientCredentialsConfigInput,
    options: ClientCredentialsTokenProviderOptions = {},
  ) {
    const parsed = ClientCredentialsConfigSchema.safeParse(config);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.'));
      throw new AuthenticationError(
        `Invalid client credentials configuration: ${fields.join(', ')}`,
        AuthErrorCode.UNKNOWN_ERROR,
      );
    }

    this.config = parsed.data;
    this.tokenEndpoint = tokenEndpointFor(this.config);
    this.fetchFn = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_BACKOFF_POLICY;
  }

  public async getCredential(): Promise<AccessCredential> {
    const cached = this.credential;
    if (cached && this.isUsable(cached)) {
      return cached;
    }

    if (!this.refreshPromise) {
      this.refreshPromise = this.acquireToken().finally(() => {
        this.refreshPromise = undefined;
      });
    }
    return this.refreshPromise;
  }

  public async getHeaders(): Promise<Record<string, string>> {
    const credential = await this.getCredential();
    return {
      Authorization: `${credential.tokenType} ${credential.accessToken}`,
    };
  }

  public invalidate(): void {
    this.credential = undefined;
  }

  /**
   * A credential is usable until `expiresAt - tokenSafetyMarginMs`.
   * @internal
   */
  private isUsable(credential: AccessCredential): boolean {
    return (
      this.now() < credential.expiresAt.getTime() - this.config.tokenSafetyMarginMs
    );
  }

  /**
   * Requests a fresh credential and stores it. On failure the stale
   * credential is dropped and the error reaches every waiter.
   * @internal
   */
  private async acquireToken(): Promise<AccessCredential> {
    const requestId = generateRequestId();

    logEvent('debug', 'auth:token_request_start', {
      requestId,
      tokenEndpoint: this.tokenEndpoint,
      clientId: this.config.clientId,
      hadCredential: this.credential !== undefined,
    });

    try {
      const tokenResponse = await this.requestTokenWithRetry(requestId);
      const credential = this.processTokenResponse(tokenResponse);
      this.credential = credential;

      logEvent('info', 'auth:token_acquired', {
        requestId,
        expiresAt: credential.expiresAt.toISOString(),
        scope: credential.scope,
      });
      return credential;
    } catch (error) {
      this.credential = undefined;
      logEvent('error', 'auth:token_request_failed', {
        requestId,
        code: error instanceof AuthenticationError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Retries network failures with the backoff policy; OAuth2 errors are final.
   * @internal
   */
  private async requestTokenWithRetry(
    requestId: string,
  ): Promise<OAuth2TokenResponse> {
    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.makeTokenRequest(requestId);
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!isRetryableError(lastError) || attempt >= maxAttempts) {
          throw lastError;
        }

        const delayMs = computeBackoffDelay(this.retryPolicy, attempt - 1);
        logEvent('warn', 'auth:token_request_retry', {
          requestId,
          attempt,
          error: lastError.message,
          nextAttemptDelayMs: delayMs,
        });
        await this.sleep(delayMs);
      }
    }
  }

  private async makeTokenRequest(
    requestId: string,
  ): Promise<OAuth2TokenResponse> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      scope: this.config.scope,
    });

    let response: Response;
    try {
      response = await this.fetchFn(this.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          'client-request-id': requestId,
        },
        body: body.toString(),
      });
    } catch (error) {
      throw AuthenticationError.networkError(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      const errorResponse = await parseErrorResponse(response);
      throw createOAuth2Error(errorResponse, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw AuthenticationError.invalidResponse('body is not JSON');
    }

    const parsed = OAuth2TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw AuthenticationError.invalidResponse('missing access_token');
    }
    return parsed.data;
  }

  private processTokenResponse(
    tokenResponse: OAuth2TokenResponse,
  ): AccessCredential {
    const expiresInSeconds =
      tokenResponse.expires_in ?? AUTH_DEFAULT_EXPIRY_SECONDS;

    return {
      accessToken: tokenResponse.access_token,
      tokenType: tokenResponse.token_type ?? 'Bearer',
      expiresAt: new Date(this.now() + expiresInSeconds * 1000),
      scope: tokenResponse.scope,
    };
  }
}
