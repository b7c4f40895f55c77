/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Authentication error codes beyond the OAuth2 vocabulary
 */
export enum AuthErrorCode {
  INVALID_TOKEN = 'invalid_token',
  MISSING_TOKEN = 'missing_token',
  INVALID_RESPONSE = 'invalid_response',
  NETWORK_ERROR = 'network_error',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Failure to obtain or validate an identity credential.
 *
 * Messages are sanitized on construction so tokens and secrets never leak
 * into logs or tool responses.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\beyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, '[REDACTED_JWT]')
      .replace(/\b[a-zA-Z0-9+/]{20,}={0,2}(?![a-zA-Z0-9+/=])/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]');
  }

  public static missingToken(): AuthenticationError {
    return new AuthenticationError(
      'No access token provided',
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  public static invalidClient(cause?: Error): AuthenticationError {
    return new AuthenticationError(
      'Client authentication failed',
      OAuth2ErrorCode.INVALID_CLIENT,
      cause,
    );
  }

  /**
   * The token endpoint answered 2xx with a body that is not a token response
   */
  public static invalidResponse(detail: string): AuthenticationError {
    return new AuthenticationError(
      `Invalid token response: ${detail}`,
      AuthErrorCode.INVALID_RESPONSE,
    );
  }

  public static networkError(
    message: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      `Network error during authentication: ${message}`,
      AuthErrorCode.NETWORK_ERROR,
      cause,
    );
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause?.message,
    };
  }
}
