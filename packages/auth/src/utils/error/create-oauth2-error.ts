import {
  AuthenticationError,
  OAuth2ErrorCode,
  AuthErrorCode,
} from '../../errors/authentication-error.js';
import type { OAuth2ErrorResponse } from '../oauth-types.js';

const KNOWN_CODES: ReadonlyMap<string, OAuth2ErrorCode> = new Map(
  Object.values(OAuth2ErrorCode).map((code): [string, OAuth2ErrorCode] => [
    code,
    code,
  ]),
);

/**
 * Creates an AuthenticationError from an OAuth2 error response.
 *
 * Unknown error strings fall back to `server_error` for 5xx statuses and
 * `unknown_error` otherwise.
 * @example
 * ```typescript
 * createOAuth2Error({ error: 'invalid_client' }, 401).code;
 * // OAuth2ErrorCode.INVALID_CLIENT
 * ```
 * @public
 */
export function createOAuth2Error(
  errorResponse: OAuth2ErrorResponse,
  statusCode: number,
): AuthenticationError {
  const message = errorResponse.error_description
    ? `OAuth2 authentication failed: ${errorResponse.error} - ${errorResponse.error_description}`
    : `OAuth2 authentication failed: ${errorResponse.error}`;

  const errorCode =
    KNOWN_CODES.get(errorResponse.error) ??
    (statusCode >= 500 ? OAuth2ErrorCode.SERVER_ERROR : AuthErrorCode.UNKNOWN_ERROR);

  return new AuthenticationError(message, errorCode);
}
