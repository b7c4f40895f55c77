import {
  AuthenticationError,
  AuthErrorCode,
  OAuth2ErrorCode,
} from '../../errors/authentication-error.js';

const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  AuthErrorCode.NETWORK_ERROR,
  OAuth2ErrorCode.TEMPORARILY_UNAVAILABLE,
]);

/**
 * Determines whether a token request failure is transient.
 *
 * Network failures and `temporarily_unavailable` are retried; every other
 * OAuth2 protocol error is final.
 * @public
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof AuthenticationError) {
    return RETRYABLE_CODES.has(error.code);
  }

  const errorMessage = error.message.toLowerCase();
  return ['econnreset', 'econnrefused', 'etimedout', 'eai_again', 'fetch failed'].some(
    (fragment) => errorMessage.includes(fragment),
  );
}
