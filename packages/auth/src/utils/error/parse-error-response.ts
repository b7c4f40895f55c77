import {
  OAuth2ErrorResponseSchema,
  type OAuth2ErrorResponse,
} from '../oauth-types.js';

/**
 * Parses the body of a failed token request into an OAuth2 error.
 *
 * Bodies that are not JSON, or not shaped like an OAuth2 error, fall back to
 * `server_error` for 5xx and `invalid_request` otherwise. Never throws.
 * @public
 */
export async function parseErrorResponse(
  response: Response,
): Promise<OAuth2ErrorResponse> {
  const fallback: OAuth2ErrorResponse = {
    error: response.status >= 500 ? 'server_error' : 'invalid_request',
    error_description: `HTTP ${response.status}: ${response.statusText}`,
  };

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    return fallback;
  }

  const parsed = OAuth2ErrorResponseSchema.safeParse(body);
  return parsed.success ? parsed.data : fallback;
}
