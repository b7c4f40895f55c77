export { createOAuth2Error } from './create-oauth2-error.js';
export { isRetryableError } from './is-retryable-error.js';
export { parseErrorResponse } from './parse-error-response.js';
