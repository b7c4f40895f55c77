// Errors
export * from './errors/authentication-error.js';

// Implementations
export * from './implementations/client-credentials-token-provider.js';

export * from './schemas.js';
export type { AccessCredential, ITokenProvider } from './types.js';

export {
  createOAuth2Error,
  isRetryableError,
  parseErrorResponse,
} from './utils/error/index.js';
export type {
  OAuth2TokenResponse,
  OAuth2ErrorResponse,
} from './utils/oauth-types.js';
