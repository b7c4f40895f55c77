/**
 * Contract between the inbound authentication schemes and the HTTP layer.
 */

import type { Context } from 'hono';
import type {
  ApiKeyAuthConfigZod,
  InboundAuthConfigZod,
  NoAuthConfigZod,
  OAuthBearerAuthConfigZod,
} from '@drivebridge/schemas';

export type AuthScheme = 'api-key' | 'oauth-bearer' | 'none';

/**
 * Verified token claims, present for the bearer scheme only.
 */
export interface TokenClaims {
  issuer: string;
  audience: string[];
  subject?: string;
  expiresAt: Date;
}

/**
 * Identity of the caller for one request. Never persisted.
 */
export interface AuthContext {
  scheme: AuthScheme;
  claims?: TokenClaims;
  /** Set when the lenient audience policy accepted a mismatching token */
  audienceMismatch?: boolean;
}

/**
 * Result of authentication validation
 */
export interface AuthResult {
  isAuthenticated: boolean;
  /** Reason for rejection, safe to return to the caller */
  error?: string;
  context?: AuthContext;
}

/**
 * One implementation per inbound scheme.
 */
export interface IInboundAuthValidator {
  /**
   * Validates an incoming request. Rejections resolve with
   * `isAuthenticated: false`; a throw means the validator itself failed.
   */
  validateRequest(context: Context): Promise<AuthResult>;

  getType(): AuthScheme;

  /** `WWW-Authenticate` value sent with a 401 */
  getChallenge(): string;
}

export type ApiKeyAuthConfig = ApiKeyAuthConfigZod;
export type OAuthBearerAuthConfig = OAuthBearerAuthConfigZod;
export type NoAuthConfig = NoAuthConfigZod;
export type InboundAuthConfig = InboundAuthConfigZod;

/** Header of the api-key scheme, also checked for ambiguity by the bearer scheme */
export const DEFAULT_API_KEY_HEADER = 'X-API-Key';
