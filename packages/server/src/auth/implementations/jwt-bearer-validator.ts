/**
 * Bearer-token authentication against the tenant's identity platform.
 *
 * Tokens are verified with jose against the tenant's published key set
 * (fetched lazily and cached by `kid`). The issuer must be the tenant's v2.0
 * or v1 issuer and `exp` must be present and in the future. The audience is
 * checked separately so that the `warn` policy can accept a mismatch.
 * @public
 */

import type { Context } from 'hono';
import * as jose from 'jose';
import { logEvent } from '@drivebridge/core';
import {
  type AuthResult,
  DEFAULT_API_KEY_HEADER,
  type IInboundAuthValidator,
  type OAuthBearerAuthConfig,
  type TokenClaims,
} from '../interfaces/inbound-auth.interface.js';

const LOGIN_HOST = 'https://login.microsoftonline.com';

export function tenantIssuers(tenantId: string): string[] {
  return [`${LOGIN_HOST}/${tenantId}/v2.0`, `https://sts.windows.net/${tenantId}/`];
}

export function tenantJwksUri(tenantId: string): string {
  return `${LOGIN_HOST}/${tenantId}/discovery/v2.0/keys`;
}

export interface JwtBearerValidatorOptions {
  /** Key set used instead of the tenant's remote one */
  keySet?: jose.JWTVerifyGetKey;
}

function audienceOf(payload: jose.JWTPayload): string[] {
  if (Array.isArray(payload.aud)) return payload.aud;
  return payload.aud ? [payload.aud] : [];
}

/**
 * Caller-safe reason for a jose verification failure.
 */
function describeFailure(error: jose.errors.JOSEError): string {
  if (error instanceof jose.errors.JWTExpired) {
    return 'Token expired';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return error.claim === 'iss' ? 'Token issuer not accepted' : `Invalid token claim: ${error.claim}`;
  }
  if (error instanceof jose.errors.JWKSNoMatchingKey) {
    return 'Token signed with an unknown key';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'Invalid token signature';
  }
  return 'Malformed token';
}

export class JwtBearerValidator implements IInboundAuthValidator {
  private readonly keySet: jose.JWTVerifyGetKey;
  private readonly issuers: string[];
  private readonly audiences: ReadonlySet<string>;

  public constructor(
    private readonly config: OAuthBearerAuthConfig,
    options: JwtBearerValidatorOptions = {},
  ) {
    this.issuers = config.issuers ?? tenantIssuers(config.tenantId);
    this.audiences = new Set(config.audiences);
    this.keySet =
      options.keySet ??
      jose.createRemoteJWKSet(new URL(config.jwksUri ?? tenantJwksUri(config.tenantId)));

    logEvent('info', 'auth:validator_initialized', {
      scheme: 'oauth-bearer',
      tenantId: config.tenantId,
      audiences: config.audiences,
      audienceMismatch: config.audienceMismatch,
    });
  }

  public async validateRequest(context: Context): Promise<AuthResult> {
    const authHeader = context.req.header('Authorization');
    if (!authHeader) {
      return { isAuthenticated: false, error: 'Missing Authorization header' };
    }
    if (context.req.header(DEFAULT_API_KEY_HEADER) !== undefined) {
      return {
        isAuthenticated: false,
        error: `Send either ${DEFAULT_API_KEY_HEADER} or Authorization, not both`,
      };
    }

    const bearerMatch = authHeader.match(/^Bearer\s+(.*)$/i);
    if (!bearerMatch) {
      return {
        isAuthenticated: false,
        error: 'Invalid Authorization header format. Expected: Bearer <token>',
      };
    }
    const token = bearerMatch[1].trim();
    if (token.length === 0) {
      return { isAuthenticated: false, error: 'Empty Bearer token' };
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.keySet, {
        issuer: this.issuers,
        requiredClaims: ['exp'],
        clockTolerance: this.config.clockToleranceSec,
      }));
    } catch (error) {
      if (error instanceof jose.errors.JOSEError && !(error instanceof jose.errors.JWKSTimeout)) {
        const reason = describeFailure(error);
        logEvent('warn', 'auth:token_rejected', { reason, code: error.code });
        return { isAuthenticated: false, error: reason };
      }
      // key set unreachable: not the caller's fault
      throw error;
    }

    const claims: TokenClaims = {
      issuer: payload.iss ?? '',
      audience: audienceOf(payload),
      subject: payload.sub,
      expiresAt: new Date((payload.exp ?? 0) * 1000),
    };

    if (!claims.audience.some((audience) => this.audiences.has(audience))) {
      if (this.config.audienceMismatch === 'reject') {
        logEvent('warn', 'auth:audience_rejected', {
          audience: claims.audience,
          subject: claims.subject,
        });
        return { isAuthenticated: false, error: 'Token audience not accepted' };
      }
      logEvent('warn', 'auth:audience_mismatch_accepted', {
        audience: claims.audience,
        expected: [...this.audiences],
        subject: claims.subject,
      });
      return {
        isAuthenticated: true,
        context: { scheme: 'oauth-bearer', claims, audienceMismatch: true },
      };
    }

    return { isAuthenticated: true, context: { scheme: 'oauth-bearer', claims } };
  }

  public getType(): 'oauth-bearer' {
    return 'oauth-bearer';
  }

  public getChallenge(): string {
    return `Bearer realm="drivebridge", authorization_uri="${LOGIN_HOST}/${this.config.tenantId}/oauth2/v2.0/authorize"`;
  }
}
