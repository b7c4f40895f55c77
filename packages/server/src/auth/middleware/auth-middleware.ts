/**
 * Hono middleware factory for request authentication.
 *
 * Returns 401 with a `WWW-Authenticate` challenge and the stable code
 * `unauthorized` when the validator rejects, and attaches the AuthContext for downstream handlers otherwise.
 * Rejections are logged with client address and path, never credentials.
 * @example
 * ```typescript
 * const validator = createAuthValidator(config.inboundAuth);
 * app.use('/mcp', createAuthMiddleware(validator));
 * ```
 * @public
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import { logError, logEvent } from '@drivebridge/core';
import type {
  AuthContext,
  AuthResult,
  IInboundAuthValidator,
} from '../interfaces/inbound-auth.interface.js';

export function createAuthMiddleware(validator: IInboundAuthValidator): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    let authResult: AuthResult;
    try {
      authResult = await validator.validateRequest(c);
    } catch (error) {
      logError('auth-middleware', error, { path: c.req.path, scheme: validator.getType() });
      return c.json(
        {
          error: 'Internal Server Error',
          message: 'Authentication system error',
          timestamp: new Date().toISOString(),
        },
        500,
      );
    }

    if (!authResult.isAuthenticated || !authResult.context) {
      logEvent('warn', 'auth:request_rejected', {
        ip: c.req.header('X-Forwarded-For') ?? c.req.header('X-Real-IP') ?? 'unknown',
        userAgent: c.req.header('User-Agent') ?? 'unknown',
        path: c.req.path,
        method: c.req.method,
        scheme: validator.getType(),
        reason: authResult.error,
      });
      return c.json(
        {
          error: 'Unauthorized',
          code: 'unauthorized',
          message: authResult.error ?? 'Authentication required',
          timestamp: new Date().toISOString(),
        },
        401,
        { 'WWW-Authenticate': validator.getChallenge() },
      );
    }

    c.set('authContext', authResult.context);
    logEvent('debug', 'auth:request_accepted', {
      scheme: authResult.context.scheme,
      subject: authResult.context.claims?.subject,
      path: c.req.path,
    });
    await next();
  };
}

/**
 * Extracts the context attached by createAuthMiddleware; undefined on
 * routes the middleware does not guard.
 * @public
 */
export function getAuthContext(c: Context): AuthContext | undefined {
  return c.get('authContext');
}

declare module 'hono' {
  interface ContextVariableMap {
    authContext: AuthContext;
  }
}
