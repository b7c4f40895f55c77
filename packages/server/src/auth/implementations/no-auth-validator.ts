/**
 * Pass-through validator for local development. Refuses to exist unless
 * `DRIVEBRIDGE_DISABLE_INBOUND_AUTH=true`.
 * @public
 */

import type { Context } from 'hono';
import { logEvent } from '@drivebridge/core';
import { ConfigurationError } from '../../config/configuration-error.js';
import type { AuthResult, IInboundAuthValidator } from '../interfaces/inbound-auth.interface.js';

export const DISABLE_INBOUND_AUTH_ENV = 'DRIVEBRIDGE_DISABLE_INBOUND_AUTH';

export class NoAuthValidator implements IInboundAuthValidator {
  public constructor(env: Record<string, string | undefined> = process.env) {
    if (env[DISABLE_INBOUND_AUTH_ENV] !== 'true') {
      throw ConfigurationError.invalid([
        `inboundAuth.type 'none' requires ${DISABLE_INBOUND_AUTH_ENV}=true`,
      ]);
    }
    logEvent('warn', 'auth:disabled', {
      message: 'Inbound authentication is disabled; every request is accepted',
    });
  }

  public async validateRequest(_context: Context): Promise<AuthResult> {
    return { isAuthenticated: true, context: { scheme: 'none' } };
  }

  public getType(): 'none' {
    return 'none';
  }

  public getChallenge(): string {
    return 'Bearer realm="drivebridge"';
  }
}
