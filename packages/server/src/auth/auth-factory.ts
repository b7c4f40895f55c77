/**
 * Factory for creating inbound authentication validators.
 *
 * Provides centralized creation with exhaustive type checking so that every
 * configured scheme is handled.
 * @public
 * @see file:./interfaces/inbound-auth.interface.ts - Configuration types
 */

import type {
  IInboundAuthValidator,
  InboundAuthConfig,
} from './interfaces/inbound-auth.interface.js';
import { ApiKeyValidator } from './implementations/api-key-validator.js';
import {
  JwtBearerValidator,
  type JwtBearerValidatorOptions,
} from './implementations/jwt-bearer-validator.js';
import { NoAuthValidator } from './implementations/no-auth-validator.js';

export interface AuthValidatorOptions extends JwtBearerValidatorOptions {
  env?: Record<string, string | undefined>;
}

/**
 * Creates an authentication validator instance from configuration.
 * @example
 * ```typescript
 * const validator = createAuthValidator({
 *   type: 'api-key',
 *   keys: ['test-secret'],
 *   header: 'X-API-Key',
 *   allowQueryParam: false,
 * });
 * ```
 * @public
 */
export function createAuthValidator(
  config: InboundAuthConfig,
  options: AuthValidatorOptions = {},
): IInboundAuthValidator {
  switch (config.type) {
    case 'api-key':
      return new ApiKeyValidator(config);

    case 'oauth-bearer':
      return new JwtBearerValidator(config, { keySet: options.keySet });

    case 'none':
      return new NoAuthValidator(options.env);

    default: {
      const exhaustive: never = config;
      throw new Error(`Unsupported authentication type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
