import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/config/configuration-error.js';
import { DISABLE_INBOUND_AUTH_ENV, NoAuthValidator } from '../../src/auth/index.js';
import { createValidatorApp, check } from './test-utils.js';

describe('NoAuthValidator', () => {
  it('refuses to start without the explicit development switch', () => {
    expect(() => new NoAuthValidator({})).toThrow(ConfigurationError);
    expect(() => new NoAuthValidator({ [DISABLE_INBOUND_AUTH_ENV]: '1' })).toThrow(
      "inboundAuth.type 'none' requires DRIVEBRIDGE_DISABLE_INBOUND_AUTH=true",
    );
  });

  it('accepts every request once enabled', async () => {
    const app = createValidatorApp(new NoAuthValidator({ [DISABLE_INBOUND_AUTH_ENV]: 'true' }));
    expect(await check(app)).toEqual({ isAuthenticated: true, context: { scheme: 'none' } });
  });
});
