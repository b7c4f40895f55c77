import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import {
  type AuthResult,
  createAuthMiddleware,
  createAuthValidator,
  getAuthContext,
  type IInboundAuthValidator,
} from '../../src/auth/index.js';

function stubValidator(validate: () => Promise<AuthResult>): IInboundAuthValidator {
  return {
    validateRequest: validate,
    getType: () => 'oauth-bearer',
    getChallenge: () => 'Bearer realm="drivebridge"',
  };
}

describe('Auth Middleware', () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
  });

  function mount(validator: IInboundAuthValidator) {
    app.use('*', createAuthMiddleware(validator));
    app.get('/test', (c) => c.json({ success: true, auth: getAuthContext(c) ?? null }));
  }

  it('passes authenticated requests through with the context attached', async () => {
    mount(
      createAuthValidator({
        type: 'api-key',
        keys: ['test-secret'],
        header: 'X-API-Key',
        allowQueryParam: false,
      }),
    );

    const res = await app.request('/test', { headers: { 'X-API-Key': 'test-secret' } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, auth: { scheme: 'api-key' } });
  });

  it('answers 401 with the challenge when the validator rejects', async () => {
    mount(
      createAuthValidator({
        type: 'api-key',
        keys: ['test-secret'],
        header: 'X-API-Key',
        allowQueryParam: false,
      }),
    );

    const res = await app.request('/test', { headers: { 'X-API-Key': 'wrong' } });

    expect(res.status).toBe(401);
    expect(res.headers.get('WWW-Authenticate')).toBe(
      'ApiKey realm="drivebridge", header="X-API-Key"',
    );
    expect(await res.json()).toEqual({
      error: 'Unauthorized',
      code: 'unauthorized',
      message: 'Invalid API key',
      timestamp: expect.any(String),
    });
  });

  it('treats an authenticated result without context as a rejection', async () => {
    mount(stubValidator(async () => ({ isAuthenticated: true })));

    const res = await app.request('/test');

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ message: 'Authentication required' });
  });

  it('answers 500 when the validator itself fails', async () => {
    mount(
      stubValidator(async () => {
        throw new Error('key set unreachable');
      }),
    );

    const res = await app.request('/test');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Internal Server Error',
      message: 'Authentication system error',
      timestamp: expect.any(String),
    });
  });
});
