import { vi, type Mock } from 'vitest';
import {
  ClientCredentialsTokenProvider,
  type ClientCredentialsTokenProviderOptions,
} from '../../implementations/client-credentials-token-provider.js';

export const TEST_CONFIG = {
  tenantId: 'tenant-test',
  clientId: 'client-test',
  clientSecret: 'test-secret',
};

export const TOKEN_ENDPOINT =
  'https://login.microsoftonline.com/tenant-test/oauth2/v2.0/token';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function tokenResponse(accessToken: string, expiresIn = 3600): Response {
  return jsonResponse({
    token_type: 'Bearer',
    expires_in: expiresIn,
    access_token: accessToken,
  });
}

export interface ProviderHarness {
  provider: ClientCredentialsTokenProvider;
  fetchMock: Mock<typeof fetch>;
  sleepMock: Mock<(ms: number) => Promise<void>>;
  clock: { now: number };
}

/**
 * Builds a provider wired to a fetch mock, a manual clock and an instant sleep.
 */
export function createProviderHarness(
  options: Partial<ClientCredentialsTokenProviderOptions> = {},
  config: Partial<typeof TEST_CONFIG> & { tokenSafetyMarginMs?: number } = {},
): ProviderHarness {
  const clock = { now: 1_000_000 };
  const fetchMock = vi.fn<typeof fetch>();
  const sleepMock = vi.fn<(ms: number) => Promise<void>>(async () => {});

  const provider = new ClientCredentialsTokenProvider(
    { ...TEST_CONFIG, ...config },
    {
      fetch: fetchMock,
      now: () => clock.now,
      sleep: sleepMock,
      ...options,
    },
  );

  return { provider, fetchMock, sleepMock, clock };
}
