import { vi, type Mock } from 'vitest';
import type { AccessCredential, ITokenProvider } from '@drivebridge/auth';
import { RemoteClient, type RemoteClientOptions } from '../client/remote-client.js';

export const BASE_URL = 'https://graph.microsoft.com/v1.0';

export interface TokenProviderStub extends ITokenProvider {
  getCredential: Mock<() => Promise<AccessCredential>>;
  getHeaders: Mock<() => Promise<Record<string, string>>>;
  invalidate: Mock<() => void>;
}

export function createTokenProviderStub(accessToken = 'graph-token'): TokenProviderStub {
  const credential: AccessCredential = {
    accessToken,
    tokenType: 'Bearer',
    expiresAt: new Date(Date.now() + 3_600_000),
  };
  return {
    getCredential: vi.fn(async () => credential),
    getHeaders: vi.fn(async () => ({ Authorization: `Bearer ${accessToken}` })),
    invalidate: vi.fn(),
  };
}

export function jsonResponse(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {},
): Response {
  // 204 and 3xx carry no body
  const hasBody = body !== undefined && status !== 204;
  return new Response(hasBody ? JSON.stringify(body) : null, {
    status,
    headers: hasBody ? { 'Content-Type': 'application/json', ...headers } : headers,
  });
}

export function graphError(status: number, code: string, message: string): Response {
  return jsonResponse(status, { error: { code, message } });
}

export interface ClientHarness {
  client: RemoteClient;
  fetchMock: Mock<typeof fetch>;
  sleepMock: Mock<(ms: number) => Promise<void>>;
  tokenProvider: TokenProviderStub;
}

export function createClientHarness(options: RemoteClientOptions = {}): ClientHarness {
  const fetchMock = vi.fn<typeof fetch>();
  const sleepMock = vi.fn<(ms: number) => Promise<void>>(async () => {});
  const tokenProvider = createTokenProviderStub();
  const client = new RemoteClient(tokenProvider, {
    fetch: fetchMock,
    sleep: sleepMock,
    ...options,
  });
  return { client, fetchMock, sleepMock, tokenProvider };
}

/**
 * Headers of the n-th fetch call as a Headers instance.
 */
export function requestHeaders(fetchMock: Mock<typeof fetch>, call = 0): Headers {
  return new Headers(fetchMock.mock.calls[call][1]?.headers);
}

export function requestUrl(fetchMock: Mock<typeof fetch>, call = 0): string {
  return String(fetchMock.mock.calls[call][0]);
}
