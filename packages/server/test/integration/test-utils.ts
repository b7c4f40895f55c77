import { vi, type Mock } from 'vitest';
import { z } from 'zod';
import { ServerConfigSchema, type ServerConfigInput } from '@drivebridge/schemas';
import { ServerState } from '../../src/api/server-state.js';
import { createApp } from '../../src/app.js';
import { type AuthValidatorOptions, createAuthValidator } from '../../src/auth/index.js';
import { createServices } from '../../src/services.js';

export const TOKEN_URL = 'https://login.microsoftonline.com/tenant-test/oauth2/v2.0/token';
export const API_KEY = 'test-secret';

type Handler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

export function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/**
 * Stand-in for the identity platform and the remote API. Routes are keyed
 * by `METHOD pathname`; anything unrouted answers 404 itemNotFound.
 */
export class FakeUpstream {
  private readonly routes = new Map<string, Handler>();

  public readonly fetch: Mock<typeof fetch> = vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? 'GET';
    if (url.href === TOKEN_URL) {
      return this.token();
    }
    const handler = this.routes.get(`${method} ${decodeURIComponent(url.pathname)}`);
    return handler
      ? handler(url, init)
      : json(404, { error: { code: 'itemNotFound', message: 'The resource could not be found.' } });
  });

  public token: () => Response = () =>
    json(200, { access_token: 'graph-token', token_type: 'Bearer', expires_in: 3600 });

  public on(method: string, pathname: string, handler: Handler): this {
    this.routes.set(`${method} ${pathname}`, handler);
    return this;
  }

  public graphCalls(): string[] {
    return this.fetch.mock.calls
      .map(([input]) => String(input))
      .filter((href) => href !== TOKEN_URL);
  }
}

export function createTestConfig(overrides: Partial<ServerConfigInput> = {}) {
  return ServerConfigSchema.parse({
    inboundAuth: { type: 'api-key', keys: [API_KEY] },
    graph: {
      tenantId: 'tenant-test',
      clientId: 'client-test',
      clientSecret: 'test-secret',
      defaultDriveId: 'drive-1',
    },
    retry: { maxAttempts: 2, initialDelayMs: 1 },
    ...overrides,
  });
}

/**
 * The full HTTP app over a FakeUpstream, with request logging off.
 */
export function createTestApp(
  overrides: Partial<ServerConfigInput> = {},
  authOptions: AuthValidatorOptions = {},
) {
  const upstream = new FakeUpstream();
  const config = createTestConfig(overrides);
  const services = createServices(config, { fetch: upstream.fetch, sleep: async () => {} });
  const state = new ServerState();
  const app = createApp({
    dispatcher: services.dispatcher,
    authValidator: createAuthValidator(config.inboundAuth, authOptions),
    state,
    corsOrigins: config.server.corsOrigins,
    requestLogging: false,
  });
  return { app, upstream, state, services };
}

export function rpc(method: string, params?: unknown, id: number | string | null = 1) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'X-API-Key': API_KEY },
    body: JSON.stringify({ jsonrpc: '2.0', id, method, params }),
  };
}

const RpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.record(z.unknown()).optional(),
  error: z
    .object({ code: z.number(), message: z.string(), data: z.unknown().optional() })
    .optional(),
});

export async function readRpc(res: Response) {
  return RpcEnvelopeSchema.parse(await res.json());
}

const ToolListSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      inputSchema: z.object({ type: z.literal('object') }).passthrough(),
    }),
  ),
});

export function toolsOf(value: unknown) {
  return ToolListSchema.parse(value).tools;
}

const CallResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  structuredContent: z.record(z.unknown()),
  isError: z.boolean().optional(),
});

export function callResultOf(value: unknown) {
  return CallResultSchema.parse(value);
}
