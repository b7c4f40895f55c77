import { describe, it, expect, beforeAll } from 'vitest';
import * as jose from 'jose';
import {
  API_KEY,
  callResultOf,
  createTestApp,
  json,
  readRpc,
  rpc,
  TOKEN_URL,
  toolsOf,
} from './test-utils.js';

const CHILDREN = '/v1.0/drives/drive-1/root/children';

describe('HTTP app', () => {
  describe('health', () => {
    it('reports healthy without credentials or remote calls', async () => {
      const { app, upstream } = createTestApp();

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'healthy', timestamp: expect.any(String) });
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('reports unhealthy once shutdown has begun', async () => {
      const { app, state } = createTestApp();
      state.markShuttingDown();

      const res = await app.request('/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: 'unhealthy', reason: 'shutting down' });
    });
  });

  describe('authentication', () => {
    it.each([
      ['/mcp', 'POST'],
      ['/api/tools', 'GET'],
      ['/api/tools/list_files/invoke', 'POST'],
    ])('guards %s', async (path, method) => {
      const { app, upstream } = createTestApp();

      const res = await app.request(path, { method });

      expect(res.status).toBe(401);
      expect(res.headers.get('WWW-Authenticate')).toBe(
        'ApiKey realm="drivebridge", header="X-API-Key"',
      );
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('refuses a tool call carrying no credential without reaching the remote API', async () => {
      const { app, upstream } = createTestApp();
      const { headers, ...unauthenticated } = rpc('tools/call', {
        name: 'list_files',
        arguments: {},
      });

      const res = await app.request('/mcp', {
        ...unauthenticated,
        headers: { 'Content-Type': headers['Content-Type'] },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'Unauthorized',
        code: 'unauthorized',
        message: 'Missing X-API-Key',
        timestamp: expect.any(String),
      });
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('rejects a wrong key before any tool runs', async () => {
      const { app, upstream } = createTestApp();

      const res = await app.request('/api/tools/list_files/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': 'wrong' },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ message: 'Invalid API key' });
      expect(upstream.fetch).not.toHaveBeenCalled();
    });
  });

  describe('bearer token mode', () => {
    const AUDIENCE = 'api://drive-tools';
    let signingKey: jose.KeyLike;
    let keySet: jose.JWTVerifyGetKey;

    beforeAll(async () => {
      const pair = await jose.generateKeyPair('RS256');
      signingKey = pair.privateKey;
      const jwk = await jose.exportJWK(pair.publicKey);
      keySet = jose.createLocalJWKSet({ keys: [{ ...jwk, kid: 'key-1', alg: 'RS256' }] });
    });

    function bearerApp() {
      return createTestApp(
        { inboundAuth: { type: 'oauth-bearer', tenantId: 'tenant-test', audiences: [AUDIENCE] } },
        { keySet },
      );
    }

    async function accessToken(audience = AUDIENCE): Promise<string> {
      return new jose.SignJWT({ scp: 'Files.ReadWrite' })
        .setProtectedHeader({ alg: 'RS256', kid: 'key-1' })
        .setIssuer('https://login.microsoftonline.com/tenant-test/v2.0')
        .setAudience(audience)
        .setSubject('caller-7')
        .setExpirationTime('1h')
        .sign(signingKey);
    }

    function bearerCall(token?: string) {
      return {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(token ? { Authorization: `Bearer ${token}` } : {}),
        },
        body: JSON.stringify({
          jsonrpc: '2.0',
          id: 1,
          method: 'tools/call',
          params: { name: 'list_files', arguments: {} },
        }),
      };
    }

    it('answers 401 with a bearer challenge when no token is sent', async () => {
      const { app, upstream } = bearerApp();

      const res = await app.request('/mcp', bearerCall());

      expect(res.status).toBe(401);
      expect(res.headers.get('WWW-Authenticate')).toMatch(/^Bearer /);
      expect(await res.json()).toMatchObject({ code: 'unauthorized' });
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('rejects a token minted for another audience', async () => {
      const { app, upstream } = bearerApp();

      const res = await app.request('/mcp', bearerCall(await accessToken('api://other-app')));

      expect(res.status).toBe(401);
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('runs the tool for a valid token', async () => {
      const { app, upstream } = bearerApp();
      upstream.on('GET', CHILDREN, () => json(200, { value: [] }));

      const res = await app.request('/mcp', bearerCall(await accessToken()));
      const body = await readRpc(res);

      expect(res.status).toBe(200);
      expect(callResultOf(body.result).structuredContent).toEqual({
        folder: '/',
        count: 0,
        items: [],
      });
      expect(upstream.graphCalls()).toEqual([
        'https://graph.microsoft.com/v1.0/drives/drive-1/root/children?%24top=100',
      ]);
    });
  });

  describe('JSON-RPC endpoint', () => {
    it('answers initialize with server info and the tools capability', async () => {
      const { app } = createTestApp();

      const res = await app.request('/mcp', rpc('initialize', { protocolVersion: '2024-11-05' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: {
          protocolVersion: '2024-11-05',
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: 'drivebridge', version: '0.1.0' },
        },
      });
    });

    it('lists the whole catalog', async () => {
      const { app } = createTestApp();

      const { result } = await readRpc(await app.request('/mcp', rpc('tools/list')));
      const tools = toolsOf(result);

      expect(tools).toHaveLength(19);
      expect(tools[0].name).toBe('list_files');
      expect(new Set(tools.map((tool) => tool.name)).size).toBe(19);
    });

    it('calls a tool through the token endpoint and the remote API', async () => {
      const { app, upstream } = createTestApp();
      upstream.on('GET', CHILDREN, () =>
        json(200, { value: [{ id: 'f1', name: 'notes.txt', size: 3, file: { mimeType: 'text/plain' } }] }),
      );

      const body = await readRpc(
        await app.request('/mcp', rpc('tools/call', { name: 'list_files', arguments: {} }, 'req-7')),
      );
      const result = callResultOf(body.result);

      expect(body.id).toBe('req-7');
      expect(result.isError).toBeUndefined();
      expect(result.structuredContent).toEqual({
        folder: '/',
        count: 1,
        items: [{ id: 'f1', name: 'notes.txt', type: 'file', size: 3, mimeType: 'text/plain' }],
      });
      expect(JSON.parse(result.content[0].text)).toEqual(result.structuredContent);
      expect(upstream.fetch.mock.calls[0][0]).toBe(TOKEN_URL);
      expect(upstream.graphCalls()).toEqual([
        'https://graph.microsoft.com/v1.0/drives/drive-1/root/children?%24top=100',
      ]);
    });

    it('reports missing parameters as invalid params', async () => {
      const { app, upstream } = createTestApp();

      const { error } = await readRpc(
        await app.request('/mcp', rpc('tools/call', { name: 'delete_file', arguments: {} })),
      );

      expect(error).toEqual({
        code: -32602,
        message: 'Invalid parameters: Missing required parameter: file_id',
        data: {
          kind: 'validation',
          code: 'invalidParams',
          issues: [{ path: ['file_id'], message: 'Missing required parameter: file_id' }],
        },
      });
      expect(upstream.fetch).not.toHaveBeenCalled();
    });

    it('reports an unknown tool as invalid params', async () => {
      const { app } = createTestApp();

      const { error } = await readRpc(
        await app.request('/mcp', rpc('tools/call', { name: 'format_disk', arguments: {} })),
      );

      expect(error).toMatchObject({ code: -32602, data: { code: 'unknownTool' } });
    });

    it('returns remote refusals as error results', async () => {
      const { app } = createTestApp();

      const body = await readRpc(
        await app.request(
          '/mcp',
          rpc('tools/call', { name: 'get_file_info', arguments: { file_id: 'missing' } }),
        ),
      );
      const result = callResultOf(body.result);

      expect(result.isError).toBe(true);
      expect(result.structuredContent.error).toMatchObject({
        kind: 'remote',
        code: 'itemNotFound',
        httpStatus: 404,
      });
    });

    it('answers unknown methods with method not found', async () => {
      const { app } = createTestApp();

      const { error } = await readRpc(await app.request('/mcp', rpc('resources/list')));

      expect(error).toEqual({ code: -32601, message: 'Method not found: resources/list' });
    });

    it('acknowledges notifications without a body', async () => {
      const { app } = createTestApp();

      const res = await app.request('/mcp', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
        body: JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }),
      });

      expect(res.status).toBe(202);
      expect(await res.text()).toBe('');
    });

    it.each([
      ['{not json', -32700, 'Parse error'],
      [JSON.stringify({ id: 1, method: 'ping' }), -32600, 'Invalid Request'],
      [JSON.stringify([{ jsonrpc: '2.0', id: 1, method: 'ping' }]), -32600, 'Batch requests are not supported'],
    ])('rejects body %s with %i', async (body, code, message) => {
      const { app } = createTestApp();

      const res = await app.request('/mcp', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
        body,
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ jsonrpc: '2.0', id: null, error: { code, message } });
    });
  });

  describe('REST endpoint', () => {
    it('lists tools', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/tools', { headers: { 'X-API-Key': API_KEY } });

      expect(res.status).toBe(200);
      expect(toolsOf(await res.json())).toHaveLength(19);
    });

    it('invokes a tool and echoes the client request id', async () => {
      const { app, upstream } = createTestApp();
      upstream.on('GET', '/v1.0/drives/drive-1/items/f1', () =>
        json(200, { id: 'f1', name: 'notes.txt', file: { mimeType: 'text/plain' } }),
      );

      const res = await app.request('/api/tools/get_file_info/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY, 'client-request-id': 'trace-1' },
        body: JSON.stringify({ file_id: 'f1' }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        result: { id: 'f1', name: 'notes.txt', type: 'file', mimeType: 'text/plain' },
        requestId: 'trace-1',
      });
    });

    it('maps validation failures to 400', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/tools/upload_file/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
        body: JSON.stringify({ content: 'hello' }),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { kind: 'validation', code: 'invalidParams' },
        requestId: expect.any(String),
      });
    });

    it('maps a malformed body to 400 invalidJson', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/tools/list_files/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY, 'client-request-id': 'trace-2' },
        body: '{oops',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { kind: 'validation', code: 'invalidJson', message: 'Request body is not valid JSON' },
        requestId: 'trace-2',
      });
    });

    it('maps remote refusals to 502', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/tools/delete_file/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
        body: JSON.stringify({ file_id: 'gone' }),
      });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ error: { kind: 'remote', code: 'itemNotFound' } });
    });

    it('maps an exhausted throttling budget to 503', async () => {
      const { app, upstream } = createTestApp();
      upstream.on('GET', CHILDREN, () =>
        json(503, { error: { code: 'serviceNotAvailable', message: 'Try later' } }),
      );

      const res = await app.request('/api/tools/list_files/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
      });

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ error: { kind: 'unavailable' } });
      expect(upstream.graphCalls()).toHaveLength(2);
    });

    it('maps a refused client credential to 502 with kind auth', async () => {
      const { app, upstream } = createTestApp();
      upstream.token = () =>
        json(401, { error: 'invalid_client', error_description: 'Bad secret' });

      const res = await app.request('/api/tools/list_files/invoke', {
        method: 'POST',
        headers: { 'X-API-Key': API_KEY },
      });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ error: { kind: 'auth' } });
      expect(upstream.graphCalls()).toHaveLength(0);
    });
  });

  it('answers unknown paths with 404', async () => {
    const { app } = createTestApp();

    const res = await app.request('/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found', path: '/nowhere' });
  });
});
