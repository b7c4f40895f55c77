import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { logEvent } from '@drivebridge/core';
import type { ToolDispatcher } from '@drivebridge/mcp';
import { createAuthMiddleware, type IInboundAuthValidator } from './auth/index.js';
import { createHealthRoute } from './api/health.js';
import { createMcpRoute } from './api/mcp.js';
import { ServerState } from './api/server-state.js';
import { createToolsRoute } from './api/tools.js';

export const SERVER_NAME = 'drivebridge';
export const SERVER_VERSION = '0.1.0';

export interface CreateAppOptions {
  dispatcher: ToolDispatcher;
  authValidator: IInboundAuthValidator;
  state?: ServerState;
  corsOrigins?: string[];
  /** Hono request logging; off in tests */
  requestLogging?: boolean;
}

/**
 * Builds the HTTP surface. `/health` is mounted ahead of the authentication
 * middleware; `/mcp` and `/api/*` are guarded.
 */
export function createApp(options: CreateAppOptions): Hono {
  const { dispatcher, authValidator } = options;
  const state = options.state ?? new ServerState();
  const origins = options.corsOrigins ?? ['*'];
  const app = new Hono();

  app.use('*', cors({ origin: origins.includes('*') ? '*' : origins }));
  if (options.requestLogging ?? true) {
    app.use('*', logger((message, ...rest) => logEvent('info', 'http:request', { message, rest })));
  }

  app.route('/health', createHealthRoute(state));

  const authMiddleware = createAuthMiddleware(authValidator);
  app.use('/mcp', authMiddleware);
  app.use('/api/*', authMiddleware);

  app.route('/mcp', createMcpRoute(dispatcher, { serverName: SERVER_NAME, serverVersion: SERVER_VERSION }));
  app.route('/api/tools', createToolsRoute(dispatcher));

  app.notFound((c) => c.json({ error: 'Not Found', path: c.req.path }, 404));
  app.onError((error, c) => {
    logEvent('error', 'http:unhandled_error', {
      path: c.req.path,
      message: error.message,
      stack: error.stack,
    });
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  return app;
}
