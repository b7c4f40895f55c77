/**
 * drivebridge HTTP server: the drive tool catalog over JSON-RPC and REST,
 * behind mandatory inbound authentication.
 * @public
 */

import { serve, type ServerType } from '@hono/node-server';
import { logEvent } from '@drivebridge/core';
import type { ServerConfig } from '@drivebridge/schemas';
import { ServerState } from './api/server-state.js';
import { createApp } from './app.js';
import { createAuthValidator, type AuthValidatorOptions } from './auth/index.js';
import { createServices, type ServiceOverrides } from './services.js';

export * from './auth/index.js';
export { createApp, SERVER_NAME, SERVER_VERSION, type CreateAppOptions } from './app.js';
export { ServerState } from './api/server-state.js';
export { statusForKind } from './api/error-status.js';
export { ConfigurationError } from './config/configuration-error.js';
export { loadServerConfig, type LoadServerConfigOptions } from './config/load-server-config.js';
export { createServices, type DriveBridgeServices, type ServiceOverrides } from './services.js';

export interface StartServerOptions extends ServiceOverrides {
  auth?: AuthValidatorOptions;
}

export interface RunningServer {
  server: ServerType;
  state: ServerState;
  /** Flags the process unhealthy, then stops accepting connections */
  close(): Promise<void>;
}

/**
 * Builds services and the app from a validated configuration and starts
 * listening. Resolves once the socket is bound.
 */
export async function startServer(
  config: ServerConfig,
  options: StartServerOptions = {},
): Promise<RunningServer> {
  const services = createServices(config, options);
  const authValidator = createAuthValidator(config.inboundAuth, options.auth);
  const state = new ServerState();
  const app = createApp({
    dispatcher: services.dispatcher,
    authValidator,
    state,
    corsOrigins: config.server.corsOrigins,
  });

  const { port, host } = config.server;
  const server = await new Promise<ServerType>((resolve) => {
    const instance = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
      logEvent('info', 'server:listening', {
        url: `http://${host}:${info.port}`,
        auth: authValidator.getType(),
        tools: services.dispatcher.listTools().length,
      });
      resolve(instance);
    });
  });

  return {
    server,
    state,
    close: () =>
      new Promise<void>((resolve, reject) => {
        state.markShuttingDown();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
