/**
 * Process entry point: configuration from the environment, structured
 * console logging, graceful shutdown on SIGINT/SIGTERM.
 */

import { logError, logEvent, setupConsoleLogging } from '@drivebridge/core';
import { ConfigurationError } from './config/configuration-error.js';
import { loadServerConfig } from './config/load-server-config.js';
import { startServer } from './index.js';

async function main(): Promise<void> {
  setupConsoleLogging();

  const config = loadServerConfig(process.env);
  const running = await startServer(config);

  const shutdown = (signal: string) => {
    logEvent('info', 'server:shutdown', { signal });
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logError('server-shutdown', error);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logEvent('error', 'config:invalid', { problems: error.problems, message: error.message });
  } else {
    logError('server-startup', error);
  }
  process.exit(1);
});
