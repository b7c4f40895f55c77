import { Hono } from 'hono';
import type { ServerState } from './server-state.js';

/**
 * Liveness probe. Touches neither the remote API nor the token provider.
 */
export function createHealthRoute(state: ServerState): Hono {
  const route = new Hono();

  route.get('/', (c) => {
    if (state.isShuttingDown) {
      return c.json({ status: 'unhealthy', reason: 'shutting down' }, 503);
    }
    return c.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  return route;
}
