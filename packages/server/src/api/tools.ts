import { Hono } from 'hono';
import { generateRequestId } from '@drivebridge/core';
import { type ToolDispatcher, toToolError } from '@drivebridge/mcp';
import { getAuthContext } from '../auth/index.js';
import { statusForKind } from './error-status.js';

/**
 * Plain-JSON mirror of the tool catalog: list tools and invoke one by name.
 */
export function createToolsRoute(dispatcher: ToolDispatcher): Hono {
  const route = new Hono();

  route.get('/', (c) => c.json({ tools: dispatcher.listTools() }));

  route.post('/:name/invoke', async (c) => {
    const requestId = c.req.header('client-request-id') ?? generateRequestId();

    let params: unknown = {};
    const body = await c.req.text();
    if (body.trim().length > 0) {
      try {
        params = JSON.parse(body);
      } catch {
        return c.json(
          {
            error: {
              kind: 'validation',
              code: 'invalidJson',
              message: 'Request body is not valid JSON',
            },
            requestId,
          },
          400,
        );
      }
    }

    try {
      const result = await dispatcher.invoke(c.req.param('name'), params, {
        requestId,
        caller: getAuthContext(c)?.claims?.subject,
      });
      return c.json({ result, requestId });
    } catch (error) {
      const toolError = toToolError(error);
      return c.json({ error: toolError.toJSON(), requestId }, statusForKind(toolError.kind));
    }
  });

  return route;
}
