/**
 * JSON-RPC 2.0 endpoint speaking the tool subset of the Model Context
 * Protocol: initialize, ping, tools/list and tools/call.
 *
 * Unknown tools and invalid parameters are protocol errors (-32602) carrying
 * the validation issues. Every other tool failure is a result with
 * `isError: true` and a structured error, so callers can tell a refusal by
 * the remote API from an outage.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import {
  type CallToolResult,
  ErrorCode,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { generateRequestId, logEvent } from '@drivebridge/core';
import { type ToolDispatcher, toToolError, ValidationError } from '@drivebridge/mcp';
import { getAuthContext } from '../auth/index.js';

type JsonRpcId = string | number | null;

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const CallToolParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

const InitializeParamsSchema = z
  .object({ protocolVersion: z.string().optional() })
  .passthrough();

export interface McpRouteOptions {
  serverName: string;
  serverVersion: string;
}

interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

class JsonRpcFailure extends Error {
  public constructor(public readonly error: JsonRpcError) {
    super(error.message);
    this.name = 'JsonRpcFailure';
    Object.setPrototypeOf(this, JsonRpcFailure.prototype);
  }
}

function errorEnvelope(id: JsonRpcId, error: JsonRpcError) {
  return { jsonrpc: '2.0' as const, id, error };
}

function toStructured(result: unknown): Record<string, unknown> {
  return typeof result === 'object' && result !== null && !Array.isArray(result)
    ? { ...result }
    : { result };
}

export function createMcpRoute(dispatcher: ToolDispatcher, options: McpRouteOptions): Hono {
  const route = new Hono();

  async function callTool(params: unknown, context: { requestId: string; caller?: string }) {
    const parsed = CallToolParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      throw new JsonRpcFailure({
        code: ErrorCode.InvalidParams,
        message: 'tools/call expects { name, arguments }',
        data: { issues: parsed.error.issues.map(({ path, message }) => ({ path, message })) },
      });
    }

    try {
      const result = await dispatcher.invoke(
        parsed.data.name,
        parsed.data.arguments ?? {},
        context,
      );
      const response: CallToolResult = {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: toStructured(result),
      };
      return response;
    } catch (error) {
      const toolError = toToolError(error);
      if (toolError instanceof ValidationError) {
        throw new JsonRpcFailure({
          code: ErrorCode.InvalidParams,
          message: toolError.message,
          data: { kind: toolError.kind, code: toolError.code, issues: toolError.issues },
        });
      }
      const payload = toolError.toJSON();
      const response: CallToolResult = {
        content: [{ type: 'text', text: JSON.stringify({ error: payload }, null, 2) }],
        structuredContent: { error: payload },
        isError: true,
      };
      return response;
    }
  }

  async function dispatch(
    method: string,
    params: unknown,
    context: { requestId: string; caller?: string },
  ): Promise<unknown> {
    switch (method) {
      case 'initialize': {
        const requested = InitializeParamsSchema.safeParse(params ?? {});
        const version =
          requested.success && requested.data.protocolVersion
            ? requested.data.protocolVersion
            : LATEST_PROTOCOL_VERSION;
        return {
          protocolVersion: SUPPORTED_PROTOCOL_VERSIONS.includes(version)
            ? version
            : LATEST_PROTOCOL_VERSION,
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: options.serverName, version: options.serverVersion },
        };
      }
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: dispatcher.listTools() };
      case 'tools/call':
        return callTool(params, context);
      default:
        throw new JsonRpcFailure({
          code: ErrorCode.MethodNotFound,
          message: `Method not found: ${method}`,
        });
    }
  }

  route.post('/', async (c) => {
    let body: unknown;
    try {
      body = JSON.parse(await c.req.text());
    } catch {
      return c.json(
        errorEnvelope(null, { code: ErrorCode.ParseError, message: 'Parse error' }),
        400,
      );
    }

    const envelope = JsonRpcRequestSchema.safeParse(body);
    if (!envelope.success) {
      return c.json(
        errorEnvelope(null, {
          code: ErrorCode.InvalidRequest,
          message: Array.isArray(body)
            ? 'Batch requests are not supported'
            : 'Invalid Request',
        }),
        400,
      );
    }

    const { id, method, params } = envelope.data;
    const requestId = c.req.header('client-request-id') ?? generateRequestId();
    const context = { requestId, caller: getAuthContext(c)?.claims?.subject };

    // notifications (no id) get no response body
    if (id === undefined) {
      logEvent('debug', 'mcp:notification', { method, requestId });
      return c.body(null, 202);
    }

    try {
      const result = await dispatch(method, params, context);
      return c.json({ jsonrpc: '2.0' as const, id, result });
    } catch (error) {
      if (error instanceof JsonRpcFailure) {
        return c.json(errorEnvelope(id, error.error));
      }
      logEvent('error', 'mcp:internal_error', {
        method,
        requestId,
        message: error instanceof Error ? error.message : String(error),
      });
      return c.json(
        errorEnvelope(id, { code: ErrorCode.InternalError, message: 'Internal error' }),
      );
    }
  });

  return route;
}
