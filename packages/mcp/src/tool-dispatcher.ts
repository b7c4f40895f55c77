import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { logEvent } from '@drivebridge/core';
import { BulkOrchestrator, type ToolInvoker } from './bulk/bulk-orchestrator.js';
import type { BulkPolicy } from './bulk/bulk-result.js';
import { toToolError } from './errors/to-tool-error.js';
import { ValidationError } from './errors/tool-error.js';
import type { ToolCatalog } from './tool-catalog.js';
import type { BaseDriveTool } from './tools/base-drive-tool.js';
import { ToolArgs } from './tools/tool-args.js';
import type { InvocationContext, ToolServices } from './tools/tool-context.js';

export interface ToolDispatcherOptions {
  bulk?: Partial<BulkPolicy>;
}

/**
 * Routes a named invocation to its handler: lookup, parameter validation,
 * execution and error classification. Every failure leaves as a ToolError.
 */
export class ToolDispatcher implements ToolInvoker {
  private readonly bulk: BulkOrchestrator;

  public constructor(
    private readonly catalog: ToolCatalog,
    private readonly services: ToolServices,
    options: ToolDispatcherOptions = {},
  ) {
    this.bulk = new BulkOrchestrator(this, options.bulk);
  }

  public listTools(): Tool[] {
    return this.catalog.describe();
  }

  public describe(name: string): BaseDriveTool | undefined {
    return this.catalog.get(name);
  }

  public async invoke(
    name: string,
    params: unknown,
    context: InvocationContext = {},
  ): Promise<unknown> {
    const tool = this.catalog.get(name);
    if (!tool) {
      logEvent('warn', 'tool:unknown', { tool: name, requestId: context.requestId });
      throw ValidationError.unknownTool(name);
    }

    const args = this.validate(tool, params ?? {}, context);
    const startedAt = Date.now();
    logEvent('debug', 'tool:call_started', {
      tool: name,
      requestId: context.requestId,
      caller: context.caller,
    });

    try {
      const result = await tool.handle(args, {
        ...context,
        services: this.services,
        bulk: this.bulk,
      });
      logEvent('info', 'tool:call_completed', {
        tool: name,
        requestId: context.requestId,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      const toolError = toToolError(error);
      logEvent(toolError.kind === 'internal' ? 'error' : 'warn', 'tool:call_failed', {
        tool: name,
        requestId: context.requestId,
        kind: toolError.kind,
        code: toolError.code,
        httpStatus: toolError.httpStatus,
        message: toolError.message,
        durationMs: Date.now() - startedAt,
      });
      throw toolError;
    }
  }

  private validate(
    tool: BaseDriveTool,
    params: unknown,
    context: InvocationContext,
  ): ToolArgs {
    const parsed = tool.paramsSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
      }));
      logEvent('warn', 'tool:invalid_params', {
        tool: tool.name,
        requestId: context.requestId,
        issues,
      });
      throw ValidationError.invalidParams(issues);
    }
    return new ToolArgs(parsed.data);
  }
}
