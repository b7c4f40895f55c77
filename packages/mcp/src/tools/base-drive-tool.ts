import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { ToolArgs } from './tool-args.js';
import type { ToolContext } from './tool-context.js';
import { buildInputSchema, buildParamsSchema, type ParameterTable } from './parameters.js';

/**
 * Base class for catalog tools. A tool declares its parameter table once;
 * both the advertised JSON Schema and the validator are derived from it.
 *
 * @public
 */
export abstract class BaseDriveTool {
  public abstract readonly name: string;
  public abstract readonly description: string;
  public abstract readonly parameters: ParameterTable;

  /** Bulk tools fan out through the orchestrator and cannot be batched themselves */
  public readonly bulk: boolean = false;

  /** Parameter that receives each id when this tool runs per item of a batch */
  public readonly itemParameter?: string;

  private validator?: z.ZodTypeAny;

  public get tool(): Tool {
    return {
      name: this.name,
      description: this.description,
      inputSchema: buildInputSchema(this.parameters),
    };
  }

  public get paramsSchema(): z.ZodTypeAny {
    this.validator ??= buildParamsSchema(this.parameters);
    return this.validator;
  }

  public abstract handle(args: ToolArgs, context: ToolContext): Promise<unknown>;
}
