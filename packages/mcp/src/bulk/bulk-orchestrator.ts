import { logEvent } from '@drivebridge/core';
import { toToolError } from '../errors/to-tool-error.js';
import { ToolError, ValidationError } from '../errors/tool-error.js';
import type { BaseDriveTool } from '../tools/base-drive-tool.js';
import type { BulkRunner, InvocationContext } from '../tools/tool-context.js';
import {
  type BulkOptions,
  type BulkPolicy,
  type BulkResult,
  DEFAULT_BULK_POLICY,
} from './bulk-result.js';

/**
 * What the orchestrator needs from the dispatcher.
 */
export interface ToolInvoker {
  describe(name: string): BaseDriveTool | undefined;
  invoke(name: string, params: unknown, context?: InvocationContext): Promise<unknown>;
}

type ItemOutcome = { ok: true; value: unknown } | { ok: false; error: ToolError };

/**
 * Applies one per-item tool to many ids with bounded parallelism. Item
 * failures are captured per id and never abort the batch.
 */
export class BulkOrchestrator implements BulkRunner {
  private readonly policy: BulkPolicy;

  public constructor(
    private readonly invoker: ToolInvoker,
    policy: Partial<BulkPolicy> = {},
  ) {
    this.policy = { ...DEFAULT_BULK_POLICY, ...policy };
  }

  public async applyToMany(
    itemIds: readonly string[],
    perItemTool: string,
    sharedParams: Record<string, unknown>,
    options: BulkOptions = {},
  ): Promise<BulkResult> {
    const itemParam = this.checkBatch(itemIds, perItemTool, options);
    const concurrency = Math.max(
      1,
      Math.min(options.concurrency ?? this.policy.concurrency, itemIds.length),
    );

    logEvent('info', 'bulk:started', {
      tool: perItemTool,
      total: itemIds.length,
      concurrency,
      requestId: options.context?.requestId,
    });

    const outcomes = new Array<ItemOutcome | undefined>(itemIds.length).fill(undefined);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < itemIds.length) {
        const index = next++;
        outcomes[index] = await this.runItem(
          perItemTool,
          { ...sharedParams, [itemParam]: itemIds[index] },
          options.context,
        );
      }
    };
    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const result: BulkResult = {
      tool: perItemTool,
      total: itemIds.length,
      succeeded: [],
      failed: [],
    };
    outcomes.forEach((outcome, index) => {
      const id = itemIds[index];
      if (outcome?.ok) {
        result.succeeded.push({ id, result: outcome.value });
      } else {
        result.failed.push({
          id,
          error: (
            outcome?.error ??
            new ToolError({ kind: 'internal', code: 'itemNotProcessed', message: 'Item was not processed' })
          ).toJSON(),
        });
      }
    });

    logEvent(result.failed.length > 0 ? 'warn' : 'info', 'bulk:completed', {
      tool: perItemTool,
      total: result.total,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      requestId: options.context?.requestId,
    });
    return result;
  }

  public checkBatch(
    itemIds: readonly string[],
    perItemTool: string,
    options: BulkOptions = {},
  ): string {
    if (itemIds.length === 0) {
      throw new ValidationError('emptyBatch', 'A bulk operation needs at least one item id');
    }
    if (itemIds.length > this.policy.maxItems) {
      throw new ValidationError(
        'batchTooLarge',
        `A bulk operation accepts at most ${this.policy.maxItems} items, got ${itemIds.length}`,
      );
    }

    const tool = this.invoker.describe(perItemTool);
    if (!tool) {
      throw ValidationError.unknownTool(perItemTool);
    }
    if (tool.bulk) {
      throw new ValidationError(
        'nestedBulk',
        `Bulk tool '${perItemTool}' cannot be applied per item`,
      );
    }

    const itemParam = options.itemParam ?? tool.itemParameter;
    if (!itemParam) {
      throw new ValidationError(
        'notBatchable',
        `Tool '${perItemTool}' has no item parameter to batch over`,
      );
    }
    return itemParam;
  }

  private async runItem(
    tool: string,
    params: Record<string, unknown>,
    context?: InvocationContext,
  ): Promise<ItemOutcome> {
    try {
      return { ok: true, value: await this.invoker.invoke(tool, params, context) };
    } catch (error) {
      return { ok: false, error: toToolError(error) };
    }
  }
}
