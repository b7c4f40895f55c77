import type { AsyncCopyMonitor, DriveService } from '@drivebridge/graph';
import type { BulkOptions, BulkResult } from '../bulk/bulk-result.js';

/**
 * Remote-facing services shared by every handler.
 */
export interface ToolServices {
  drive: DriveService;
  copyMonitor: AsyncCopyMonitor;
}

/**
 * Per-invocation metadata supplied by the transport.
 */
export interface InvocationContext {
  requestId?: string;
  /** Authenticated principal, for logs only */
  caller?: string;
}

export interface BulkRunner {
  /**
   * Rejects a batch the runner would refuse, before any remote work.
   * @returns The parameter that receives each id
   */
  checkBatch(itemIds: readonly string[], perItemTool: string, options?: BulkOptions): string;
  applyToMany(
    itemIds: readonly string[],
    perItemTool: string,
    sharedParams: Record<string, unknown>,
    options?: BulkOptions,
  ): Promise<BulkResult>;
}

export interface ToolContext extends InvocationContext {
  services: ToolServices;
  bulk: BulkRunner;
}
