import type { ToolErrorPayload } from '../errors/tool-error.js';
import type { InvocationContext } from '../tools/tool-context.js';

export interface BulkSuccess {
  id: string;
  result: unknown;
}

export interface BulkFailure {
  id: string;
  error: ToolErrorPayload;
}

/**
 * Outcome of a batch. Both partitions keep input order and every input id,
 * duplicates included, appears exactly once across them.
 */
export interface BulkResult {
  tool: string;
  total: number;
  succeeded: BulkSuccess[];
  failed: BulkFailure[];
}

export interface BulkPolicy {
  concurrency: number;
  maxItems: number;
}

export const DEFAULT_BULK_POLICY: Readonly<BulkPolicy> = Object.freeze({
  concurrency: 4,
  maxItems: 200,
});

export interface BulkOptions {
  /** Overrides the per-item tool's own item parameter */
  itemParam?: string;
  concurrency?: number;
  context?: InvocationContext;
}
