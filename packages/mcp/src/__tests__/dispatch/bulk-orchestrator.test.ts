import { describe, it, expect, beforeEach } from 'vitest';
import { BulkOrchestrator } from '../../bulk/bulk-orchestrator.js';
import type { BulkResult } from '../../bulk/bulk-result.js';
import { ToolError } from '../../errors/tool-error.js';
import { createDispatchHarness, driveItem, graphError, json, USER_DRIVE } from './test-utils.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isBulkResult(value: unknown): value is BulkResult {
  return typeof value === 'object' && value !== null && 'succeeded' in value && 'failed' in value;
}

async function bulk(promise: Promise<unknown>): Promise<BulkResult> {
  const value = await promise;
  if (!isBulkResult(value)) {
    throw new Error('Expected a bulk result');
  }
  return value;
}

describe('BulkOrchestrator', () => {
  let harness: ReturnType<typeof createDispatchHarness>;

  beforeEach(() => {
    harness = createDispatchHarness();
  });

  it('isolates a failing item and reports the rest as succeeded', async () => {
    harness.graph
      .on('DELETE', /\/items\/(A|C)$/, () => json(204))
      .on('DELETE', `${USER_DRIVE}/items/B`, () => graphError(404, 'itemNotFound', 'gone'));

    const result = await bulk(
      harness.dispatcher.invoke('bulk_delete', { file_ids: ['A', 'B', 'C'] }),
    );

    expect(result).toEqual({
      tool: 'delete_file',
      total: 3,
      succeeded: [
        { id: 'A', result: { id: 'A', deleted: true } },
        { id: 'C', result: { id: 'C', deleted: true } },
      ],
      failed: [
        {
          id: 'B',
          error: {
            kind: 'remote',
            code: 'itemNotFound',
            message: 'gone',
            httpStatus: 404,
            details: expect.objectContaining({ requestId: expect.any(String) }),
          },
        },
      ],
    });
  });

  it('keeps input order when items complete out of order', async () => {
    const delays: Record<string, number> = { A: 30, B: 0, C: 10 };
    const completed: string[] = [];
    harness.graph.on('DELETE', /\/items\/[ABC]$/, async (request) => {
      const id = request.path.slice(-1);
      await delay(delays[id]);
      completed.push(id);
      return json(204);
    });

    const result = await bulk(
      harness.dispatcher.invoke('bulk_delete', { file_ids: ['A', 'B', 'C'] }),
    );

    expect(completed).toEqual(['B', 'C', 'A']);
    expect(result.succeeded.map((entry) => entry.id)).toEqual(['A', 'B', 'C']);
  });

  it('reports duplicate ids once per occurrence', async () => {
    harness.graph.on('DELETE', `${USER_DRIVE}/items/A`, () => json(204));

    const result = await bulk(
      harness.dispatcher.invoke('bulk_delete', { file_ids: ['A', 'A'] }),
    );

    expect(result.total).toBe(2);
    expect(result.succeeded.map((entry) => entry.id)).toEqual(['A', 'A']);
    expect(result.failed).toEqual([]);
  });

  it('never runs more items at once than the concurrency limit', async () => {
    const limited = createDispatchHarness({ bulk: { concurrency: 2 } });
    let inFlight = 0;
    let peak = 0;
    limited.graph.on('DELETE', /\/items\//, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
      return json(204);
    });

    const result = await bulk(
      limited.dispatcher.invoke('bulk_delete', { file_ids: ['1', '2', '3', '4', '5'] }),
    );

    expect(result.succeeded).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it('moves every item into the shared parent', async () => {
    harness.graph.on('PATCH', /\/items\/f\d$/, (request) =>
      json(200, { id: request.path.slice(-2), name: 'x', parentReference: { id: 'dest' } }),
    );

    const result = await bulk(
      harness.dispatcher.invoke('bulk_move', { file_ids: ['f1', 'f2'], new_parent_id: 'dest' }),
    );

    expect(result.succeeded.map((entry) => entry.id)).toEqual(['f1', 'f2']);
    expect(harness.graph.requests.map((request) => request.body)).toEqual([
      { parentReference: { id: 'dest' } },
      { parentReference: { id: 'dest' } },
    ]);
  });

  it('moves into a folder named by path, creating the missing segment', async () => {
    harness.graph
      .on('GET', `${USER_DRIVE}/root`, () => json(200, driveItem('root', 'root', 'folder')))
      .on('GET', `${USER_DRIVE}/root:/Archive`, () =>
        json(200, driveItem('archive', 'Archive', 'folder')),
      )
      .on('POST', `${USER_DRIVE}/items/archive/children`, () =>
        json(201, driveItem('y2024', '2024', 'folder')),
      )
      .on('PATCH', /\/items\/f\d$/, (request) =>
        json(200, { id: request.path.slice(-2), name: 'x', parentReference: { id: 'y2024' } }),
      );

    const result = await bulk(
      harness.dispatcher.invoke('bulk_move', {
        file_ids: ['f1', 'f2'],
        target_path: '/Archive/2024',
      }),
    );

    expect(result.succeeded.map((entry) => entry.id)).toEqual(['f1', 'f2']);
    expect(harness.graph.callsTo('POST', `${USER_DRIVE}/items/archive/children`)).toHaveLength(1);
    expect(harness.graph.callsTo('PATCH', /\/items\/f\d$/).map((request) => request.body)).toEqual([
      { parentReference: { id: 'y2024' } },
      { parentReference: { id: 'y2024' } },
    ]);
  });

  it('requires a destination for bulk_move', async () => {
    const error = await harness.dispatcher
      .invoke('bulk_move', { file_ids: ['f1'] })
      .then(
        () => undefined,
        (reason: unknown) => reason,
      );

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({ kind: 'validation', code: 'invalidParams' });
    expect(harness.graph.fetch).not.toHaveBeenCalled();
  });

  it('resolves the fallback drive once per batch', async () => {
    const bare = createDispatchHarness({ defaults: {} });
    bare.graph
      .on('GET', '/users', () => json(200, { value: [{ id: 'first' }] }))
      .on('DELETE', /^\/users\/first\/drive\/items\//, () => json(204));

    const result = await bulk(
      bare.dispatcher.invoke('bulk_delete', { file_ids: ['a', 'b', 'c'] }),
    );

    expect(result.succeeded).toHaveLength(3);
    expect(bare.graph.callsTo('GET', '/users')).toHaveLength(1);
  });

  describe('batch checks', () => {
    async function rejection(promise: Promise<unknown>): Promise<ToolError> {
      try {
        await promise;
      } catch (error) {
        if (error instanceof ToolError) return error;
        throw error;
      }
      throw new Error('Expected a rejection');
    }

    it('rejects an empty id list', async () => {
      const orchestrator = new BulkOrchestrator(harness.dispatcher);
      const error = await rejection(orchestrator.applyToMany([], 'delete_file', {}));
      expect(error.code).toBe('emptyBatch');
      expect(error.kind).toBe('validation');
    });

    it('rejects a batch larger than maxItems before any item runs', async () => {
      const small = createDispatchHarness({ bulk: { maxItems: 2 } });

      const error = await rejection(
        small.dispatcher.invoke('bulk_delete', { file_ids: ['a', 'b', 'c'] }),
      );

      expect(error.code).toBe('batchTooLarge');
      expect(small.graph.fetch).not.toHaveBeenCalled();
    });

    it('rejects an oversized path move before creating the folder', async () => {
      const small = createDispatchHarness({ bulk: { maxItems: 1 } });

      const error = await rejection(
        small.dispatcher.invoke('bulk_move', { file_ids: ['a', 'b'], target_path: 'Archive' }),
      );

      expect(error.code).toBe('batchTooLarge');
      expect(small.graph.fetch).not.toHaveBeenCalled();
    });

    it('rejects a bulk tool as the per-item tool', async () => {
      const orchestrator = new BulkOrchestrator(harness.dispatcher);
      const error = await rejection(orchestrator.applyToMany(['a'], 'bulk_delete', {}));
      expect(error.code).toBe('nestedBulk');
    });

    it('rejects an unknown per-item tool', async () => {
      const orchestrator = new BulkOrchestrator(harness.dispatcher);
      const error = await rejection(orchestrator.applyToMany(['a'], 'shred_file', {}));
      expect(error.code).toBe('unknownTool');
    });

    it('rejects a tool without an item parameter', async () => {
      const orchestrator = new BulkOrchestrator(harness.dispatcher);
      const error = await rejection(orchestrator.applyToMany(['a'], 'list_files', {}));
      expect(error.code).toBe('notBatchable');
    });

    it('accepts an explicit item parameter', async () => {
      harness.graph.on('GET', `${USER_DRIVE}/root:/a:/children`, () => json(200, { value: [] }));
      const orchestrator = new BulkOrchestrator(harness.dispatcher);

      const result = await orchestrator.applyToMany(['a'], 'list_files', {}, {
        itemParam: 'folder_path',
      });

      expect(result.succeeded).toEqual([{ id: 'a', result: { folder: 'a', count: 0, items: [] } }]);
    });

    it('records per-item validation failures instead of throwing', async () => {
      const orchestrator = new BulkOrchestrator(harness.dispatcher);

      const result = await orchestrator.applyToMany([''], 'delete_file', {});

      expect(result.failed).toEqual([
        {
          id: '',
          error: expect.objectContaining({ kind: 'validation', code: 'invalidParams' }),
        },
      ]);
    });
  });
});
