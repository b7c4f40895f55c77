import { describe, it, expect, beforeEach } from 'vitest';
import { ToolError } from '../../../errors/tool-error.js';
import { createDispatchHarness, json } from '../../../__tests__/dispatch/test-utils.js';

const MONITOR_URL = 'https://monitor.example.test/jobs/42?token=opaque';

const COPY_PARAMS = {
  source_drive_id: 'src',
  item_id: 'item-1',
  target_drive_id: 'dst',
  target_parent_id: 'folder-9',
};

describe('copy_large_file', () => {
  let harness: ReturnType<typeof createDispatchHarness>;

  beforeEach(() => {
    harness = createDispatchHarness({ copyPolling: { maxAttempts: 3 } });
    harness.graph.on('POST', '/drives/src/items/item-1/copy', () =>
      json(202, undefined, { Location: MONITOR_URL }),
    );
  });

  it('returns the pending operation with the monitor URL by default', async () => {
    const result = await harness.dispatcher.invoke('copy_large_file', {
      ...COPY_PARAMS,
      name: 'copy.docx',
    });

    expect(result).toMatchObject({
      status: 'in-progress',
      monitorUrl: MONITOR_URL,
      attempts: 0,
      request: {
        sourceDriveId: 'src',
        itemId: 'item-1',
        targetDriveId: 'dst',
        targetParentId: 'folder-9',
        name: 'copy.docx',
      },
    });
    expect(harness.graph.requests[0].body).toEqual({
      parentReference: { driveId: 'dst', id: 'folder-9' },
      name: 'copy.docx',
    });
  });

  it('waits for completion when asked', async () => {
    let polls = 0;
    harness.graph.on('GET', '/jobs/42', () => {
      polls++;
      return polls < 2
        ? json(202, { status: 'inProgress', percentageComplete: 40 })
        : json(200, { status: 'completed', resourceId: 'new-item' });
    });

    const result = await harness.dispatcher.invoke('copy_large_file', {
      ...COPY_PARAMS,
      wait_for_completion: true,
    });

    expect(result).toMatchObject({ status: 'completed', resourceId: 'new-item', attempts: 2 });
    const monitorCalls = harness.graph.callsTo('GET', '/jobs/42');
    expect(monitorCalls[0].url.toString()).toBe(MONITOR_URL);
    expect(monitorCalls[0].headers.get('authorization')).toBeNull();
  });

  it('surfaces a failed copy as a remote error with the remote code', async () => {
    harness.graph.on('GET', '/jobs/42', () =>
      json(200, {
        status: 'failed',
        error: { code: 'nameAlreadyExists', message: 'Target exists' },
      }),
    );

    await expect(
      harness.dispatcher.invoke('copy_large_file', { ...COPY_PARAMS, wait_for_completion: true }),
    ).rejects.toMatchObject({ kind: 'remote', code: 'nameAlreadyExists', message: 'Target exists' });
  });

  it('surfaces an exhausted polling budget as a timeout', async () => {
    harness.graph.on('GET', '/jobs/42', () => json(202, { status: 'inProgress' }));

    const error = await harness.dispatcher
      .invoke('copy_large_file', { ...COPY_PARAMS, wait_for_completion: true })
      .then(
        () => undefined,
        (reason: unknown) => reason,
      );

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({ kind: 'timeout', code: 'operationTimedOut' });
    expect(harness.graph.callsTo('GET', '/jobs/42')).toHaveLength(3);
  });

  it('fails with missingMonitorHandle when the copy is not accepted asynchronously', async () => {
    harness.graph.on('POST', '/drives/src/items/item-1/copy', () => json(200, {}));

    await expect(harness.dispatcher.invoke('copy_large_file', COPY_PARAMS)).rejects.toMatchObject({
      kind: 'remote',
      code: 'missingMonitorHandle',
    });
  });
});

describe('poll_copy_status', () => {
  it('polls a monitor URL once and reports progress', async () => {
    const harness = createDispatchHarness();
    harness.graph.on('GET', '/jobs/42', () =>
      json(202, { status: 'inProgress', percentageComplete: 75 }),
    );

    const result = await harness.dispatcher.invoke('poll_copy_status', {
      monitor_url: MONITOR_URL,
    });

    expect(result).toMatchObject({
      status: 'in-progress',
      remoteStatus: 'inProgress',
      percentageComplete: 75,
      monitorUrl: MONITOR_URL,
      attempts: 1,
    });
    expect(harness.graph.fetch).toHaveBeenCalledTimes(1);
  });

  it('reports completion from a redirect to the new item', async () => {
    const harness = createDispatchHarness();
    harness.graph.on(
      'GET',
      '/jobs/42',
      () =>
        new Response(null, {
          status: 303,
          headers: { Location: 'https://graph.microsoft.com/v1.0/drives/dst/items/new-7' },
        }),
    );

    const result = await harness.dispatcher.invoke('poll_copy_status', {
      monitor_url: MONITOR_URL,
    });

    expect(result).toMatchObject({ status: 'completed', resourceId: 'new-7' });
  });
});
