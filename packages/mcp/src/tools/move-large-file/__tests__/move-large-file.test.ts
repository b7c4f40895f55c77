import { describe, it, expect, beforeEach } from 'vitest';
import {
  createDispatchHarness,
  driveItem,
  graphError,
  json,
} from '../../../__tests__/dispatch/test-utils.js';

const MOVE_PARAMS = {
  drive_id: 'drv-1',
  item_id: 'big-1',
  new_parent_id: 'folder-2',
};

describe('move_large_file', () => {
  let harness: ReturnType<typeof createDispatchHarness>;

  beforeEach(() => {
    harness = createDispatchHarness();
  });

  it('re-parents the item on the named drive with one PATCH', async () => {
    harness.graph.on('PATCH', '/drives/drv-1/items/big-1', () =>
      json(
        200,
        driveItem('big-1', 'video.mp4', 'file', {
          size: 7_000_000_000,
          webUrl: 'https://drive.example.test/video.mp4',
          parentReference: { id: 'folder-2' },
        }),
      ),
    );

    const result = await harness.dispatcher.invoke('move_large_file', MOVE_PARAMS);

    expect(result).toMatchObject({
      id: 'big-1',
      name: 'video.mp4',
      size: 7_000_000_000,
      webUrl: 'https://drive.example.test/video.mp4',
      parentId: 'folder-2',
      status: 'completed',
    });
    expect(harness.graph.requests).toHaveLength(1);
    expect(harness.graph.requests[0].body).toEqual({ parentReference: { id: 'folder-2' } });
  });

  it('addresses the named drive rather than the default one', async () => {
    harness.graph.on('PATCH', '/drives/drv-1/items/big-1', () =>
      json(200, driveItem('big-1', 'video.mp4')),
    );

    await harness.dispatcher.invoke('move_large_file', MOVE_PARAMS);

    expect(harness.graph.requests.map((request) => request.path)).toEqual([
      '/drives/drv-1/items/big-1',
    ]);
  });

  it('surfaces a refused move as a remote error', async () => {
    harness.graph.on('PATCH', '/drives/drv-1/items/big-1', () =>
      graphError(409, 'nameAlreadyExists', 'An item with that name exists.'),
    );

    await expect(harness.dispatcher.invoke('move_large_file', MOVE_PARAMS)).rejects.toMatchObject({
      kind: 'remote',
      code: 'nameAlreadyExists',
      httpStatus: 409,
    });
  });
});
