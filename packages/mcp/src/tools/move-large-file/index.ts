import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

/**
 * Re-parents an item of any size. The move only rewrites metadata on the
 * remote side, so no content passes through this server.
 */
export class MoveLargeFile extends BaseDriveTool {
  public readonly name = 'move_large_file';
  public readonly description =
    'Move a file of any size to another folder of the same drive. Metadata only; completes synchronously.';
  public readonly itemParameter = 'item_id';
  public readonly parameters = {
    drive_id: { type: 'string', description: 'Drive holding the item', required: true },
    item_id: { type: 'string', description: 'Id of the file to move', required: true },
    new_parent_id: {
      type: 'string',
      description: 'Id of the destination folder',
      required: true,
    },
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const item = await context.services.drive.updateItem(
      { driveId: args.string('drive_id') },
      args.string('item_id'),
      { parentId: args.string('new_parent_id') },
    );
    return { ...summarizeItem(item), status: 'completed' };
  }
}
