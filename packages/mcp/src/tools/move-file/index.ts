import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class MoveFile extends BaseDriveTool {
  public readonly name = 'move_file';
  public readonly description =
    'Move a file or folder to another folder of the same drive, optionally renaming it.';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the item to move', required: true },
    new_parent_id: {
      type: 'string',
      description: 'Id of the destination folder',
      required: true,
    },
    new_name: { type: 'string', description: 'Optional new name' },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const item = await context.services.drive.updateItem(
      driveAddress(args),
      args.string('file_id'),
      {
        parentId: args.string('new_parent_id'),
        name: args.optionalString('new_name'),
      },
    );
    return summarizeItem(item);
  }
}
