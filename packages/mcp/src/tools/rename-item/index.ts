import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class RenameItem extends BaseDriveTool {
  public readonly name = 'rename_item';
  public readonly description = 'Rename a file or folder in place.';
  public readonly itemParameter = 'item_id';
  public readonly parameters = {
    item_id: { type: 'string', description: 'Id of the item to rename', required: true },
    new_name: { type: 'string', description: 'New name, including extension', required: true },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const item = await context.services.drive.updateItem(
      driveAddress(args),
      args.string('item_id'),
      { name: args.string('new_name') },
    );
    return summarizeItem(item);
  }
}
