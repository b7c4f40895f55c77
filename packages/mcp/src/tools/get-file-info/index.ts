import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class GetFileInfo extends BaseDriveTool {
  public readonly name = 'get_file_info';
  public readonly description = 'Get metadata of a file or folder.';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the item', required: true },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const item = await context.services.drive.getItem(driveAddress(args), args.string('file_id'));
    return summarizeItem(item);
  }
}
