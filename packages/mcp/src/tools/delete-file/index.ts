import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class DeleteFile extends BaseDriveTool {
  public readonly name = 'delete_file';
  public readonly description = 'Delete a file or folder (moved to the recycle bin).';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the item to delete', required: true },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const fileId = args.string('file_id');
    await context.services.drive.deleteItem(driveAddress(args), fileId);
    return { id: fileId, deleted: true };
  }
}
