import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class ListFiles extends BaseDriveTool {
  public readonly name = 'list_files';
  public readonly description =
    'List files and folders in a drive folder, addressed by path or by id.';
  public readonly parameters = {
    folder_path: {
      type: 'string',
      description: 'Folder path relative to the drive root',
      default: '/',
    },
    folder_id: {
      type: 'string',
      description: 'Folder id; takes precedence over folder_path',
    },
    limit: {
      type: 'integer',
      description: 'Maximum number of items to return',
      default: 100,
      minimum: 1,
      maximum: 999,
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const folderId = args.optionalString('folder_id');
    const folderPath = args.optionalString('folder_path') ?? '/';
    const items = await context.services.drive.listChildren(driveAddress(args), {
      folderId,
      folderPath,
      top: args.integer('limit'),
    });
    return {
      folder: folderId ?? folderPath,
      count: items.length,
      items: items.map(summarizeItem),
    };
  }
}
