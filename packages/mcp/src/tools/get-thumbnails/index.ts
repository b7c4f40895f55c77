import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class GetThumbnails extends BaseDriveTool {
  public readonly name = 'get_thumbnails';
  public readonly description = 'Get thumbnail URLs (small, medium, large) for a file.';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the file', required: true },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const fileId = args.string('file_id');
    const sets = await context.services.drive.getThumbnails(driveAddress(args), fileId);
    return {
      id: fileId,
      thumbnails: sets.map((set) => ({
        small: set.small?.url,
        medium: set.medium?.url,
        large: set.large?.url,
      })),
    };
  }
}
