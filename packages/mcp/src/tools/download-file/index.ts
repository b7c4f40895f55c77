import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class DownloadFile extends BaseDriveTool {
  public readonly name = 'download_file';
  public readonly description =
    'Get a short-lived, pre-authenticated download URL for a file.';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the file', required: true },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    return context.services.drive.getDownloadLink(driveAddress(args), args.string('file_id'));
  }
}
