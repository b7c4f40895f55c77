import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, addressParams, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class BulkDelete extends BaseDriveTool {
  public readonly name = 'bulk_delete';
  public readonly description =
    'Delete many items. Each id succeeds or fails on its own; the result lists both.';
  public readonly bulk = true;
  public readonly parameters = {
    file_ids: {
      type: 'string-array',
      description: 'Ids of the items to delete',
      required: true,
      minItems: 1,
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const address = await context.services.drive.pinAddress(driveAddress(args));
    return context.bulk.applyToMany(
      args.stringArray('file_ids'),
      'delete_file',
      addressParams(address),
      { context },
    );
  }
}
