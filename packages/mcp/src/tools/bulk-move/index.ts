import { ValidationError } from '../../errors/tool-error.js';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, addressParams, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class BulkMove extends BaseDriveTool {
  public readonly name = 'bulk_move';
  public readonly description =
    'Move many items into one folder, named by id or by path (created when missing). Each id succeeds or fails on its own; the result lists both.';
  public readonly bulk = true;
  public readonly parameters = {
    file_ids: {
      type: 'string-array',
      description: 'Ids of the items to move',
      required: true,
      minItems: 1,
    },
    new_parent_id: {
      type: 'string',
      description: 'Id of the destination folder',
    },
    target_path: {
      type: 'string',
      description: 'Destination folder path from the drive root, used when no new_parent_id is given',
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const fileIds = args.stringArray('file_ids');
    const parentId = args.optionalString('new_parent_id');
    const targetPath = args.optionalString('target_path');
    if (!parentId && !targetPath) {
      throw ValidationError.invalidParams([
        { path: ['new_parent_id'], message: 'Provide new_parent_id or target_path' },
      ]);
    }

    context.bulk.checkBatch(fileIds, 'move_file');

    const drive = context.services.drive;
    const address = await drive.pinAddress(driveAddress(args));
    const destination =
      parentId || (await drive.ensureFolderPath(address, targetPath ?? '')).id;

    return context.bulk.applyToMany(
      fileIds,
      'move_file',
      { ...addressParams(address), new_parent_id: destination },
      { context },
    );
  }
}
