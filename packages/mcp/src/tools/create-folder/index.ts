import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export const CONFLICT_BEHAVIORS = ['rename', 'replace', 'fail'] as const;

function isConflictBehavior(value: string): value is (typeof CONFLICT_BEHAVIORS)[number] {
  return CONFLICT_BEHAVIORS.some((behavior) => behavior === value);
}

export class CreateFolder extends BaseDriveTool {
  public readonly name = 'create_folder';
  public readonly description =
    'Create a folder. An existing folder of the same name is kept and the new one renamed unless conflict_behavior says otherwise.';
  public readonly parameters = {
    name: { type: 'string', description: 'Name of the new folder', required: true },
    parent_path: {
      type: 'string',
      description: 'Path of the parent folder; the drive root when omitted',
    },
    parent_id: {
      type: 'string',
      description: 'Id of the parent folder; takes precedence over parent_path',
    },
    conflict_behavior: {
      type: 'string',
      description: 'What to do when the name is taken',
      enum: CONFLICT_BEHAVIORS,
      default: 'rename',
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const behavior = args.string('conflict_behavior');
    const folder = await context.services.drive.createFolder(
      driveAddress(args),
      args.string('name'),
      {
        parentId: args.optionalString('parent_id'),
        parentPath: args.optionalString('parent_path'),
      },
      isConflictBehavior(behavior) ? behavior : 'rename',
    );
    return summarizeItem(folder);
  }
}
