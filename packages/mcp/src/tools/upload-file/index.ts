import { SIMPLE_UPLOAD_LIMIT_BYTES, summarizeItem } from '@drivebridge/graph';
import { ValidationError } from '../../errors/tool-error.js';
import { BaseDriveTool } from '../base-drive-tool.js';
import { CONFLICT_BEHAVIORS } from '../create-folder/index.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class UploadFile extends BaseDriveTool {
  public readonly name = 'upload_file';
  public readonly description =
    'Upload a small file (up to 4 MiB) to a path, creating or replacing it.';
  public readonly parameters = {
    target_path: {
      type: 'string',
      description: 'Destination path including the file name, e.g. Reports/q3.txt',
      required: true,
    },
    content: { type: 'string', description: 'File content', required: true },
    content_encoding: {
      type: 'string',
      description: 'How content is encoded',
      enum: ['utf8', 'base64'],
      default: 'utf8',
    },
    content_type: {
      type: 'string',
      description: 'MIME type sent with the upload',
      default: 'application/octet-stream',
    },
    conflict_behavior: {
      type: 'string',
      description: 'What to do when the path is taken',
      enum: CONFLICT_BEHAVIORS,
      default: 'replace',
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const encoding = args.string('content_encoding') === 'base64' ? 'base64' : 'utf8';
    const bytes = new Uint8Array(Buffer.from(args.string('content'), encoding));
    if (bytes.byteLength > SIMPLE_UPLOAD_LIMIT_BYTES) {
      throw new ValidationError(
        'payloadTooLarge',
        `Upload of ${bytes.byteLength} bytes exceeds the ${SIMPLE_UPLOAD_LIMIT_BYTES}-byte limit`,
        [{ path: ['content'], message: 'Content too large for a simple upload' }],
      );
    }

    const behavior = args.string('conflict_behavior');
    const item = await context.services.drive.uploadContent(
      driveAddress(args),
      args.string('target_path'),
      bytes,
      {
        contentType: args.string('content_type'),
        conflictBehavior: behavior === 'rename' || behavior === 'fail' ? behavior : 'replace',
      },
    );
    return summarizeItem(item);
  }
}
