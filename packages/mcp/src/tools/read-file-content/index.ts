import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class ReadFileContent extends BaseDriveTool {
  public readonly name = 'read_file_content';
  public readonly description = 'Read the content of a text file.';
  public readonly itemParameter = 'file_id';
  public readonly parameters = {
    file_id: { type: 'string', description: 'Id of the file', required: true },
    max_chars: {
      type: 'integer',
      description: 'Truncate the returned text to this many characters (code points)',
      default: 100_000,
      minimum: 1,
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const fileId = args.string('file_id');
    const maxChars = args.integer('max_chars');
    const text = await context.services.drive.readText(driveAddress(args), fileId);
    const characters = Array.from(text);
    return {
      id: fileId,
      length: characters.length,
      truncated: characters.length > maxChars,
      content: characters.slice(0, maxChars).join(''),
    };
  }
}
