import { summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class SearchFiles extends BaseDriveTool {
  public readonly name = 'search_files';
  public readonly description = 'Full-text search over file names and content in a drive.';
  public readonly parameters = {
    query: { type: 'string', description: 'Search text', required: true },
    limit: {
      type: 'integer',
      description: 'Maximum number of results',
      default: 50,
      minimum: 1,
      maximum: 999,
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const query = args.string('query');
    const items = await context.services.drive.search(
      driveAddress(args),
      query,
      args.integer('limit'),
    );
    return { query, count: items.length, items: items.map(summarizeItem) };
  }
}
