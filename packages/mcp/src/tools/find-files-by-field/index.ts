import { type DriveItem, summarizeItem } from '@drivebridge/graph';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

const FIELDS = ['name', 'extension', 'mime_type'] as const;
type Field = (typeof FIELDS)[number];

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1) : '';
}

function fieldValue(item: DriveItem, field: Field): string | undefined {
  switch (field) {
    case 'name':
      return item.name;
    case 'extension':
      return extensionOf(item.name);
    case 'mime_type':
      return item.file?.mimeType;
  }
}

function toField(value: string): Field {
  return FIELDS.find((field) => field === value) ?? 'name';
}

/**
 * Narrows a search to files whose field equals the value exactly
 * (case-insensitive). Folders never match.
 */
export class FindFilesByField extends BaseDriveTool {
  public readonly name = 'find_files_by_field';
  public readonly description =
    'Find files whose name, extension or MIME type equals a value exactly (case-insensitive).';
  public readonly parameters = {
    field: {
      type: 'string',
      description: 'Field to match',
      enum: FIELDS,
      required: true,
    },
    value: { type: 'string', description: 'Value the field must equal', required: true },
    limit: {
      type: 'integer',
      description: 'Maximum number of search results to inspect',
      default: 200,
      minimum: 1,
      maximum: 999,
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const field = toField(args.string('field'));
    const raw = args.string('value');
    const wanted = (field === 'extension' ? raw.replace(/^\./, '') : raw).toLowerCase();

    const candidates = await context.services.drive.search(
      driveAddress(args),
      wanted,
      args.integer('limit'),
    );
    const matches = candidates.filter(
      (item) => item.file !== undefined && fieldValue(item, field)?.toLowerCase() === wanted,
    );
    return {
      field,
      value: raw,
      count: matches.length,
      items: matches.map(summarizeItem),
    };
  }
}
