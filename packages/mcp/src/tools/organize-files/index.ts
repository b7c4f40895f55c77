import type { DriveAddress } from '@drivebridge/graph';
import type { BulkResult } from '../../bulk/bulk-result.js';
import { toToolError } from '../../errors/to-tool-error.js';
import { type ToolErrorPayload, ValidationError } from '../../errors/tool-error.js';
import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, addressParams, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

interface OrganizeRule {
  action: 'move' | 'delete';
  searchQuery: string;
  targetFolder?: string;
}

export interface RuleReport {
  index: number;
  action: OrganizeRule['action'];
  searchQuery: string;
  targetFolder?: string;
  matched: number;
  status: 'completed' | 'error';
  result?: BulkResult;
  error?: ToolErrorPayload;
}

/**
 * Applies search-driven rules in order. Every rule moves or deletes the
 * files (never folders) its query matches, in one batch.
 */
export class OrganizeFiles extends BaseDriveTool {
  public readonly name = 'organize_files';
  public readonly description =
    'Organize files by rules: each rule searches the drive and moves the matching files into target_folder (created when missing) or deletes them. Folders are never touched.';
  public readonly bulk = true;
  public readonly parameters = {
    rules: {
      type: 'object-array',
      description: 'Rules applied in order',
      required: true,
      minItems: 1,
      items: {
        action: {
          type: 'string',
          description: 'move or delete',
          enum: ['move', 'delete'],
          required: true,
        },
        search_query: {
          type: 'string',
          description: 'Search selecting the files',
          required: true,
        },
        target_folder: {
          type: 'string',
          description: 'Destination folder path; required for move',
        },
      },
    },
    ...DRIVE_ADDRESS_PARAMETERS,
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const rules = this.readRules(args);
    const address = await context.services.drive.pinAddress(driveAddress(args));

    const reports: RuleReport[] = [];
    for (const [index, rule] of rules.entries()) {
      reports.push(await this.applyRule(index, rule, address, context));
    }
    return { rules: reports };
  }

  private readRules(args: ToolArgs): OrganizeRule[] {
    return args.records('rules').map((record, index) => {
      const action = record.string('action') === 'delete' ? 'delete' : 'move';
      const targetFolder = record.optionalString('target_folder');
      if (action === 'move' && !targetFolder) {
        throw ValidationError.invalidParams([
          {
            path: ['rules', index, 'target_folder'],
            message: 'Missing required parameter: target_folder',
          },
        ]);
      }
      return { action, searchQuery: record.string('search_query'), targetFolder };
    });
  }

  private async applyRule(
    index: number,
    rule: OrganizeRule,
    address: DriveAddress,
    context: ToolContext,
  ): Promise<RuleReport> {
    const report: RuleReport = {
      index,
      action: rule.action,
      searchQuery: rule.searchQuery,
      targetFolder: rule.targetFolder,
      matched: 0,
      status: 'completed',
    };

    try {
      const drive = context.services.drive;
      const files = (await drive.search(address, rule.searchQuery)).filter(
        (item) => item.file !== undefined,
      );
      report.matched = files.length;
      if (files.length === 0) {
        report.result = { tool: toolFor(rule), total: 0, succeeded: [], failed: [] };
        return report;
      }

      const shared: Record<string, unknown> = addressParams(address);
      if (rule.action === 'move') {
        const folder = await drive.ensureFolderPath(address, rule.targetFolder ?? '');
        shared.new_parent_id = folder.id;
      }
      report.result = await context.bulk.applyToMany(
        files.map((file) => file.id),
        toolFor(rule),
        shared,
        { context },
      );
    } catch (error) {
      report.status = 'error';
      report.error = toToolError(error).toJSON();
    }
    return report;
  }
}

function toolFor(rule: OrganizeRule): string {
  return rule.action === 'move' ? 'move_file' : 'delete_file';
}
