import { OperationTimeoutError } from '@drivebridge/graph';
import { ToolError } from '../../errors/tool-error.js';
import { BaseDriveTool } from '../base-drive-tool.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

/**
 * Server-side copy, possibly across drives. Returns the pending operation
 * with its monitor URL unless asked to wait for the outcome.
 */
export class CopyLargeFile extends BaseDriveTool {
  public readonly name = 'copy_large_file';
  public readonly description =
    'Copy a file or folder, possibly to another drive. The copy runs asynchronously; poll its monitor_url with poll_copy_status, or set wait_for_completion.';
  public readonly parameters = {
    source_drive_id: { type: 'string', description: 'Drive holding the item', required: true },
    item_id: { type: 'string', description: 'Id of the item to copy', required: true },
    target_drive_id: { type: 'string', description: 'Destination drive', required: true },
    target_parent_id: {
      type: 'string',
      description: 'Destination folder id in the target drive',
      required: true,
    },
    name: { type: 'string', description: 'Name of the copy; the source name when omitted' },
    wait_for_completion: {
      type: 'boolean',
      description: 'Poll until the copy finishes instead of returning the monitor URL',
      default: false,
    },
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const monitor = context.services.copyMonitor;
    const operation = await monitor.start({
      sourceDriveId: args.string('source_drive_id'),
      itemId: args.string('item_id'),
      targetDriveId: args.string('target_drive_id'),
      targetParentId: args.string('target_parent_id'),
      name: args.optionalString('name'),
    });
    if (!args.boolean('wait_for_completion')) {
      return operation;
    }

    const finished = await monitor.waitForCompletion(operation);
    switch (finished.status) {
      case 'failed':
        throw new ToolError({
          kind: 'remote',
          code: finished.failure?.code ?? 'copyFailed',
          message: finished.failure?.message ?? 'Copy failed',
          details: { operation: finished },
        });
      case 'timed-out':
        throw new OperationTimeoutError(
          finished.failure?.message ?? 'Copy did not finish in time',
          { operation: finished, monitorUrl: finished.monitorUrl },
        );
      default:
        return finished;
    }
  }
}
