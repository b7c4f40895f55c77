import { BaseDriveTool } from '../base-drive-tool.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class PollCopyStatus extends BaseDriveTool {
  public readonly name = 'poll_copy_status';
  public readonly description =
    'Check the progress of a copy started by copy_large_file, once.';
  public readonly parameters = {
    monitor_url: {
      type: 'string',
      description: 'monitorUrl returned by copy_large_file',
      required: true,
    },
  } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const monitor = context.services.copyMonitor;
    return monitor.poll(monitor.resume(args.string('monitor_url')));
  }
}
