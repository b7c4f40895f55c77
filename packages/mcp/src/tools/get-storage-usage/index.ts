import { BaseDriveTool } from '../base-drive-tool.js';
import { DRIVE_ADDRESS_PARAMETERS, driveAddress } from '../drive-address.js';
import type { ToolArgs } from '../tool-args.js';
import type { ToolContext } from '../tool-context.js';

export class GetStorageUsage extends BaseDriveTool {
  public readonly name = 'get_storage_usage';
  public readonly description = 'Report the quota of a drive: total, used and remaining bytes.';
  public readonly parameters = { ...DRIVE_ADDRESS_PARAMETERS } as const;

  public async handle(args: ToolArgs, context: ToolContext): Promise<unknown> {
    const drive = await context.services.drive.getDrive(driveAddress(args));
    const quota = drive.quota ?? {};
    const usedPercent =
      quota.total && quota.used !== undefined
        ? Math.round((quota.used / quota.total) * 10_000) / 100
        : undefined;
    return {
      driveId: drive.id,
      driveType: drive.driveType,
      total: quota.total,
      used: quota.used,
      remaining: quota.remaining,
      deleted: quota.deleted,
      state: quota.state,
      usedPercent,
    };
  }
}
