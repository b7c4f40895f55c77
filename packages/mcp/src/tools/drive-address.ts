import type { DriveAddress } from '@drivebridge/graph';
import type { ParameterTable } from './parameters.js';
import type { ToolArgs } from './tool-args.js';

export const DRIVE_ADDRESS_PARAMETERS = {
  drive_id: {
    type: 'string',
    description: "Drive id. Defaults to the configured drive, then the first user's drive",
  },
  user_id: {
    type: 'string',
    description: 'User whose OneDrive is used when no drive_id is given',
  },
} as const satisfies ParameterTable;

export function driveAddress(args: ToolArgs): DriveAddress {
  return {
    driveId: args.optionalString('drive_id') || undefined,
    userId: args.optionalString('user_id') || undefined,
  };
}

/**
 * Turns a pinned address back into shared batch parameters.
 */
export function addressParams(address: DriveAddress): Record<string, string> {
  const params: Record<string, string> = {};
  if (address.driveId) params.drive_id = address.driveId;
  if (address.userId) params.user_id = address.userId;
  return params;
}
