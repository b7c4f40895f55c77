export type CopyStatus =
  | 'not-started'
  | 'in-progress'
  | 'completed'
  | 'failed'
  | 'timed-out';

export const TERMINAL_COPY_STATUSES: ReadonlySet<CopyStatus> = new Set([
  'completed',
  'failed',
  'timed-out',
]);

export interface CopyRequest {
  sourceDriveId: string;
  itemId: string;
  targetDriveId: string;
  targetParentId: string;
  /** New name for the copy; the source name is kept when omitted */
  name?: string;
}

export interface CopyFailure {
  code: string;
  message: string;
}

/**
 * State of one asynchronous copy. Only {@link AsyncCopyMonitor} produces
 * new states; terminal once `completed`, `failed` or `timed-out`.
 */
export interface CopyOperation {
  /** Absent when the operation was resumed from a bare monitor handle */
  request?: CopyRequest;
  /** Opaque handle from the `Location` header, stored exactly as received */
  monitorUrl?: string;
  status: CopyStatus;
  /** Last status string reported by the remote API */
  remoteStatus?: string;
  percentageComplete?: number;
  /** Id of the new item once completed */
  resourceId?: string;
  failure?: CopyFailure;
  /** Polls issued so far */
  attempts: number;
  startedAt: string;
  finishedAt?: string;
}

export interface CopyPollingPolicy {
  /** Poll ceiling for one wait */
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Wall-clock budget for one wait */
  maxDurationMs: number;
}

export const DEFAULT_COPY_POLLING_POLICY: Readonly<CopyPollingPolicy> =
  Object.freeze({
    maxAttempts: 30,
    initialDelayMs: 1000,
    multiplier: 2,
    maxDelayMs: 30_000,
    maxDurationMs: 10 * 60 * 1000,
  });

export function isTerminal(operation: CopyOperation): boolean {
  return TERMINAL_COPY_STATUSES.has(operation.status);
}
