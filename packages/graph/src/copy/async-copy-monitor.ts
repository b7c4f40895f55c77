import { z } from 'zod';
import { computeBackoffDelay, logEvent, sleep, type SleepFn } from '@drivebridge/core';
import type { RemoteClient } from '../client/remote-client.js';
import { RemoteError } from '../errors/remote-error.js';
import {
  type CopyOperation,
  type CopyPollingPolicy,
  type CopyRequest,
  type CopyStatus,
  DEFAULT_COPY_POLLING_POLICY,
  isTerminal,
} from './copy-operation.js';

const MonitorStatusSchema = z
  .object({
    status: z.string().optional(),
    percentageComplete: z.number().optional(),
    resourceId: z.string().optional(),
    statusDescription: z.string().optional(),
    error: z
      .object({ code: z.string(), message: z.string().default('') })
      .passthrough()
      .optional(),
  })
  .passthrough();

type MonitorStatus = z.infer<typeof MonitorStatusSchema>;

const IN_PROGRESS_STATUSES = new Set([
  'notStarted',
  'inProgress',
  'waiting',
  'updating',
  'deletePending',
]);
const FAILED_STATUSES = new Set(['failed', 'deleteFailed', 'cancelled']);

export interface AsyncCopyMonitorOptions {
  policy?: Partial<CopyPollingPolicy>;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * Drives the two-phase copy protocol of the remote API: the copy request is
 * accepted with `202` and a monitor handle, which is then polled without
 * credentials until the copy completes, fails, or the polling budget runs out.
 *
 * Waiting suspends only the calling task; nothing else is blocked.
 */
export class AsyncCopyMonitor {
  private readonly policy: CopyPollingPolicy;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  public constructor(
    private readonly client: RemoteClient,
    options: AsyncCopyMonitorOptions = {},
  ) {
    this.policy = { ...DEFAULT_COPY_POLLING_POLICY, ...options.policy };
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Issues the copy request and captures the monitor handle.
   * @throws {RemoteError} `missingMonitorHandle` when the response carries no `Location`
   */
  public async start(request: CopyRequest): Promise<CopyOperation> {
    const path = `/drives/${encodeURIComponent(request.sourceDriveId)}/items/${encodeURIComponent(request.itemId)}/copy`;
    const response = await this.client.call('POST', path, {
      body: {
        parentReference: {
          driveId: request.targetDriveId,
          id: request.targetParentId,
        },
        ...(request.name ? { name: request.name } : {}),
      },
      responseType: 'none',
    });

    const monitorUrl = response.headers.get('location');
    if (response.status !== 202 || !monitorUrl) {
      throw RemoteError.missingMonitorHandle(response.status, response.requestId);
    }

    logEvent('info', 'copy:started', {
      requestId: response.requestId,
      itemId: request.itemId,
      targetDriveId: request.targetDriveId,
    });

    return {
      request,
      monitorUrl,
      status: 'in-progress',
      attempts: 0,
      startedAt: new Date(this.now()).toISOString(),
    };
  }

  /**
   * Rebuilds an operation from a monitor handle obtained earlier.
   */
  public resume(monitorUrl: string): CopyOperation {
    return {
      monitorUrl,
      status: 'in-progress',
      attempts: 0,
      startedAt: new Date(this.now()).toISOString(),
    };
  }

  /**
   * Polls the monitor handle once. Terminal operations are returned unchanged.
   */
  public async poll(operation: CopyOperation): Promise<CopyOperation> {
    if (isTerminal(operation)) {
      return operation;
    }
    if (!operation.monitorUrl) {
      throw RemoteError.missingMonitorHandle(0, 'local');
    }

    const response = await this.client.call('GET', operation.monitorUrl, {
      authenticate: false,
      followRedirects: false,
      responseType: 'json',
    });
    const attempts = operation.attempts + 1;

    if (response.status === 303) {
      return this.finish(operation, attempts, {
        status: 'completed',
        remoteStatus: 'completed',
        percentageComplete: 100,
        resourceId: resourceIdFromLocation(response.headers.get('location')),
      });
    }

    const parsed = MonitorStatusSchema.safeParse(response.data ?? {});
    if (!parsed.success) {
      throw RemoteError.invalidResponse(
        'monitor status is not an object',
        response.status,
        response.requestId,
      );
    }

    const next = this.applyRemoteStatus(operation, attempts, parsed.data);
    logEvent('debug', 'copy:poll', {
      attempts,
      remoteStatus: next.remoteStatus,
      status: next.status,
      percentageComplete: next.percentageComplete,
    });
    return next;
  }

  /**
   * Polls with capped exponential backoff until a terminal status. Ends as
   * `timed-out` once the poll ceiling or the duration budget is spent.
   * @throws {RemoteError} When a poll fails; `details.monitorUrl` carries the
   *   handle so the wait can be resumed
   */
  public async waitForCompletion(
    operation: CopyOperation,
    overrides: Partial<CopyPollingPolicy> = {},
  ): Promise<CopyOperation> {
    const policy = { ...this.policy, ...overrides };
    const waitStartedAt = this.now();
    let current = operation;
    let polls = 0;

    while (!isTerminal(current)) {
      if (polls >= policy.maxAttempts) {
        return this.timeOut(current, `no terminal status after ${polls} polls`);
      }

      const remainingMs = policy.maxDurationMs - (this.now() - waitStartedAt);
      if (remainingMs <= 0) {
        return this.timeOut(
          current,
          `no terminal status within ${policy.maxDurationMs}ms`,
        );
      }

      await this.sleep(
        Math.min(
          computeBackoffDelay(
            {
              maxAttempts: policy.maxAttempts,
              initialDelayMs: policy.initialDelayMs,
              multiplier: policy.multiplier,
              maxDelayMs: policy.maxDelayMs,
            },
            polls,
          ),
          remainingMs,
        ),
      );
      current = await this.pollResumable(current);
      polls++;
    }

    return current;
  }

  /**
   * Starts a copy and waits for its terminal state.
   */
  public async copy(
    request: CopyRequest,
    overrides?: Partial<CopyPollingPolicy>,
  ): Promise<CopyOperation> {
    const operation = await this.start(request);
    return this.waitForCompletion(operation, overrides);
  }

  private async pollResumable(operation: CopyOperation): Promise<CopyOperation> {
    try {
      return await this.poll(operation);
    } catch (error) {
      if (error instanceof RemoteError && operation.monitorUrl) {
        throw error.withDetails({
          monitorUrl: operation.monitorUrl,
          attempts: operation.attempts,
        });
      }
      throw error;
    }
  }

  private applyRemoteStatus(
    operation: CopyOperation,
    attempts: number,
    body: MonitorStatus,
  ): CopyOperation {
    const remoteStatus = body.status ?? 'notStarted';
    const progress = {
      remoteStatus,
      percentageComplete: body.percentageComplete ?? operation.percentageComplete,
      resourceId: body.resourceId ?? operation.resourceId,
    };

    if (remoteStatus === 'completed') {
      return this.finish(operation, attempts, { status: 'completed', ...progress });
    }

    if (FAILED_STATUSES.has(remoteStatus)) {
      return this.finish(operation, attempts, {
        status: 'failed',
        ...progress,
        failure: body.error
          ? { code: body.error.code, message: body.error.message }
          : {
              code: remoteStatus,
              message: body.statusDescription ?? `Copy ${remoteStatus}`,
            },
      });
    }

    if (!IN_PROGRESS_STATUSES.has(remoteStatus)) {
      logEvent('warn', 'copy:unknown_status', { remoteStatus });
    }
    return { ...operation, ...progress, status: 'in-progress', attempts };
  }

  private finish(
    operation: CopyOperation,
    attempts: number,
    update: Partial<CopyOperation> & { status: CopyStatus },
  ): CopyOperation {
    const finished: CopyOperation = {
      ...operation,
      ...update,
      attempts,
      finishedAt: new Date(this.now()).toISOString(),
    };
    logEvent(finished.status === 'completed' ? 'info' : 'warn', `copy:${finished.status}`, {
      attempts,
      resourceId: finished.resourceId,
      failure: finished.failure,
    });
    return finished;
  }

  private timeOut(operation: CopyOperation, reason: string): CopyOperation {
    return this.finish(operation, operation.attempts, {
      status: 'timed-out',
      failure: { code: 'copyTimedOut', message: `Copy did not finish: ${reason}` },
    });
  }
}

function resourceIdFromLocation(location: string | null): string | undefined {
  if (!location) {
    return undefined;
  }
  const match = /\/items\/([^/?#]+)/.exec(location);
  return match ? decodeURIComponent(match[1]) : undefined;
}
