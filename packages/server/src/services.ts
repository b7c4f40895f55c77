import { ClientCredentialsTokenProvider, type ITokenProvider } from '@drivebridge/auth';
import type { SleepFn } from '@drivebridge/core';
import { AsyncCopyMonitor, DriveService, RemoteClient } from '@drivebridge/graph';
import { createDriveTools, ToolCatalog, ToolDispatcher } from '@drivebridge/mcp';
import type { ServerConfig } from '@drivebridge/schemas';

export interface ServiceOverrides {
  /** Replaces global fetch for the token endpoint and the remote API */
  fetch?: typeof fetch;
  sleep?: SleepFn;
  tokenProvider?: ITokenProvider;
}

export interface DriveBridgeServices {
  tokenProvider: ITokenProvider;
  client: RemoteClient;
  drive: DriveService;
  copyMonitor: AsyncCopyMonitor;
  dispatcher: ToolDispatcher;
}

/**
 * Wires the outbound stack once per process: one token provider, one remote
 * client, and the dispatcher over the frozen tool catalog.
 */
export function createServices(
  config: ServerConfig,
  overrides: ServiceOverrides = {},
): DriveBridgeServices {
  const { baseUrl, defaultDriveId, defaultUserId, ...credentials } = config.graph;

  const tokenProvider =
    overrides.tokenProvider ??
    new ClientCredentialsTokenProvider(credentials, {
      fetch: overrides.fetch,
      sleep: overrides.sleep,
      retryPolicy: config.retry,
    });
  const client = new RemoteClient(tokenProvider, {
    baseUrl,
    retryPolicy: config.retry,
    maxRetryAfterMs: config.retry.maxRetryAfterMs,
    fetch: overrides.fetch,
    sleep: overrides.sleep,
  });
  const drive = new DriveService(client, { driveId: defaultDriveId, userId: defaultUserId });
  const copyMonitor = new AsyncCopyMonitor(client, {
    policy: config.copyPolling,
    sleep: overrides.sleep,
  });
  const dispatcher = new ToolDispatcher(
    new ToolCatalog(createDriveTools()),
    { drive, copyMonitor },
    { bulk: config.bulk },
  );

  return { tokenProvider, client, drive, copyMonitor, dispatcher };
}
