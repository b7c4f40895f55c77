export * from './errors/remote-error.js';
export { OperationTimeoutError } from './errors/operation-timeout-error.js';
export { parseRemoteError } from './errors/parse-remote-error.js';

export * from './client/remote-client.js';
export { parseRetryAfter } from './client/retry-after.js';

export * from './copy/copy-operation.js';
export {
  AsyncCopyMonitor,
  type AsyncCopyMonitorOptions,
} from './copy/async-copy-monitor.js';

export * from './drive/drive-item.js';
export * from './drive/drive-service.js';
