import { AuthenticationError } from '@drivebridge/auth';
import { OperationTimeoutError, RemoteError } from '@drivebridge/graph';
import { ToolError } from './tool-error.js';

/**
 * Classifies anything a handler threw. ToolErrors pass through unchanged.
 */
export function toToolError(error: unknown): ToolError {
  if (error instanceof ToolError) {
    return error;
  }

  if (error instanceof RemoteError) {
    return new ToolError({
      kind: error.isUnavailable ? 'unavailable' : 'remote',
      code: error.code,
      message: error.message,
      httpStatus: error.httpStatus,
      details: {
        ...error.details,
        ...(error.requestId ? { requestId: error.requestId } : {}),
        ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
      },
      cause: error,
    });
  }

  if (error instanceof AuthenticationError) {
    return new ToolError({
      kind: 'auth',
      code: error.code,
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof OperationTimeoutError) {
    return new ToolError({
      kind: 'timeout',
      code: error.code,
      message: error.message,
      details: error.details,
      cause: error,
    });
  }

  return new ToolError({
    kind: 'internal',
    code: 'internalError',
    message: error instanceof Error ? error.message : String(error),
    cause: error instanceof Error ? error : undefined,
  });
}
