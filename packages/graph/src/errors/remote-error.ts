/**
 * Codes synthesized locally when the remote API gave none.
 * Remote codes (`itemNotFound`, `accessDenied`, …) pass through unchanged.
 */
export enum RemoteErrorCode {
  TRANSPORT_ERROR = 'transportError',
  NETWORK_ERROR = 'networkError',
  INVALID_RESPONSE = 'invalidResponse',
  MISSING_MONITOR_HANDLE = 'missingMonitorHandle',
}

export interface RemoteErrorInit {
  code: string;
  httpStatus: number;
  message: string;
  requestId?: string;
  retryAfterMs?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * A call to the remote API that ended in a non-2xx status, a network
 * failure, or a response the client could not use.
 */
export class RemoteError extends Error {
  public readonly code: string;
  public readonly httpStatus: number;
  public readonly requestId?: string;
  public readonly retryAfterMs?: number;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: Error;

  public constructor(init: RemoteErrorInit) {
    super(init.message);
    this.name = 'RemoteError';
    this.code = init.code;
    this.httpStatus = init.httpStatus;
    this.requestId = init.requestId;
    this.retryAfterMs = init.retryAfterMs;
    this.details = init.details;
    this.cause = init.cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, RemoteError.prototype);
  }

  /**
   * Throttling, outages and network failures: the request may succeed later.
   */
  public get isUnavailable(): boolean {
    return this.httpStatus === 0 || this.httpStatus === 429 || this.httpStatus >= 500;
  }

  /**
   * Same failure with extra context merged into `details`.
   */
  public withDetails(details: Record<string, unknown>): RemoteError {
    return new RemoteError({
      code: this.code,
      httpStatus: this.httpStatus,
      message: this.message,
      requestId: this.requestId,
      retryAfterMs: this.retryAfterMs,
      details: { ...this.details, ...details },
      cause: this.cause,
    });
  }

  public static networkError(
    message: string,
    requestId: string,
    cause?: Error,
  ): RemoteError {
    return new RemoteError({
      code: RemoteErrorCode.NETWORK_ERROR,
      httpStatus: 0,
      message: `Network error: ${message}`,
      requestId,
      cause,
    });
  }

  public static transportError(
    httpStatus: number,
    statusText: string,
    requestId: string,
    retryAfterMs?: number,
  ): RemoteError {
    return new RemoteError({
      code: RemoteErrorCode.TRANSPORT_ERROR,
      httpStatus,
      message: statusText ? `HTTP ${httpStatus}: ${statusText}` : `HTTP ${httpStatus}`,
      requestId,
      retryAfterMs,
    });
  }

  public static invalidResponse(
    message: string,
    httpStatus: number,
    requestId?: string,
  ): RemoteError {
    return new RemoteError({
      code: RemoteErrorCode.INVALID_RESPONSE,
      httpStatus,
      message: `Invalid response: ${message}`,
      requestId,
    });
  }

  public static missingMonitorHandle(
    httpStatus: number,
    requestId: string,
  ): RemoteError {
    return new RemoteError({
      code: RemoteErrorCode.MISSING_MONITOR_HANDLE,
      httpStatus,
      message: 'Copy request was accepted without a monitor handle (Location header)',
      requestId,
    });
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      httpStatus: this.httpStatus,
      requestId: this.requestId,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
    };
  }
}

/**
 * Only throttling (429) and temporary unavailability (503) are retried.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 503;
}
