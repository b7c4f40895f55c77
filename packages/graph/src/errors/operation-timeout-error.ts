/**
 * A long-running remote operation did not reach a terminal state within its
 * polling budget. The monitor handle stays valid, so callers may re-poll.
 */
export class OperationTimeoutError extends Error {
  public readonly code = 'operationTimedOut';

  public constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'OperationTimeoutError';
    Object.setPrototypeOf(this, OperationTimeoutError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}
