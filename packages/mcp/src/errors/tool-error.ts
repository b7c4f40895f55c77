export type ToolErrorKind =
  | 'validation'
  | 'auth'
  | 'remote'
  | 'unavailable'
  | 'timeout'
  | 'internal';

/**
 * Wire shape of a tool failure.
 */
export interface ToolErrorPayload {
  kind: ToolErrorKind;
  code: string;
  message: string;
  httpStatus?: number;
  details?: Record<string, unknown>;
}

export interface ToolErrorInit extends ToolErrorPayload {
  cause?: Error;
}

/**
 * Classified failure of a tool invocation. The kind tells a caller whether
 * the input was wrong, the remote API refused, or it was unavailable.
 */
export class ToolError extends Error {
  public readonly kind: ToolErrorKind;
  public readonly code: string;
  public readonly httpStatus?: number;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: Error;

  public constructor(init: ToolErrorInit) {
    super(init.message);
    this.name = 'ToolError';
    this.kind = init.kind;
    this.code = init.code;
    this.httpStatus = init.httpStatus;
    this.details = init.details;
    this.cause = init.cause;

    Object.setPrototypeOf(this, ToolError.prototype);
  }

  public toJSON(): ToolErrorPayload {
    const payload: ToolErrorPayload = {
      kind: this.kind,
      code: this.code,
      message: this.message,
    };
    if (this.httpStatus !== undefined) {
      payload.httpStatus = this.httpStatus;
    }
    if (this.details !== undefined) {
      payload.details = this.details;
    }
    return payload;
  }
}

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Unknown tool or parameters that violate the tool's parameter table.
 * Raised before any remote call.
 */
export class ValidationError extends ToolError {
  public readonly issues: ValidationIssue[];

  public constructor(code: string, message: string, issues: ValidationIssue[] = []) {
    super({
      kind: 'validation',
      code,
      message,
      details: issues.length > 0 ? { issues } : undefined,
    });
    this.name = 'ValidationError';
    this.issues = issues;

    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  public static unknownTool(name: string): ValidationError {
    return new ValidationError('unknownTool', `Unknown tool: ${name}`, [
      { path: [], message: `No tool named '${name}'` },
    ]);
  }

  public static invalidParams(issues: ValidationIssue[]): ValidationError {
    const summary = issues
      .map((issue) =>
        issue.path.length > 0 && !issue.message.startsWith('Missing required parameter')
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    return new ValidationError('invalidParams', `Invalid parameters: ${summary}`, issues);
  }
}
