/**
 * Shared-key authentication: the key arrives in a header (default
 * `X-API-Key`) or, when enabled, in a query parameter of the same name.
 *
 * Keys are compared with crypto.timingSafeEqual and never logged.
 * @example
 * ```typescript
 * const validator = new ApiKeyValidator({
 *   type: 'api-key',
 *   keys: ['test-secret'],
 *   header: 'X-API-Key',
 *   allowQueryParam: false,
 * });
 * ```
 * @public
 */

import { timingSafeEqual } from 'node:crypto';
import type { Context } from 'hono';
import { logEvent } from '@drivebridge/core';
import type {
  ApiKeyAuthConfig,
  AuthResult,
  IInboundAuthValidator,
} from '../interfaces/inbound-auth.interface.js';

export class ApiKeyValidator implements IInboundAuthValidator {
  private readonly validKeys: Buffer[];
  private readonly header: string;
  private readonly allowQueryParam: boolean;

  public constructor(config: ApiKeyAuthConfig) {
    const keys = config.keys.map((key) => key.trim()).filter((key) => key.length > 0);
    if (keys.length === 0) {
      throw new Error('API key configuration must include at least one non-empty key');
    }
    this.validKeys = keys.map((key) => Buffer.from(key));
    this.header = config.header;
    this.allowQueryParam = config.allowQueryParam;

    logEvent('info', 'auth:validator_initialized', {
      scheme: 'api-key',
      keyCount: keys.length,
      header: this.header,
      allowQueryParam: this.allowQueryParam,
    });
  }

  public async validateRequest(context: Context): Promise<AuthResult> {
    const fromHeader = context.req.header(this.header);
    const fromQuery = this.allowQueryParam ? context.req.query(this.header) : undefined;

    if (fromHeader !== undefined && context.req.header('Authorization') !== undefined) {
      return {
        isAuthenticated: false,
        error: `Send either ${this.header} or Authorization, not both`,
      };
    }

    const provided = fromHeader ?? fromQuery;
    if (provided === undefined || provided.trim().length === 0) {
      return { isAuthenticated: false, error: `Missing ${this.header}` };
    }

    if (!this.isValidKey(provided.trim())) {
      return { isAuthenticated: false, error: 'Invalid API key' };
    }
    return { isAuthenticated: true, context: { scheme: 'api-key' } };
  }

  public getType(): 'api-key' {
    return 'api-key';
  }

  public getChallenge(): string {
    return `ApiKey realm="drivebridge", header="${this.header}"`;
  }

  /**
   * Constant-time comparison against every configured key.
   */
  private isValidKey(key: string): boolean {
    const candidate = Buffer.from(key);
    let matched = false;
    for (const valid of this.validKeys) {
      // length check is not timing-sensitive
      if (valid.length === candidate.length && timingSafeEqual(valid, candidate)) {
        matched = true;
      }
    }
    return matched;
  }
}
