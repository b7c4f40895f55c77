import type { ITokenProvider } from '@drivebridge/auth';
import {
  type BackoffPolicy,
  computeBackoffDelay,
  DEFAULT_BACKOFF_POLICY,
  generateRequestId,
  logEvent,
  sleep,
  type SleepFn,
} from '@drivebridge/core';
import { isRetryableStatus, RemoteError } from '../errors/remote-error.js';
import { parseRemoteError } from '../errors/parse-remote-error.js';
import { parseRetryAfter } from './retry-after.js';

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';

export const DEFAULT_MAX_RETRY_AFTER_MS = 120_000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ResponseType = 'json' | 'text' | 'binary' | 'none';

export type QueryValue = string | number | boolean | undefined;

export interface RemoteCallOptions {
  /** Objects are sent as JSON; strings and bytes are sent as-is */
  body?: unknown;
  contentType?: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  responseType?: ResponseType;
  /** Attach the application credential (default true) */
  authenticate?: boolean;
  /** When false, 3xx responses are returned instead of followed */
  followRedirects?: boolean;
}

export interface RemoteResponse {
  status: number;
  headers: Headers;
  /** Decoded per `responseType`; `undefined` for empty bodies */
  data: unknown;
  requestId: string;
}

export interface RemoteClientOptions {
  baseUrl?: string;
  retryPolicy?: BackoffPolicy;
  /** Retry-After hints above this fail the call instead of being waited out */
  maxRetryAfterMs?: number;
  fetch?: typeof fetch;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * The only component that talks HTTP to the remote API.
 *
 * Attaches the application credential and a `client-request-id`, retries
 * 429/503 with backoff (never sooner than a `Retry-After` hint), retries a
 * 401 once with a fresh credential and turns every other non-2xx into a
 * {@link RemoteError}.
 *
 * @example
 * ```typescript
 * const client = new RemoteClient(tokenProvider);
 * const { data } = await client.call('GET', '/drives/b!abc/root/children');
 * ```
 */
export class RemoteClient {
  private readonly baseUrl: string;
  private readonly retryPolicy: BackoffPolicy;
  private readonly maxRetryAfterMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  public constructor(
    private readonly tokenProvider: ITokenProvider,
    options: RemoteClientOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, '');
    this.retryPolicy = options.retryPolicy ?? DEFAULT_BACKOFF_POLICY;
    this.maxRetryAfterMs = options.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Issues one logical call, retrying throttled attempts.
   * @param path - Path relative to the base URL, or an absolute URL used verbatim
   * @throws {RemoteError} On any non-2xx outcome once retries are exhausted
   * @throws {AuthenticationError} When no credential can be obtained
   */
  public async call(
    method: HttpMethod,
    path: string,
    options: RemoteCallOptions = {},
  ): Promise<RemoteResponse> {
    const url = this.resolveUrl(path, options.query);
    const requestId = generateRequestId();
    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts);

    let credentialRefreshed = false;

    for (let attempt = 1; ; attempt++) {
      const response = await this.send(method, url, options, requestId);

      if (this.isSuccess(response, options)) {
        logEvent('debug', 'remote:response', {
          requestId,
          method,
          status: response.status,
          attempt,
        });
        return {
          status: response.status,
          headers: response.headers,
          data: await this.decode(response, options.responseType ?? 'json', requestId),
          requestId,
        };
      }

      const retryAfterMs = parseRetryAfter(
        response.headers.get('retry-after'),
        this.now(),
      );

      if (
        isRetryableStatus(response.status) &&
        attempt < maxAttempts &&
        (retryAfterMs === undefined || retryAfterMs <= this.maxRetryAfterMs)
      ) {
        const delayMs = retryAfterMs ?? computeBackoffDelay(this.retryPolicy, attempt - 1);
        logEvent('warn', 'remote:retry', {
          requestId,
          method,
          status: response.status,
          attempt,
          nextAttemptDelayMs: delayMs,
        });
        await response.arrayBuffer();
        await this.sleep(delayMs);
        continue;
      }

      if (response.status === 401 && options.authenticate !== false) {
        // Revoked or rotated credential: drop it, then retry once with a new one
        this.tokenProvider.invalidate();
        if (!credentialRefreshed) {
          credentialRefreshed = true;
          logEvent('warn', 'remote:credential_refresh', { requestId, method, attempt });
          await response.arrayBuffer();
          continue;
        }
      }

      const error = await parseRemoteError(response, requestId, retryAfterMs);
      logEvent('debug', 'remote:error', {
        requestId,
        method,
        status: error.httpStatus,
        code: error.code,
      });
      throw error;
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    options: RemoteCallOptions,
    requestId: string,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'client-request-id': requestId,
      ...options.headers,
    };

    if (options.authenticate !== false) {
      Object.assign(headers, await this.tokenProvider.getHeaders());
    }

    const body = this.encodeBody(options, headers);

    try {
      return await this.fetchFn(url, {
        method,
        headers,
        body,
        redirect: options.followRedirects === false ? 'manual' : 'follow',
      });
    } catch (error) {
      throw RemoteError.networkError(
        error instanceof Error ? error.message : String(error),
        requestId,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private encodeBody(
    options: RemoteCallOptions,
    headers: Record<string, string>,
  ): string | Uint8Array | undefined {
    const { body } = options;
    if (body === undefined) {
      return undefined;
    }
    if (typeof body === 'string') {
      headers['Content-Type'] = options.contentType ?? 'text/plain';
      return body;
    }
    if (body instanceof Uint8Array) {
      headers['Content-Type'] = options.contentType ?? 'application/octet-stream';
      return body;
    }
    headers['Content-Type'] = options.contentType ?? 'application/json';
    return JSON.stringify(body);
  }

  private isSuccess(response: Response, options: RemoteCallOptions): boolean {
    if (response.ok) {
      return true;
    }
    return (
      options.followRedirects === false &&
      response.status >= 300 &&
      response.status < 400
    );
  }

  private async decode(
    response: Response,
    responseType: ResponseType,
    requestId: string,
  ): Promise<unknown> {
    switch (responseType) {
      case 'none':
        await response.arrayBuffer();
        return undefined;
      case 'binary':
        return new Uint8Array(await response.arrayBuffer());
      case 'text':
        return response.text();
      case 'json': {
        const text = await response.text();
        if (text.trim() === '') {
          return undefined;
        }
        try {
          return JSON.parse(text);
        } catch {
          throw RemoteError.invalidResponse(
            'body is not valid JSON',
            response.status,
            requestId,
          );
        }
      }
      default: {
        const unknownType: never = responseType;
        throw new Error(`Unsupported response type: ${String(unknownType)}`);
      }
    }
  }

  private resolveUrl(path: string, query?: Record<string, QueryValue>): string {
    const isAbsolute = /^https?:\/\//i.test(path);
    // Monitor handles and download URLs are opaque: forwarded untouched
    if (isAbsolute && !query) {
      return path;
    }

    const url = new URL(isAbsolute ? path : `${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }
}
