import { z } from 'zod';
import { RemoteError } from './remote-error.js';

const GraphErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string().default(''),
    innerError: z
      .object({
        'request-id': z.string().optional(),
        'client-request-id': z.string().optional(),
        date: z.string().optional(),
      })
      .passthrough()
      .optional(),
  }),
});

/**
 * Builds a RemoteError from a failed response.
 *
 * `{ error: { code, message } }` bodies keep the remote code and message;
 * anything else becomes a `transportError` named after the status.
 */
export async function parseRemoteError(
  response: Response,
  clientRequestId: string,
  retryAfterMs?: number,
): Promise<RemoteError> {
  const text = await response.text();
  const requestId = response.headers.get('request-id') ?? clientRequestId;

  let body: unknown;
  try {
    body = text ? JSON.parse(text) : undefined;
  } catch {
    body = undefined;
  }

  const parsed = GraphErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return RemoteError.transportError(
      response.status,
      response.statusText,
      requestId,
      retryAfterMs,
    );
  }

  const { code, message, innerError } = parsed.data.error;
  return new RemoteError({
    code,
    httpStatus: response.status,
    message: message || `HTTP ${response.status}`,
    requestId: innerError?.['request-id'] ?? requestId,
    retryAfterMs,
    details: innerError?.date ? { date: innerError.date } : undefined,
  });
}
