import { randomUUID } from 'node:crypto';

/**
 * Generates a correlation id for the `client-request-id` header.
 *
 * The remote API echoes this value in its diagnostics, so it must be a GUID.
 * @public
 */
export function generateRequestId(): string {
  return randomUUID();
}

