import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ToolErrorKind } from '@drivebridge/mcp';

/**
 * HTTP status of the REST surface per tool error kind. Credential problems
 * on the outbound side are the gateway's, not the caller's, hence 502.
 */
export function statusForKind(kind: ToolErrorKind): ContentfulStatusCode {
  switch (kind) {
    case 'validation':
      return 400;
    case 'auth':
    case 'remote':
      return 502;
    case 'unavailable':
      return 503;
    case 'timeout':
      return 504;
    case 'internal':
      return 500;
  }
}
