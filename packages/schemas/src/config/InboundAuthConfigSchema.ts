import { z } from 'zod';
import { ApiKeyAuthConfigSchema } from './ApiKeyAuthConfigSchema.js';
import { NoAuthConfigSchema } from './NoAuthConfigSchema.js';
import { OAuthBearerAuthConfigSchema } from './OAuthBearerAuthConfigSchema.js';

/**
 * Exactly one inbound scheme is active per deployment.
 */
export const InboundAuthConfigSchema = z.discriminatedUnion('type', [
  ApiKeyAuthConfigSchema,
  OAuthBearerAuthConfigSchema,
  NoAuthConfigSchema,
]);

export type InboundAuthConfigZod = z.infer<typeof InboundAuthConfigSchema>;
