import { z } from 'zod';

export const AudienceMismatchPolicySchema = z.enum(['reject', 'warn']);

export type AudienceMismatchPolicy = z.infer<typeof AudienceMismatchPolicySchema>;

export const OAuthBearerAuthConfigSchema = z.object({
  type: z.literal('oauth-bearer'),
  tenantId: z.string().min(1),
  /** Expected `aud` values, e.g. `api://<app-id>` and the bare app id */
  audiences: z.array(z.string().min(1)).min(1),
  /** Overrides the tenant's v2.0 and v1 issuers */
  issuers: z.array(z.string().url()).optional(),
  /** Overrides the tenant's published key set */
  jwksUri: z.string().url().optional(),
  /** `warn` logs a mismatching audience and accepts the token */
  audienceMismatch: AudienceMismatchPolicySchema.default('reject'),
  clockToleranceSec: z.number().int().nonnegative().default(60),
});

export type OAuthBearerAuthConfigZod = z.infer<typeof OAuthBearerAuthConfigSchema>;
