/**
 * Configuration schema for the application-identity token provider.
 *
 * @example
 * ```typescript
 * const config = ClientCredentialsConfigSchema.parse({
 *   tenantId: 'contoso.onmicrosoft.com',
 *   clientId: '00000000-0000-0000-0000-000000000000',
 *   clientSecret: 'test-secret',
 * });
 * // config.scope === 'https://graph.microsoft.com/.default'
 * ```
 *
 * @public
 */

import { z } from 'zod';

export const DEFAULT_GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';
export const DEFAULT_TOKEN_SAFETY_MARGIN_MS = 2 * 60 * 1000;

export const ClientCredentialsConfigSchema = z.object({
  tenantId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  scope: z.string().min(1).default(DEFAULT_GRAPH_SCOPE),
  authorityHost: z.string().url().default(DEFAULT_AUTHORITY_HOST),
  /** Credentials this close to expiry are treated as expired */
  tokenSafetyMarginMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TOKEN_SAFETY_MARGIN_MS),
});

export type ClientCredentialsConfig = z.infer<typeof ClientCredentialsConfigSchema>;
export type ClientCredentialsConfigInput = z.input<typeof ClientCredentialsConfigSchema>;

/**
 * Token endpoint of the tenant: `{authorityHost}/{tenantId}/oauth2/v2.0/token`.
 * @public
 */
export function tokenEndpointFor(
  config: Pick<ClientCredentialsConfig, 'authorityHost' | 'tenantId'>,
): string {
  const host = config.authorityHost.replace(/\/+$/, '');
  return `${host}/${encodeURIComponent(config.tenantId)}/oauth2/v2.0/token`;
}
