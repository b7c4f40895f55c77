import { z } from 'zod';

export const ApiKeyAuthConfigSchema = z.object({
  type: z.literal('api-key'),
  /** Accepted keys; several allow rotation without downtime */
  keys: z.array(z.string().min(1)).min(1),
  header: z.string().min(1).default('X-API-Key'),
  /** Also accept the key as a query parameter named like the header */
  allowQueryParam: z.boolean().default(false),
});

export type ApiKeyAuthConfigZod = z.infer<typeof ApiKeyAuthConfigSchema>;
