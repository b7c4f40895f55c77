import { z } from 'zod';
import { GraphConfigSchema } from './GraphConfigSchema.js';
import { InboundAuthConfigSchema } from './InboundAuthConfigSchema.js';
import {
  BulkPolicySchema,
  CopyPollingPolicySchema,
  RetryPolicySchema,
} from './PolicySchemas.js';

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8000),
      host: z.string().min(1).default('0.0.0.0'),
      corsOrigins: z.array(z.string()).default(['*']),
    })
    .default({}),
  inboundAuth: InboundAuthConfigSchema,
  graph: GraphConfigSchema,
  retry: RetryPolicySchema.default({}),
  copyPolling: CopyPollingPolicySchema.default({}),
  bulk: BulkPolicySchema.default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
