import { z } from 'zod';

/**
 * Inbound authentication disabled. Only honoured in development, see
 * `DRIVEBRIDGE_DISABLE_INBOUND_AUTH`.
 */
export const NoAuthConfigSchema = z.object({
  type: z.literal('none'),
});

export type NoAuthConfigZod = z.infer<typeof NoAuthConfigSchema>;
