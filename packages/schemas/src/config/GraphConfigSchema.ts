import { z } from 'zod';
import { ClientCredentialsConfigSchema } from '@drivebridge/auth';

export const GraphConfigSchema = ClientCredentialsConfigSchema.extend({
  baseUrl: z.string().url().default('https://graph.microsoft.com/v1.0'),
  /** Drive used when a tool names neither `drive_id` nor `user_id` */
  defaultDriveId: z.string().min(1).optional(),
  defaultUserId: z.string().min(1).optional(),
});

export type GraphConfigZod = z.infer<typeof GraphConfigSchema>;
