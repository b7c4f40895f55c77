import { z } from 'zod';

const positiveInt = z.number().int().positive();

export const RetryPolicySchema = z.object({
  maxAttempts: positiveInt.default(3),
  initialDelayMs: positiveInt.default(500),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: positiveInt.default(30_000),
  /** Longest Retry-After hint worth waiting for; longer hints fail the call */
  maxRetryAfterMs: positiveInt.default(120_000),
});

export const CopyPollingPolicySchema = z.object({
  maxAttempts: positiveInt.default(30),
  initialDelayMs: positiveInt.default(1000),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: positiveInt.default(30_000),
  maxDurationMs: positiveInt.default(10 * 60 * 1000),
});

export const BulkPolicySchema = z.object({
  concurrency: positiveInt.max(32).default(4),
  maxItems: positiveInt.default(200),
});

export type RetryPolicyZod = z.infer<typeof RetryPolicySchema>;
export type CopyPollingPolicyZod = z.infer<typeof CopyPollingPolicySchema>;
export type BulkPolicyZod = z.infer<typeof BulkPolicySchema>;
