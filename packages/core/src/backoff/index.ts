/**
 * Explicit retry/backoff policy shared by every component that waits between
 * attempts (token requests, throttled remote calls, copy polling).
 * @public
 */
export interface BackoffPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Fraction of the delay applied as random jitter (0 disables it) */
  jitter?: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export const DEFAULT_BACKOFF_POLICY: Readonly<BackoffPolicy> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 30_000,
  jitter: 0,
});

/**
 * Delay before the retry that follows attempt number `attempt` (zero-based).
 *
 * `initialDelayMs * multiplier^attempt`, capped at `maxDelayMs`, then spread
 * by `±jitter`.
 * @public
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const baseDelay = Math.min(
    policy.initialDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt)),
    policy.maxDelayMs,
  );

  const jitterAmount = baseDelay * (policy.jitter ?? 0);
  const jitter = (random() - 0.5) * 2 * jitterAmount;

  return Math.max(0, Math.round(baseDelay + jitter));
}

/**
 * Suspends the calling task only; the event loop keeps running.
 * @public
 */
export const sleep: SleepFn = async (ms) => {
  if (ms <= 0) {
    return;
  }
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
};
