import type { RetryPolicy } from '@offerscope/shared';

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 30000,
};

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fixed-delay policy: every rate-limited attempt waits the same `delayMs`.
 * At least one attempt is always made.
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const maxAttempts = Math.max(1, Math.floor(overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts));
  const delayMs = Math.max(0, overrides.delayMs ?? DEFAULT_RETRY_POLICY.delayMs);
  return { maxAttempts, delayMs };
}
