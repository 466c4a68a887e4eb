import type { RetryConfig } from '../../shared/config/Config';

export type RetryPolicy = RetryConfig;

/**
 * Delay before retry number `attempt` (1 = first retry).
 *
 * Exponential from `initialMs`, capped at `maxMs`; jitter adds up to 20%.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const base = Math.min(policy.maxMs, policy.initialMs * Math.pow(policy.factor, attempt - 1));
  if (!policy.jitter) return base;
  return Math.round(base + base * 0.2 * random());
}
