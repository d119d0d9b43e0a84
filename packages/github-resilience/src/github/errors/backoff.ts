import { AnalysisResult } from './github-error.types';
import { RetryPolicy } from './retry-policy';

const JITTER_SPREAD = 0.1;

/**
 * Exponential delay before retry number `attempt`, capped at maxDelayMs
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = policy.baseDelayMs * Math.pow(policy.exponentialBase, exponent);
  return Math.min(policy.maxDelayMs, delay);
}

/**
 * Scale a delay by a factor drawn uniformly from [0.9, 1.1]
 */
export function applyJitter(delayMs: number, random: () => number): number {
  const factor = 1 - JITTER_SPREAD + 2 * JITTER_SPREAD * random();
  return delayMs * factor;
}

/**
 * Delay to wait after a failed attempt. When the policy respects rate
 * limits, a server-requested delay raises the base before jitter and stays
 * a floor after it.
 */
export function resolveRetryDelay(
  policy: RetryPolicy,
  attempt: number,
  analysis: AnalysisResult,
  random: () => number,
): number {
  const serverDelayMs = policy.respectRateLimits ? analysis.retry_delay_ms : undefined;
  let delay = computeBackoffDelay(policy, attempt);

  if (serverDelayMs !== undefined) {
    delay = Math.max(delay, serverDelayMs);
  }

  if (policy.jitter) {
    delay = applyJitter(delay, random);
  }

  if (serverDelayMs !== undefined) {
    delay = Math.max(delay, serverDelayMs);
  }

  return Math.round(delay);
}
