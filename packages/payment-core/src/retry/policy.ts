/**
 * Retry Policy
 */

import { ConfigError } from '../errors/errors.js';

export interface RetryPolicy {
  max_attempts: number;
  initial_delay_ms: number;
  max_delay_ms: number;
  backoff_multiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 3,
  initial_delay_ms: 500,
  max_delay_ms: 30_000,
  backoff_multiplier: 2.0,
  jitter: true,
};

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(policy.max_attempts) || policy.max_attempts < 1) {
    throw new ConfigError(`max_attempts must be a positive integer, got ${policy.max_attempts}`);
  }
  if (policy.initial_delay_ms < 0 || policy.max_delay_ms < policy.initial_delay_ms) {
    throw new ConfigError('Retry delays must satisfy 0 <= initial_delay_ms <= max_delay_ms');
  }
  if (policy.backoff_multiplier < 1) {
    throw new ConfigError('backoff_multiplier must be >= 1');
  }
  return policy;
}

/**
 * Delay before retry number `attempt` (1-based): exponential, capped,
 * with ±25% jitter.
 */
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const { initial_delay_ms, max_delay_ms, backoff_multiplier, jitter } = policy;

  let delay = initial_delay_ms * Math.pow(backoff_multiplier, attempt - 1);
  delay = Math.min(delay, max_delay_ms);

  if (jitter) {
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + (random() * jitterRange * 2);
  }

  return Math.floor(delay);
}
