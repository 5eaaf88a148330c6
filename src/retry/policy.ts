/**
 * Retry policy and backoff arithmetic.
 *
 * delay(k) = min(maxDelay, initialDelay * backoffMultiplier^(k-1)), then
 * scaled by a uniform factor in [1 - jitterFraction, 1 + jitterFraction]
 * and clamped to >= 0. A server Retry-After hint raises the delay to at
 * least the hint, even past maxDelay.
 */

import { config } from '../config/environment.js';
import type { ClassifiedError } from '../utils/errors.js';

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  readonly jitterFraction: number;
}

export type RetryPolicyOverrides = {
  [K in keyof RetryPolicy]?: RetryPolicy[K] | undefined;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 4,
  initialDelayMs: 1_000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterFraction: 0.2,
});

/**
 * Build a frozen policy from the defaults plus overrides.
 *
 * @throws Error when the resulting policy is out of range
 */
export function createRetryPolicy(overrides: RetryPolicyOverrides = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    initialDelayMs: overrides.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    backoffMultiplier: overrides.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier,
    jitterFraction: overrides.jitterFraction ?? DEFAULT_RETRY_POLICY.jitterFraction,
  };

  const problems: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    problems.push(`maxAttempts must be an integer >= 1 (got ${policy.maxAttempts})`);
  }
  if (!(policy.initialDelayMs >= 0)) {
    problems.push(`initialDelayMs must be >= 0 (got ${policy.initialDelayMs})`);
  }
  if (!(policy.maxDelayMs >= policy.initialDelayMs)) {
    problems.push(`maxDelayMs must be >= initialDelayMs (got ${policy.maxDelayMs})`);
  }
  if (!(policy.backoffMultiplier > 1)) {
    problems.push(`backoffMultiplier must be > 1 (got ${policy.backoffMultiplier})`);
  }
  if (!(policy.jitterFraction >= 0 && policy.jitterFraction <= 1)) {
    problems.push(`jitterFraction must be within [0, 1] (got ${policy.jitterFraction})`);
  }
  if (problems.length > 0) {
    throw new Error(`Invalid retry policy: ${problems.join('; ')}`);
  }

  return Object.freeze(policy);
}

let processPolicy: RetryPolicy | null = null;

/**
 * The process-wide policy, built once from configuration on first use.
 */
export function getProcessRetryPolicy(): RetryPolicy {
  if (!processPolicy) {
    processPolicy = createRetryPolicy(config.retry);
  }
  return processPolicy;
}

/**
 * Backoff before attempt `attemptNumber + 1`, without jitter.
 */
export function computeBackoffDelay(policy: RetryPolicy, attemptNumber: number): number {
  const exponential = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attemptNumber - 1);
  return Math.min(policy.maxDelayMs, exponential);
}

/**
 * Scale `delayMs` by a factor drawn uniformly from [1 - fraction, 1 + fraction].
 *
 * `random` returns values in [0, 1), like Math.random.
 */
export function applyJitter(delayMs: number, jitterFraction: number, random: () => number): number {
  const offset = (random() * 2 - 1) * jitterFraction;
  return Math.max(0, delayMs * (1 + offset));
}

/**
 * The delay actually slept after a failed attempt.
 */
export function computeRetryDelay(
  policy: RetryPolicy,
  attemptNumber: number,
  error: Pick<ClassifiedError, 'retryAfterMs'>,
  random: () => number = Math.random
): number {
  const jittered = applyJitter(
    computeBackoffDelay(policy, attemptNumber),
    policy.jitterFraction,
    random
  );
  if (error.retryAfterMs !== undefined) {
    return Math.max(jittered, error.retryAfterMs);
  }
  return jittered;
}
