/**
 * Retry coordinator.
 *
 * Wraps one remote call in the retry policy: retryable kinds are retried
 * with jittered exponential backoff until `maxAttempts`, everything else
 * fails on first occurrence. Every attempt is recorded; the history rides
 * along with the success value or with the terminal ClassifiedError.
 *
 * Suspension happens only inside the operation and inside the backoff
 * sleep, and both observe `signal`. An abort surfaces as the ClassifiedError
 * carried in `signal.reason` (Timeout for an invocation deadline), or as
 * Cancelled. Cancelled never carries a history.
 *
 * Always returns RetryOutcome<T> (never throws).
 */

import {
  createClassifiedError,
  isClassifiedError,
  withHistory,
  type ClassifiedError,
  type RetryAttemptRecord,
  type RetryHistory,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { classifyError } from './classifier.js';
import { computeRetryDelay, getProcessRetryPolicy, type RetryPolicy } from './policy.js';
import { sleep } from './sleep.js';

export interface RetryAttemptContext {
  /** 1-based */
  attempt: number;
  signal?: AbortSignal;
}

export interface RetryOptions {
  policy?: RetryPolicy;
  signal?: AbortSignal;
  /** Epoch ms after which no attempt or backoff sleep may start or end */
  deadline?: number;
  /** Name used in log events */
  operation?: string;
  traceId?: string;
  onRetry?: (params: { attempt: number; delayMs: number; error: ClassifiedError }) => void;
  /**
   * Narrows which retryable failures are retried, for calls that are not
   * safe to repeat once the remote side may have accepted them
   */
  retryIf?: (error: ClassifiedError) => boolean;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
}

export type RetryOutcome<T> =
  | { success: true; data: T; history: RetryHistory }
  | { success: false; error: ClassifiedError };

export async function withRetry<T>(
  operation: (context: RetryAttemptContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const policy = options.policy ?? getProcessRetryPolicy();
  const random = options.random ?? Math.random;
  const { signal, deadline } = options;
  const history: RetryAttemptRecord[] = [];

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return { success: false, error: abortedError(signal, history) };
    }
    if (deadline !== undefined && Date.now() >= deadline) {
      return {
        success: false,
        error: deadlineError(history, `Deadline reached before attempt ${attempt}`),
      };
    }

    const startedAt = Date.now();
    let error: ClassifiedError;
    try {
      const data = await operation({ attempt, signal });
      history.push({
        attemptNumber: attempt,
        startedAt,
        durationMs: Date.now() - startedAt,
        delayBeforeRetryMs: 0,
        error: null,
      });
      return { success: true, data, history: Object.freeze(history) };
    } catch (e: unknown) {
      if (signal?.aborted) {
        const aborted = abortedError(signal, history);
        if (aborted.kind !== 'Cancelled') {
          history.push({
            attemptNumber: attempt,
            startedAt,
            durationMs: Date.now() - startedAt,
            delayBeforeRetryMs: 0,
            error: aborted,
          });
          return { success: false, error: withHistory(aborted, history) };
        }
        return { success: false, error: aborted };
      }
      error = classifyError(e);
    }

    const durationMs = Date.now() - startedAt;

    if (error.kind === 'Cancelled') {
      return { success: false, error };
    }

    const retrying = error.retryable && (options.retryIf?.(error) ?? true);
    if (!retrying || attempt >= policy.maxAttempts) {
      history.push({ attemptNumber: attempt, startedAt, durationMs, delayBeforeRetryMs: 0, error });
      const terminal = withHistory(error, history);
      if (retrying) {
        logger.warn({
          event: 'retry.exhausted',
          operation: options.operation,
          attempts: attempt,
          errorKind: error.kind,
          error: error.message,
          traceId: options.traceId,
        });
      }
      return { success: false, error: terminal };
    }

    const delayMs = computeRetryDelay(policy, attempt, error, random);

    if (deadline !== undefined && Date.now() + delayMs > deadline) {
      history.push({ attemptNumber: attempt, startedAt, durationMs, delayBeforeRetryMs: 0, error });
      return {
        success: false,
        error: deadlineError(
          history,
          `Deadline would pass during the ${Math.round(delayMs)}ms backoff after attempt ${attempt}: ${error.message}`,
          error
        ),
      };
    }

    history.push({ attemptNumber: attempt, startedAt, durationMs, delayBeforeRetryMs: delayMs, error });

    logger.info({
      event: 'retry.attempt.failed',
      operation: options.operation,
      attempt,
      maxAttempts: policy.maxAttempts,
      delayMs: Math.round(delayMs),
      errorKind: error.kind,
      error: error.message,
      traceId: options.traceId,
    });
    options.onRetry?.({ attempt, delayMs, error });

    try {
      await sleep(delayMs, signal);
    } catch {
      // sleep only rejects when the signal aborts
      return { success: false, error: abortedError(signal, history) };
    }
  }
}

function abortedError(signal: AbortSignal | undefined, history: RetryHistory): ClassifiedError {
  const reason: unknown = signal?.reason;
  if (isClassifiedError(reason) && reason.kind !== 'Cancelled') {
    return withHistory(reason, history);
  }
  if (isClassifiedError(reason)) return reason;
  return createClassifiedError('Cancelled', 'The operation was cancelled', { cause: reason });
}

function deadlineError(
  history: RetryHistory,
  message: string,
  cause?: ClassifiedError
): ClassifiedError {
  return withHistory(createClassifiedError('Timeout', message, { cause }), history);
}
