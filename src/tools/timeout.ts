/**
 * Invocation deadline and cancellation.
 *
 * One AbortController per tool call. It aborts with a ClassifiedError reason
 * (Timeout when the deadline passes, Cancelled when the caller cancels) so
 * the retry coordinator can surface the right kind.
 */

import { createClassifiedError, isClassifiedError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';

export interface InvocationScope {
  signal: AbortSignal;
  /** Epoch ms */
  deadline: number;
  /** Clear the deadline timer and detach from the parent signal */
  dispose: () => void;
}

export function createInvocationScope(params: {
  timeoutMs: number;
  parentSignal?: AbortSignal;
}): InvocationScope {
  const { timeoutMs, parentSignal } = params;
  const controller = new AbortController();
  const deadline = Date.now() + timeoutMs;

  const timeoutId = setTimeout(() => {
    controller.abort(
      createClassifiedError('Timeout', `Invocation deadline of ${timeoutMs}ms reached`)
    );
  }, timeoutMs);

  const onParentAbort = (): void => {
    controller.abort(createClassifiedError('Cancelled', 'The invocation was cancelled by the caller'));
  };
  if (parentSignal?.aborted) onParentAbort();
  else parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  return {
    signal: controller.signal,
    deadline,
    dispose: () => {
      clearTimeout(timeoutId);
      parentSignal?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with the handler's result, or with the abort reason as soon as the
 * signal aborts, whichever comes first.
 */
export async function raceAbort<T>(
  promise: Promise<Result<T>>,
  signal: AbortSignal
): Promise<Result<T>> {
  let resolveAbort: (result: Result<T>) => void = () => {};
  const abortPromise = new Promise<Result<T>>((resolve) => {
    resolveAbort = resolve;
  });

  const onAbort = (): void => {
    const reason: unknown = signal.reason;
    resolveAbort({
      success: false,
      error: isClassifiedError(reason)
        ? reason
        : createClassifiedError('Cancelled', 'The invocation was cancelled', { cause: reason }),
    });
  };
  if (signal.aborted) onAbort();
  else signal.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([promise, abortPromise]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}
