import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createClassifiedError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';
import { createInvocationScope, raceAbort } from './timeout.js';

describe('createInvocationScope', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts with Timeout at the deadline', async () => {
    const scope = createInvocationScope({ timeoutMs: 5000 });

    expect(scope.deadline).toBe(Date.parse('2026-01-01T00:00:05Z'));
    await vi.advanceTimersByTimeAsync(4999);
    expect(scope.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(scope.signal.aborted).toBe(true);
    expect(scope.signal.reason).toMatchObject({ kind: 'Timeout' });
  });

  it('aborts with Cancelled when the parent signal aborts', () => {
    const parent = new AbortController();
    const scope = createInvocationScope({ timeoutMs: 5000, parentSignal: parent.signal });

    parent.abort();

    expect(scope.signal.reason).toMatchObject({ kind: 'Cancelled' });
    scope.dispose();
  });

  it('starts aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort();

    expect(createInvocationScope({ timeoutMs: 5000, parentSignal: parent.signal }).signal.aborted).toBe(true);
  });

  it('stops the deadline timer on dispose', async () => {
    const scope = createInvocationScope({ timeoutMs: 5000 });
    scope.dispose();

    await vi.advanceTimersByTimeAsync(10_000);
    expect(scope.signal.aborted).toBe(false);
  });
});

describe('raceAbort', () => {
  it('returns the result when it settles first', async () => {
    const controller = new AbortController();

    await expect(raceAbort(Promise.resolve<Result<number>>({ success: true, data: 1 }), controller.signal)).resolves.toEqual({
      success: true,
      data: 1,
    });
  });

  it('returns the ClassifiedError abort reason without waiting for the work', async () => {
    const controller = new AbortController();
    const never = new Promise<Result<number>>(() => {});

    const pending = raceAbort(never, controller.signal);
    controller.abort(createClassifiedError('Timeout', 'late'));

    await expect(pending).resolves.toMatchObject({ success: false, error: { kind: 'Timeout' } });
  });

  it('maps other abort reasons to Cancelled', async () => {
    const controller = new AbortController();
    controller.abort('gone');

    const result = await raceAbort(new Promise<Result<number>>(() => {}), controller.signal);

    expect(result).toMatchObject({ success: false, error: { kind: 'Cancelled', cause: 'gone' } });
  });
});
