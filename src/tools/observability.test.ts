import { describe, it, expect, vi } from 'vitest';

vi.mock('../observability/langfuse.js', () => {
  return {
    getLangfuse: vi.fn(),
  };
});

vi.mock('../utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { getLangfuse } from '../observability/langfuse.js';
import { logger } from '../utils/logger.js';
import { endToolCallSpan, logToolRetry, startToolCallSpan } from './observability.js';

describe('tools/observability', () => {
  it('creates a tool.call trace and span keyed by the traceId', () => {
    const spanEnd = vi.fn();
    const traceSpan = vi.fn(() => ({ end: spanEnd }));
    const trace = { span: traceSpan, update: vi.fn() };
    const lf = { trace: vi.fn(() => trace), flushAsync: vi.fn(), shutdownAsync: vi.fn() };
    vi.mocked(getLangfuse).mockReturnValueOnce(lf);

    const started = startToolCallSpan({ toolName: 'list_clusters', traceId: 'trace-123', timeoutMs: 30_000 });

    expect(lf.trace).toHaveBeenCalledWith(
      expect.objectContaining({
        name: 'tool.call',
        sessionId: 'trace-123',
        metadata: { traceId: 'trace-123', tool: 'list_clusters', timeoutMs: 30_000 },
      })
    );
    expect(traceSpan).toHaveBeenCalledWith(expect.objectContaining({ name: 'tool.list_clusters' }));

    endToolCallSpan(started.span, {
      toolName: 'list_clusters',
      traceId: 'trace-123',
      durationMs: 12,
      retries: 2,
      success: false,
      errorKind: 'ServerError',
    });

    expect(spanEnd).toHaveBeenCalledWith({
      level: 'ERROR',
      metadata: {
        traceId: 'trace-123',
        tool: 'list_clusters',
        durationMs: 12,
        retries: 2,
        success: false,
        errorKind: 'ServerError',
      },
    });
  });

  it('ends successful spans at DEFAULT level', () => {
    const end = vi.fn();

    endToolCallSpan({ end }, { toolName: 't', traceId: 'x', durationMs: 1, retries: 0, success: true });

    expect(end).toHaveBeenCalledWith(expect.objectContaining({ level: 'DEFAULT' }));
  });

  it('logs retries as tool.retry warnings', () => {
    logToolRetry({
      traceId: 'trace-1',
      toolName: 'get_cluster',
      attempt: 1,
      delayMs: 1000.4,
      errorKind: 'RateLimited',
      message: 'HTTP 429',
    });

    expect(logger.warn).toHaveBeenCalledWith({
      event: 'tool.retry',
      traceId: 'trace-1',
      tool: 'get_cluster',
      attempt: 1,
      delayMs: 1000,
      errorKind: 'RateLimited',
      error: 'HTTP 429',
    });
  });
});
