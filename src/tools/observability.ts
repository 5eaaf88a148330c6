/**
 * Tool-level observability helpers (Langfuse + structured logs).
 *
 * Each tools/call becomes one `tool.call` trace with a single span; the
 * invocation traceId is the trace's sessionId so log lines and traces join.
 */

import { getLangfuse, type LangfuseSpan, type LangfuseTrace } from '../observability/langfuse.js';
import type { ErrorKindType } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ToolCallSpan = {
  trace: LangfuseTrace;
  span: LangfuseSpan;
};

export function startToolCallSpan(params: {
  toolName: string;
  traceId: string;
  timeoutMs: number;
}): ToolCallSpan {
  const trace = getLangfuse().trace({
    name: 'tool.call',
    sessionId: params.traceId,
    input: { tool: params.toolName },
    metadata: {
      traceId: params.traceId,
      tool: params.toolName,
      timeoutMs: params.timeoutMs,
    },
  });

  const span = trace.span({
    name: `tool.${params.toolName}`,
    input: { tool: params.toolName },
    metadata: { traceId: params.traceId },
  });

  return { trace, span };
}

export function endToolCallSpan(
  span: LangfuseSpan,
  params: {
    toolName: string;
    traceId: string;
    durationMs: number;
    /** Remote attempts that failed and were retried */
    retries: number;
    success: boolean;
    errorKind?: ErrorKindType;
  }
): void {
  span.end({
    level: params.success ? 'DEFAULT' : 'ERROR',
    metadata: {
      traceId: params.traceId,
      tool: params.toolName,
      durationMs: params.durationMs,
      retries: params.retries,
      success: params.success,
      errorKind: params.errorKind,
    },
  });
}

export function logToolRetry(params: {
  traceId: string;
  toolName: string;
  attempt: number;
  delayMs: number;
  errorKind: ErrorKindType;
  message: string;
}): void {
  logger.warn({
    event: 'tool.retry',
    traceId: params.traceId,
    tool: params.toolName,
    attempt: params.attempt,
    delayMs: Math.round(params.delayMs),
    errorKind: params.errorKind,
    error: params.message,
  });
}
