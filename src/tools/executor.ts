/**
 * Tool execution wrapper: deadline + cancellation + observability +
 * outward formatting.
 *
 * Always returns Result<string> (never throws). The success value is the
 * tool's result as pretty JSON text.
 */

import { z } from 'zod';
import { config } from '../config/environment.js';
import { classifyError } from '../retry/classifier.js';
import { getProcessRetryPolicy, type RetryPolicy } from '../retry/policy.js';
import { createClassifiedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { endToolCallSpan, logToolRetry, startToolCallSpan } from './observability.js';
import type { ToolRegistry } from './registry.js';
import { createInvocationScope, raceAbort } from './timeout.js';
import type { InvocationContext } from './types.js';

export interface ExecuteToolOptions {
  traceId: string;
  /** Caller-side cancellation (notifications/cancelled) */
  signal?: AbortSignal;
  /** Deadline used when the arguments carry no timeout_seconds */
  defaultTimeoutMs?: number;
  /** Defaults to the process-wide policy */
  retryPolicy?: RetryPolicy;
}

const timeoutArgumentSchema = z.object({
  timeout_seconds: z.number().positive().max(3600).optional(),
});

export async function executeTool(
  registry: ToolRegistry,
  toolName: string,
  args: unknown,
  options: ExecuteToolOptions
): Promise<Result<string>> {
  const { traceId } = options;
  const tool = registry.get(toolName);
  if (!tool) {
    return {
      success: false,
      error: createClassifiedError('BadRequestError', `Unknown tool: ${toolName}`),
    };
  }

  const timeoutArg = timeoutArgumentSchema.safeParse(args ?? {});
  const timeoutSeconds = timeoutArg.success ? timeoutArg.data.timeout_seconds : undefined;
  const timeoutMs =
    timeoutSeconds !== undefined
      ? Math.round(timeoutSeconds * 1000)
      : (options.defaultTimeoutMs ?? config.toolDeadlineMs);

  const scope = createInvocationScope({ timeoutMs, parentSignal: options.signal });
  const started = startToolCallSpan({ toolName, traceId, timeoutMs });
  const startMs = Date.now();
  let retries = 0;

  const context: InvocationContext = {
    traceId,
    signal: scope.signal,
    deadline: scope.deadline,
    retry: {
      policy: options.retryPolicy ?? getProcessRetryPolicy(),
      signal: scope.signal,
      deadline: scope.deadline,
      traceId,
      onRetry: ({ attempt, delayMs, error }) => {
        retries += 1;
        logToolRetry({
          traceId,
          toolName,
          attempt,
          delayMs,
          errorKind: error.kind,
          message: error.message,
        });
      },
    },
  };

  logger.info({ event: 'tool.call.started', traceId, tool: toolName, timeoutMs });

  try {
    const invocation = tool
      .invoke(args, context)
      .catch((e: unknown): Result<unknown> => ({ success: false, error: classifyError(e) }));
    const result = await raceAbort(invocation, scope.signal);
    const durationMs = Date.now() - startMs;

    if (result.success) {
      endToolCallSpan(started.span, { toolName, traceId, durationMs, retries, success: true });
      logger.info({ event: 'tool.call.completed', traceId, tool: toolName, durationMs, retries });
      return { success: true, data: toToolText(result.data) };
    }

    endToolCallSpan(started.span, {
      toolName,
      traceId,
      durationMs,
      retries,
      success: false,
      errorKind: result.error.kind,
    });
    logger.classifiedError(result.error, {
      event: 'tool.call.failed',
      traceId,
      tool: toolName,
      durationMs,
    });
    return result;
  } finally {
    scope.dispose();
  }
}

function toToolText(data: unknown): string {
  if (typeof data === 'string') return data;
  return JSON.stringify(data ?? null, null, 2);
}
