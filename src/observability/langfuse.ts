/**
 * Tracing backend for tool invocations.
 *
 * `getLangfuse()` hands out one process-wide client. When either Langfuse key
 * is unset it hands out a stand-in whose traces and spans record nothing.
 */

import { Langfuse } from 'langfuse';
import { config } from '../config/environment.js';
import { logger } from '../utils/logger.js';

/** The slice of the Langfuse SDK the tool layer calls */
export interface LangfuseLike {
  trace: (data: {
    name: string;
    sessionId?: string;
    input?: unknown;
    metadata?: Record<string, unknown>;
  }) => LangfuseTrace;
  flushAsync: () => Promise<void>;
  shutdownAsync: () => Promise<void>;
}

export interface LangfuseTrace {
  id?: string;
  update: (data: Record<string, unknown>) => void;
  span: (data: { name: string; input?: unknown; metadata?: Record<string, unknown> }) => LangfuseSpan;
}

export interface LangfuseSpan {
  end: (data?: Record<string, unknown>) => void;
}

const SILENT_TRACE_ID = 'noop-trace-id';

let client: LangfuseLike | null = null;

const silentSpan: LangfuseSpan = { end: () => undefined };

const silentTrace: LangfuseTrace = {
  id: SILENT_TRACE_ID,
  update: () => undefined,
  span: () => silentSpan,
};

function silentClient(): LangfuseLike {
  return {
    trace: () => silentTrace,
    flushAsync: () => Promise.resolve(),
    shutdownAsync: () => Promise.resolve(),
  };
}

export function getLangfuse(): LangfuseLike {
  if (client) return client;

  const { langfusePublicKey: publicKey, langfuseSecretKey: secretKey, langfuseBaseUrl: baseUrl } = config;

  if (!publicKey || !secretKey) {
    logger.debug({ event: 'tracing.disabled', missing: !publicKey ? 'LANGFUSE_PUBLIC_KEY' : 'LANGFUSE_SECRET_KEY' });
    client = silentClient();
    return client;
  }

  // The SDK's trace and span clients are wider than LangfuseLike.
  client = new Langfuse({ publicKey, secretKey, baseUrl }) as unknown as LangfuseLike;
  logger.info({ event: 'tracing.enabled', baseUrl });
  return client;
}

/**
 * Send buffered events, then drop the client so the next `getLangfuse()`
 * builds a fresh one. A failed flush is logged and does not reject.
 */
export async function shutdown(): Promise<void> {
  const current = client;
  if (!current) return;
  client = null;

  try {
    await current.shutdownAsync();
    logger.info({ event: 'tracing.flushed' });
  } catch (error) {
    logger.error({
      event: 'tracing.flush.failed',
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
