/**
 * Outward error schema for failed tool calls.
 *
 * Every failure leaves the server as
 * `{ error: { kind, message, guidance, http_status, error_code, attempts } }`,
 * where `attempts` lists each try with its timing and classification so an
 * operator can tell an unavailable service from a malformed request.
 */

import type { ClassifiedError, ErrorKindType, RetryAttemptRecord } from '../utils/errors.js';

export interface OutwardAttempt {
  attempt: number;
  started_at: string;
  duration_ms: number;
  delay_before_retry_ms: number;
  outcome: 'success' | ErrorKindType;
  message?: string;
  http_status?: number;
}

export interface OutwardError {
  error: {
    kind: ErrorKindType;
    message: string;
    guidance: string;
    retryable: boolean;
    http_status: number | null;
    error_code: string | null;
    attempts: OutwardAttempt[];
  };
}

export function toOutwardError(error: ClassifiedError): OutwardError {
  return {
    error: {
      kind: error.kind,
      message: error.message,
      guidance: error.guidance,
      retryable: error.retryable,
      http_status: error.httpStatus ?? null,
      error_code: error.errorCode ?? null,
      attempts: (error.history ?? []).map(toOutwardAttempt),
    },
  };
}

function toOutwardAttempt(record: RetryAttemptRecord): OutwardAttempt {
  return {
    attempt: record.attemptNumber,
    started_at: new Date(record.startedAt).toISOString(),
    duration_ms: record.durationMs,
    delay_before_retry_ms: Math.round(record.delayBeforeRetryMs),
    outcome: record.error?.kind ?? 'success',
    message: record.error?.message,
    http_status: record.error?.httpStatus,
  };
}

/**
 * Text content for a failed call: the outward error as pretty JSON.
 */
export function formatToolError(error: ClassifiedError): string {
  return JSON.stringify(toOutwardError(error), null, 2);
}
