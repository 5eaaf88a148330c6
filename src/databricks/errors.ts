/**
 * Failures raised by the Databricks REST client.
 *
 * These are the only errors the client throws. The retry classifier turns
 * them into ClassifiedError values.
 */

/**
 * Non-2xx response from the Databricks REST API.
 *
 * @see https://docs.databricks.com/api/workspace/introduction (error responses)
 */
export class DatabricksApiError extends Error {
  readonly status: number;
  /** `error_code` from the response body, e.g. RESOURCE_DOES_NOT_EXIST */
  readonly errorCode?: string;
  readonly retryAfterMs?: number;
  readonly method: string;
  readonly path: string;

  constructor(params: {
    status: number;
    message: string;
    method: string;
    path: string;
    errorCode?: string;
    retryAfterMs?: number;
  }) {
    super(params.message);
    this.name = 'DatabricksApiError';
    this.status = params.status;
    this.errorCode = params.errorCode;
    this.retryAfterMs = params.retryAfterMs;
    this.method = params.method;
    this.path = params.path;
  }
}

/**
 * The request never produced an HTTP response: connection refused or reset,
 * DNS failure, or the client's own per-request timeout.
 */
export class DatabricksTransportError extends Error {
  /** System error code (ECONNRESET, EAI_AGAIN, ETIMEDOUT, ...) when known */
  readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DatabricksTransportError';
    this.code = options?.code;
  }
}

type ErrorBody = { error_code?: unknown; message?: unknown; detail?: unknown };

function isErrorBody(value: unknown): value is ErrorBody {
  return value !== null && typeof value === 'object';
}

/**
 * Extract `{ error_code, message }` from an error response body.
 *
 * SCIM endpoints report `detail` instead of `message`.
 */
export function parseErrorBody(text: string): { errorCode?: string; message?: string } {
  if (!text) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { message: text.slice(0, 500) };
  }
  if (!isErrorBody(parsed)) return {};

  const errorCode = typeof parsed.error_code === 'string' ? parsed.error_code : undefined;
  const message =
    typeof parsed.message === 'string'
      ? parsed.message
      : typeof parsed.detail === 'string'
        ? parsed.detail
        : undefined;
  return { errorCode, message };
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
