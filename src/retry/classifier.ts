/**
 * Failure classification.
 *
 * Maps whatever a remote call threw onto the error taxonomy. HTTP status
 * decides when there is one; otherwise transport error codes and message
 * patterns do. Anything unrecognized is UnknownError and is never retried.
 */

import { ZodError } from 'zod';
import { DatabricksApiError, DatabricksTransportError } from '../databricks/errors.js';
import {
  createClassifiedError,
  isClassifiedError,
  type ClassifiedError,
} from '../utils/errors.js';

const SERVER_ERROR_STATUSES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/**
 * Remote error codes that describe a resource changing state rather than a
 * bad request.
 */
const TRANSITIONAL_ERROR_CODES: ReadonlySet<string> = new Set([
  'RESOURCE_NOT_READY',
  'INVALID_STATE',
  'RESOURCE_CONFLICT',
]);

const TRANSITIONAL_STATE_PATTERN =
  /\b(pending|starting|restarting|resizing|provisioning|not (yet )?ready|in progress|being (created|started|updated))\b/i;

const NETWORK_MESSAGE_PATTERN = /econnrefused|econnreset|socket hang up|network|dns|fetch failed/i;

/**
 * Whether a remote error reports a resource in a transitional state.
 */
export function isTransitionalStateError(params: {
  status?: number;
  errorCode?: string;
  message: string;
}): boolean {
  if (params.errorCode === 'TEMPORARILY_UNAVAILABLE') return true;

  const mentionsTransition = TRANSITIONAL_STATE_PATTERN.test(params.message);
  if (!mentionsTransition) return false;

  if (params.errorCode && TRANSITIONAL_ERROR_CODES.has(params.errorCode)) return true;
  return params.status === 400 || params.status === 409;
}

export function classifyError(error: unknown): ClassifiedError {
  if (isClassifiedError(error)) return error;

  if (error instanceof DatabricksApiError) return classifyApiError(error);

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return createClassifiedError('BadRequestError', `Invalid parameters: ${issues.join(', ')}`, {
      cause: error,
    });
  }

  if (isAbortError(error)) {
    return createClassifiedError('Cancelled', 'The operation was aborted', { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);

  const code = findSystemErrorCode(error);
  if (
    error instanceof DatabricksTransportError ||
    (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    NETWORK_MESSAGE_PATTERN.test(message)
  ) {
    return createClassifiedError('NetworkError', message, { cause: error, errorCode: code });
  }

  return createClassifiedError('UnknownError', message, { cause: error });
}

function classifyApiError(error: DatabricksApiError): ClassifiedError {
  const base = {
    httpStatus: error.status,
    errorCode: error.errorCode,
    cause: error,
  };
  const message = `HTTP ${error.status} ${error.method} ${error.path}: ${error.message}`;

  if (SERVER_ERROR_STATUSES.has(error.status)) {
    return createClassifiedError('ServerError', message, {
      ...base,
      retryAfterMs: error.retryAfterMs,
    });
  }
  if (error.status === 429) {
    return createClassifiedError('RateLimited', message, {
      ...base,
      retryAfterMs: error.retryAfterMs,
    });
  }
  if (error.status === 401) return createClassifiedError('AuthenticationError', message, base);
  if (error.status === 403) return createClassifiedError('PermissionError', message, base);
  if (error.status === 404) return createClassifiedError('NotFoundError', message, base);

  if (
    isTransitionalStateError({
      status: error.status,
      errorCode: error.errorCode,
      message: error.message,
    })
  ) {
    return createClassifiedError('ResourceNotReady', message, base);
  }

  if (error.status === 400) return createClassifiedError('BadRequestError', message, base);

  return createClassifiedError('UnknownError', message, base);
}

function isAbortError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    Reflect.get(error, 'name') === 'AbortError'
  );
}

/**
 * System error code on the error itself or on its cause chain (undici wraps
 * socket errors as `TypeError: fetch failed` with the code on `cause`).
 */
function findSystemErrorCode(error: unknown, depth = 0): string | undefined {
  if (depth > 3 || error === null || typeof error !== 'object') return undefined;

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') return code;

  return findSystemErrorCode(Reflect.get(error, 'cause'), depth + 1);
}
