/**
 * ClassifiedError types and utilities.
 *
 * Every failure that leaves the core is a ClassifiedError: a frozen plain
 * object carrying the error kind, whether the kind is retried locally, a
 * human message and guidance the caller can act on.
 */

/**
 * Error kinds.
 */
export const ErrorKind = {
  SERVER_ERROR: 'ServerError',
  RATE_LIMITED: 'RateLimited',
  NETWORK_ERROR: 'NetworkError',
  RESOURCE_NOT_READY: 'ResourceNotReady',
  AUTHENTICATION_ERROR: 'AuthenticationError',
  PERMISSION_ERROR: 'PermissionError',
  NOT_FOUND_ERROR: 'NotFoundError',
  BAD_REQUEST_ERROR: 'BadRequestError',
  STALE_CURSOR: 'StaleCursor',
  TIMEOUT: 'Timeout',
  CANCELLED: 'Cancelled',
  UNKNOWN_ERROR: 'UnknownError',
} as const;

export type ErrorKindType = (typeof ErrorKind)[keyof typeof ErrorKind];

export const ALL_ERROR_KINDS: readonly ErrorKindType[] = Object.values(ErrorKind);

const RETRYABLE_KINDS: ReadonlySet<ErrorKindType> = new Set<ErrorKindType>([
  'ServerError',
  'RateLimited',
  'NetworkError',
  'ResourceNotReady',
]);

/**
 * One attempt of a retried operation.
 */
export interface RetryAttemptRecord {
  /** 1-based */
  readonly attemptNumber: number;
  /** Wall-clock start of the attempt, epoch ms */
  readonly startedAt: number;
  readonly durationMs: number;
  /** Delay slept after this attempt before the next one; 0 when none followed */
  readonly delayBeforeRetryMs: number;
  /** null when the attempt succeeded */
  readonly error: ClassifiedError | null;
}

export type RetryHistory = readonly RetryAttemptRecord[];

export interface ClassifiedError {
  readonly kind: ErrorKindType;
  readonly retryable: boolean;
  /** Technical message */
  readonly message: string;
  /** What the caller should do next */
  readonly guidance: string;
  readonly httpStatus?: number;
  /** Server-supplied retry hint */
  readonly retryAfterMs?: number;
  /** Remote error code, e.g. RESOURCE_DOES_NOT_EXIST */
  readonly errorCode?: string;
  /** Present on errors returned by the retry coordinator */
  readonly history?: RetryHistory;
  readonly cause?: unknown;
}

export type ClassifiedErrorOptions = Partial<Omit<ClassifiedError, 'kind' | 'message'>>;

/**
 * Create a frozen ClassifiedError with retryable and guidance derived from the kind.
 */
export function createClassifiedError(
  kind: ErrorKindType,
  message: string,
  options?: ClassifiedErrorOptions
): ClassifiedError {
  return Object.freeze({
    kind,
    message,
    retryable: isRetryableKind(kind),
    guidance: getGuidance(kind),
    ...options,
  });
}

/**
 * Copy of `error` with the attempt history attached.
 */
export function withHistory(error: ClassifiedError, history: RetryHistory): ClassifiedError {
  return Object.freeze({ ...error, history: Object.freeze([...history]) });
}

export function isClassifiedError(value: unknown): value is ClassifiedError {
  if (value === null || typeof value !== 'object') return false;
  const kind: unknown = Reflect.get(value, 'kind');
  return (
    typeof kind === 'string' &&
    ALL_ERROR_KINDS.some((k) => k === kind) &&
    typeof Reflect.get(value, 'message') === 'string' &&
    typeof Reflect.get(value, 'retryable') === 'boolean' &&
    typeof Reflect.get(value, 'guidance') === 'string'
  );
}

export function isRetryableKind(kind: ErrorKindType): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export function getGuidance(kind: ErrorKindType): string {
  const guidance: Record<ErrorKindType, string> = {
    ServerError:
      'The Databricks service returned a server error. It was retried automatically; try again later.',
    RateLimited:
      'The request was rate limited. It was retried automatically; wait before sending more requests.',
    NetworkError:
      'The Databricks host could not be reached. Check DATABRICKS_HOST and network connectivity, then try again.',
    ResourceNotReady:
      'The resource is still starting or changing state. Wait for it to become ready and try again.',
    AuthenticationError:
      'Authentication failed. Refresh the credentials (DATABRICKS_TOKEN) and restart the server.',
    PermissionError:
      'The caller lacks permission for this operation. Ask a workspace or account admin for access.',
    NotFoundError:
      'The resource does not exist. Re-list the resources to obtain a valid identifier.',
    BadRequestError:
      'The request was rejected as invalid. Check the parameters against the tool schema and retry.',
    StaleCursor:
      'The cursor no longer refers to a live result. Restart the request from the beginning without a cursor.',
    Timeout:
      'The invocation deadline was reached. Narrow the request or raise timeout_seconds.',
    Cancelled: 'The invocation was cancelled by the caller.',
    UnknownError:
      'An unrecognized failure occurred and was not retried. Inspect the message for details.',
  };

  return guidance[kind];
}
