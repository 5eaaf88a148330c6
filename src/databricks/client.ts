/**
 * Databricks REST client.
 *
 * Thin `fetch` wrapper for the workspace and account REST APIs:
 * - Bearer token authentication (personal access token)
 * - Per-request timeout composed with the caller's AbortSignal
 * - Throws DatabricksApiError for non-2xx responses and
 *   DatabricksTransportError when no response arrived
 *
 * Retrying is not done here; callers wrap requests in withRetry.
 *
 * @see https://docs.databricks.com/api/workspace/introduction
 */

import { config } from '../config/environment.js';
import { createClassifiedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DatabricksApiError, DatabricksTransportError, parseErrorBody, parseRetryAfter } from './errors.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type QueryValue = string | number | boolean | undefined | null;

export interface DatabricksClientConfig {
  /** Workspace URL, or the accounts console URL for account clients */
  host: string;
  token: string;
  /** Set for account-level clients; prefixed onto `accountPath()` */
  accountId?: string;
  requestTimeoutMs?: number;
}

export interface RequestOptions {
  query?: Record<string, QueryValue | QueryValue[]>;
  body?: unknown;
  signal?: AbortSignal;
  traceId?: string;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export class DatabricksClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly accountId?: string;
  private readonly requestTimeoutMs: number;

  constructor(clientConfig: DatabricksClientConfig) {
    this.baseUrl = normalizeHost(clientConfig.host);
    this.token = clientConfig.token;
    this.accountId = clientConfig.accountId;
    this.requestTimeoutMs = clientConfig.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  get host(): string {
    return this.baseUrl;
  }

  /**
   * `/api/2.0/accounts/{accountId}` + suffix.
   *
   * @throws ClassifiedError (BadRequestError) when the client has no account id
   */
  accountPath(suffix: string): string {
    if (!this.accountId) {
      throw createClassifiedError('BadRequestError', 'Account operations require DATABRICKS_ACCOUNT_ID');
    }
    return `/api/2.0/accounts/${encodeURIComponent(this.accountId)}${suffix}`;
  }

  get<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('GET', path, options);
  }

  post<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T> {
    return this.request<T>('POST', path, { ...options, body });
  }

  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const startTime = Date.now();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.token}`,
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    // Timeout + upstream cancellation share one controller.
    const controller = new AbortController();
    const upstream = options.signal;
    const onAbort = (): void => controller.abort(upstream?.reason);
    if (upstream) {
      if (upstream.aborted) controller.abort(upstream.reason);
      else upstream.addEventListener('abort', onAbort, { once: true });
    }
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);

    logger.debug({
      event: 'databricks.request.started',
      method,
      path,
      traceId: options.traceId,
    });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (upstream?.aborted) throw error;

      const message = error instanceof Error ? error.message : String(error);
      if (timedOut) {
        logger.warn({
          event: 'databricks.request.timeout',
          method,
          path,
          timeoutMs: this.requestTimeoutMs,
          traceId: options.traceId,
        });
        throw new DatabricksTransportError(
          `Request timeout after ${this.requestTimeoutMs}ms: ${method} ${path}`,
          { code: 'ETIMEDOUT', cause: error }
        );
      }

      logger.warn({
        event: 'databricks.request.failed',
        method,
        path,
        error: message,
        traceId: options.traceId,
      });
      throw new DatabricksTransportError(`${method} ${path} failed: ${message}`, {
        code: systemErrorCode(error),
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      upstream?.removeEventListener('abort', onAbort);
    }

    const durationMs = Date.now() - startTime;

    if (!response.ok) {
      const body = parseErrorBody(text);
      logger.info({
        event: 'databricks.request.error_response',
        method,
        path,
        status: response.status,
        errorCode: body.errorCode,
        durationMs,
        traceId: options.traceId,
      });
      throw new DatabricksApiError({
        status: response.status,
        method,
        path,
        errorCode: body.errorCode,
        message: body.message ?? (response.statusText || `HTTP ${response.status}`),
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      });
    }

    logger.debug({
      event: 'databricks.request.success',
      method,
      path,
      status: response.status,
      durationMs,
      traceId: options.traceId,
    });

    if (!text) return parseJson<T>('{}');
    return parseJson<T>(text);
  }

  private buildUrl(path: string, query?: RequestOptions['query']): string {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        const values = Array.isArray(value) ? value : [value];
        for (const v of values) {
          if (v === undefined || v === null || v === '') continue;
          url.searchParams.append(key, String(v));
        }
      }
    }
    return url.toString();
  }
}

/**
 * Not validated here: sources.ts parses the shapes it pages through with zod,
 * tool handlers pass other bodies through as-is.
 */
function parseJson<T>(text: string): T {
  return JSON.parse(text) as T;
}

function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (!trimmed) return trimmed;
  return /^https?:\/\//i.test(trimmed) ? `${trimmed}/` : `https://${trimmed}/`;
}

function systemErrorCode(error: unknown): string | undefined {
  if (error === null || typeof error !== 'object') return undefined;
  const cause: unknown = Reflect.get(error, 'cause');
  const code: unknown =
    cause !== null && typeof cause === 'object' ? Reflect.get(cause, 'code') : Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Process-wide handles: created once on first use, never mutated afterwards.
// ─────────────────────────────────────────────────────────────────────────────

let workspaceClient: DatabricksClient | null = null;
let accountClient: DatabricksClient | null = null;

/**
 * @throws ClassifiedError (AuthenticationError) when DATABRICKS_HOST or DATABRICKS_TOKEN is missing
 */
export function getWorkspaceClient(): DatabricksClient {
  if (workspaceClient) return workspaceClient;

  if (!config.databricksHost || !config.databricksToken) {
    throw createClassifiedError(
      'AuthenticationError',
      'DATABRICKS_HOST and DATABRICKS_TOKEN must be set for workspace operations'
    );
  }

  workspaceClient = new DatabricksClient({
    host: config.databricksHost,
    token: config.databricksToken,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  logger.info({ event: 'databricks.client.initialized', scope: 'workspace', host: workspaceClient.host });
  return workspaceClient;
}

/**
 * @throws ClassifiedError when DATABRICKS_ACCOUNT_ID or DATABRICKS_TOKEN is missing
 */
export function getAccountClient(): DatabricksClient {
  if (accountClient) return accountClient;

  if (!config.databricksAccountId) {
    throw createClassifiedError(
      'BadRequestError',
      'DATABRICKS_ACCOUNT_ID environment variable required for account operations'
    );
  }
  if (!config.databricksToken) {
    throw createClassifiedError('AuthenticationError', 'DATABRICKS_TOKEN must be set for account operations');
  }

  accountClient = new DatabricksClient({
    host: config.databricksAccountHost,
    token: config.databricksToken,
    accountId: config.databricksAccountId,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  logger.info({
    event: 'databricks.client.initialized',
    scope: 'account',
    accountId: config.databricksAccountId,
  });
  return accountClient;
}

export function resetClientsForTests(): void {
  workspaceClient = null;
  accountClient = null;
}
