/**
 * Databricks implementations of the assembly sources.
 *
 * Listing endpoints paginate three ways, all surfaced to the assembler as an
 * opaque page token:
 * - token:  `page_token` / `next_page_token` (clusters, jobs, Unity Catalog, ...)
 * - offset: SCIM `startIndex` / `count` / `totalResults`; the token is the
 *           next 1-based start index
 * - none:   the whole collection in one response
 *
 * Failures are thrown (DatabricksApiError, DatabricksTransportError or a
 * ClassifiedError) for the retry coordinator to classify.
 */

import type { z } from 'zod';
import type {
  ListingFilter,
  ListingPage,
  ListingSource,
  StatementRow,
  StatementSnapshot,
  StatementSource,
} from '../assembly/types.js';
import { createClassifiedError } from '../utils/errors.js';
import { getAccountClient, getWorkspaceClient, type DatabricksClient, type QueryValue } from './client.js';
import {
  apiObjectListSchema,
  apiObjectSchema,
  statementChunkSchema,
  statementResponseSchema,
  type ApiObject,
  type ExecuteStatementParams,
  type StatementResponse,
} from './types.js';

export const LISTING_RESOURCE_KINDS = [
  'clusters',
  'jobs',
  'job_runs',
  'warehouses',
  'catalogs',
  'schemas',
  'tables',
  'serving_endpoints',
  'pipelines',
  'repos',
  'workspace_objects',
  'account_workspaces',
  'account_users',
  'account_groups',
] as const;

export type ListingResourceKind = (typeof LISTING_RESOURCE_KINDS)[number];

type Pagination = 'token' | 'offset' | 'none';

interface ListingEndpoint {
  scope: 'workspace' | 'account';
  /** Workspace path, or the suffix after /api/2.0/accounts/{id} */
  path: string;
  /** Field holding the items; null when the response body is the array */
  itemsField: string | null;
  pagination: Pagination;
  /** Query parameter carrying the page size hint */
  pageSizeParam?: string;
  maxPageSize?: number;
  /** Query parameter carrying the page token (token pagination) */
  tokenParam?: string;
  /** Filter keys forwarded as query parameters */
  filterParams?: readonly string[];
  required?: readonly string[];
}

export type ClientProvider = () => DatabricksClient;

const ENDPOINTS: Record<ListingResourceKind, ListingEndpoint> = {
  clusters: {
    scope: 'workspace',
    path: '/api/2.1/clusters/list',
    itemsField: 'clusters',
    pagination: 'token',
    pageSizeParam: 'page_size',
    maxPageSize: 100,
  },
  jobs: {
    scope: 'workspace',
    path: '/api/2.1/jobs/list',
    itemsField: 'jobs',
    pagination: 'token',
    pageSizeParam: 'limit',
    maxPageSize: 100,
    filterParams: ['name', 'expand_tasks'],
  },
  job_runs: {
    scope: 'workspace',
    path: '/api/2.1/jobs/runs/list',
    itemsField: 'runs',
    pagination: 'token',
    pageSizeParam: 'limit',
    maxPageSize: 25,
    filterParams: ['job_id', 'active_only', 'completed_only'],
  },
  warehouses: {
    scope: 'workspace',
    path: '/api/2.0/sql/warehouses',
    itemsField: 'warehouses',
    pagination: 'none',
  },
  catalogs: {
    scope: 'workspace',
    path: '/api/2.1/unity-catalog/catalogs',
    itemsField: 'catalogs',
    pagination: 'token',
    pageSizeParam: 'max_results',
    maxPageSize: 1000,
  },
  schemas: {
    scope: 'workspace',
    path: '/api/2.1/unity-catalog/schemas',
    itemsField: 'schemas',
    pagination: 'token',
    pageSizeParam: 'max_results',
    maxPageSize: 1000,
    filterParams: ['catalog_name'],
    required: ['catalog_name'],
  },
  tables: {
    scope: 'workspace',
    path: '/api/2.1/unity-catalog/tables',
    itemsField: 'tables',
    pagination: 'token',
    pageSizeParam: 'max_results',
    maxPageSize: 1000,
    filterParams: ['catalog_name', 'schema_name'],
    required: ['catalog_name', 'schema_name'],
  },
  serving_endpoints: {
    scope: 'workspace',
    path: '/api/2.0/serving-endpoints',
    itemsField: 'endpoints',
    pagination: 'none',
  },
  pipelines: {
    scope: 'workspace',
    path: '/api/2.0/pipelines',
    itemsField: 'statuses',
    pagination: 'token',
    pageSizeParam: 'max_results',
    maxPageSize: 100,
    filterParams: ['filter'],
  },
  repos: {
    scope: 'workspace',
    path: '/api/2.0/repos',
    itemsField: 'repos',
    pagination: 'token',
    tokenParam: 'next_page_token',
    filterParams: ['path_prefix'],
  },
  workspace_objects: {
    scope: 'workspace',
    path: '/api/2.0/workspace/list',
    itemsField: 'objects',
    pagination: 'none',
    filterParams: ['path'],
    required: ['path'],
  },
  account_workspaces: {
    scope: 'account',
    path: '/workspaces',
    itemsField: null,
    pagination: 'none',
  },
  account_users: {
    scope: 'account',
    path: '/scim/v2/Users',
    itemsField: 'Resources',
    pagination: 'offset',
    pageSizeParam: 'count',
    maxPageSize: 100,
    filterParams: ['filter'],
  },
  account_groups: {
    scope: 'account',
    path: '/scim/v2/Groups',
    itemsField: 'Resources',
    pagination: 'offset',
    pageSizeParam: 'count',
    maxPageSize: 100,
    filterParams: ['filter'],
  },
};

export function isListingResourceKind(value: string): value is ListingResourceKind {
  return value in ENDPOINTS;
}

export class DatabricksListingSource implements ListingSource<ApiObject> {
  constructor(
    private readonly workspace: ClientProvider = getWorkspaceClient,
    private readonly account: ClientProvider = getAccountClient
  ) {}

  async fetchFirstPage(
    resourceKind: string,
    filter: ListingFilter,
    pageSize: number,
    signal?: AbortSignal
  ): Promise<ListingPage<ApiObject>> {
    const endpoint = lookupEndpoint(resourceKind);
    const query = buildQuery(endpoint, filter, pageSize);
    if (endpoint.pagination === 'offset') query.startIndex = 1;
    return this.fetchPage(endpoint, query, 1, signal);
  }

  async fetchNextPage(
    resourceKind: string,
    pageToken: string,
    pageSize: number,
    filter: ListingFilter,
    signal?: AbortSignal
  ): Promise<ListingPage<ApiObject>> {
    const endpoint = lookupEndpoint(resourceKind);
    const query = buildQuery(endpoint, filter, pageSize);

    switch (endpoint.pagination) {
      case 'token':
        query[endpoint.tokenParam ?? 'page_token'] = pageToken;
        return this.fetchPage(endpoint, query, 1, signal);
      case 'offset': {
        const startIndex = Number(pageToken);
        if (!Number.isInteger(startIndex) || startIndex < 1) {
          throw createClassifiedError('BadRequestError', `Invalid page token for ${resourceKind}: ${pageToken}`);
        }
        query.startIndex = startIndex;
        return this.fetchPage(endpoint, query, startIndex, signal);
      }
      case 'none':
        throw createClassifiedError('BadRequestError', `${resourceKind} listings have no further pages`);
    }
  }

  private async fetchPage(
    endpoint: ListingEndpoint,
    query: Record<string, QueryValue>,
    startIndex: number,
    signal?: AbortSignal
  ): Promise<ListingPage<ApiObject>> {
    const client = endpoint.scope === 'account' ? this.account() : this.workspace();
    const path = endpoint.scope === 'account' ? client.accountPath(endpoint.path) : endpoint.path;
    const body = await client.get<unknown>(path, { query, signal });

    if (endpoint.itemsField === null) {
      const items = parseResponse(apiObjectListSchema, body, path);
      return { items, nextPageToken: null, totalKnown: items.length };
    }

    const response = parseResponse(apiObjectSchema, body, path);
    const items = parseResponse(apiObjectListSchema, response[endpoint.itemsField] ?? [], path);

    switch (endpoint.pagination) {
      case 'token': {
        const next = response.next_page_token;
        return {
          items,
          nextPageToken: typeof next === 'string' && next !== '' ? next : null,
          totalKnown: null,
        };
      }
      case 'offset': {
        const total = typeof response.totalResults === 'number' ? response.totalResults : null;
        const nextStart = startIndex + items.length;
        const more = items.length > 0 && (total === null || nextStart - 1 < total);
        return { items, nextPageToken: more ? String(nextStart) : null, totalKnown: total };
      }
      case 'none':
        return { items, nextPageToken: null, totalKnown: items.length };
    }
  }
}

function lookupEndpoint(resourceKind: string): ListingEndpoint {
  if (!isListingResourceKind(resourceKind)) {
    throw createClassifiedError('BadRequestError', `Unknown resource kind: ${resourceKind}`);
  }
  return ENDPOINTS[resourceKind];
}

function buildQuery(
  endpoint: ListingEndpoint,
  filter: ListingFilter,
  pageSize: number
): Record<string, QueryValue> {
  const missing = (endpoint.required ?? []).filter((key) => filter[key] === undefined || filter[key] === '');
  if (missing.length > 0) {
    throw createClassifiedError('BadRequestError', `Missing required parameter(s): ${missing.join(', ')}`);
  }

  const query: Record<string, QueryValue> = {};
  for (const key of endpoint.filterParams ?? []) {
    query[key] = filter[key];
  }
  if (endpoint.pageSizeParam) {
    query[endpoint.pageSizeParam] = Math.min(pageSize, endpoint.maxPageSize ?? pageSize);
  }
  return query;
}

function parseResponse<S extends z.ZodType>(schema: S, body: unknown, path: string): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw createClassifiedError('UnknownError', `Unexpected response shape from ${path}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Statement execution
// ─────────────────────────────────────────────────────────────────────────────

const STATEMENTS_PATH = '/api/2.0/sql/statements';

export class DatabricksStatementSource implements StatementSource {
  constructor(private readonly workspace: ClientProvider = getWorkspaceClient) {}

  /**
   * POST /api/2.0/sql/statements with inline JSON_ARRAY results.
   *
   * Statements still running after `waitTimeout` keep running
   * (`on_wait_timeout: CONTINUE`); poll with fetchStatementFirstChunk.
   */
  async executeStatement(params: ExecuteStatementParams, signal?: AbortSignal): Promise<StatementSnapshot> {
    const body = await this.workspace().post<unknown>(
      STATEMENTS_PATH,
      {
        warehouse_id: params.warehouseId,
        statement: params.statement,
        catalog: params.catalog,
        schema: params.schema,
        wait_timeout: params.waitTimeout ?? '10s',
        on_wait_timeout: 'CONTINUE',
        row_limit: params.rowLimit,
        disposition: 'INLINE',
        format: 'JSON_ARRAY',
      },
      { signal }
    );
    return toSnapshot(parseResponse(statementResponseSchema, body, STATEMENTS_PATH));
  }

  async fetchStatementFirstChunk(statementId: string, signal?: AbortSignal): Promise<StatementSnapshot> {
    const path = `${STATEMENTS_PATH}/${encodeURIComponent(statementId)}`;
    const body = await this.workspace().get<unknown>(path, { signal });
    return toSnapshot(parseResponse(statementResponseSchema, body, path));
  }

  async fetchStatementChunk(
    statementId: string,
    chunkIndex: number,
    signal?: AbortSignal
  ): Promise<StatementRow[]> {
    const path = `${STATEMENTS_PATH}/${encodeURIComponent(statementId)}/result/chunks/${chunkIndex}`;
    const body = await this.workspace().get<unknown>(path, { signal });
    return parseResponse(statementChunkSchema, body, path).data_array ?? [];
  }

  async cancelStatement(statementId: string, signal?: AbortSignal): Promise<void> {
    await this.workspace().post<unknown>(
      `${STATEMENTS_PATH}/${encodeURIComponent(statementId)}/cancel`,
      undefined,
      { signal }
    );
  }
}

export function toSnapshot(response: StatementResponse): StatementSnapshot {
  const rows = response.result?.data_array ?? [];
  const manifest = response.manifest
    ? {
        totalChunkCount: response.manifest.total_chunk_count ?? (rows.length > 0 ? 1 : 0),
        totalRowCount: response.manifest.total_row_count ?? null,
        schema: response.manifest.schema ?? null,
      }
    : null;

  return {
    statementId: response.statement_id,
    state: response.status?.state ?? 'PENDING',
    rows,
    manifest,
    errorMessage: response.status?.error?.message,
  };
}
