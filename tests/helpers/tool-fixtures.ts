/**
 * In-process stand-ins for the Databricks surface the tools call.
 */

import { vi } from 'vitest';
import type { ListingSource } from '../../src/assembly/types.js';
import { DatabricksClient } from '../../src/databricks/client.js';
import type { ApiObject } from '../../src/databricks/types.js';
import { createRetryPolicy } from '../../src/retry/policy.js';
import type { InvocationContext, StatementService, ToolDependencies } from '../../src/tools/types.js';

export const instantRetryPolicy = createRetryPolicy({ initialDelayMs: 0, maxDelayMs: 0 });

export function createTestContext(overrides: Partial<InvocationContext> = {}): InvocationContext {
  const signal = overrides.signal ?? new AbortController().signal;
  const deadline = overrides.deadline ?? Date.now() + 60_000;
  return {
    traceId: 'trace-test',
    signal,
    deadline,
    retry: { policy: instantRetryPolicy, signal, deadline },
    ...overrides,
  };
}

export function createFakeDependencies(limits = { maxItems: 1000, maxBytes: 1024 * 1024 }) {
  const workspace = new DatabricksClient({ host: 'https://dbc-test.cloud.databricks.com', token: 'test-token' });
  const account = new DatabricksClient({
    host: 'https://accounts.cloud.databricks.com',
    token: 'test-token',
    accountId: 'acct-1',
  });

  const workspaceGet = vi.spyOn(workspace, 'get').mockResolvedValue({});
  const workspacePost = vi.spyOn(workspace, 'post').mockResolvedValue({});
  const accountGet = vi.spyOn(account, 'get').mockResolvedValue({});

  const statements = {
    executeStatement: vi.fn<StatementService['executeStatement']>(),
    fetchStatementFirstChunk: vi.fn<StatementService['fetchStatementFirstChunk']>(),
    fetchStatementChunk: vi.fn<StatementService['fetchStatementChunk']>(),
    cancelStatement: vi.fn<StatementService['cancelStatement']>(async () => {}),
  } satisfies StatementService;

  const listings = {
    fetchFirstPage: vi.fn<ListingSource<ApiObject>['fetchFirstPage']>(async () => ({
      items: [],
      nextPageToken: null,
      totalKnown: 0,
    })),
    fetchNextPage: vi.fn<ListingSource<ApiObject>['fetchNextPage']>(),
  } satisfies ListingSource<ApiObject>;

  const deps: ToolDependencies = {
    workspace: () => workspace,
    account: () => account,
    listings,
    statements,
    statementLimits: limits,
  };

  return { deps, workspaceGet, workspacePost, accountGet, statements, listings };
}
