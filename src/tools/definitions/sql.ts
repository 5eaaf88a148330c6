/**
 * SQL statement execution and warehouse tools.
 *
 * Statement results are returned through the statement assembler: all
 * chunks up to max_items / max_bytes, with a next_cursor for the rest.
 *
 * @see https://docs.databricks.com/api/workspace/statementexecution
 * @see https://docs.databricks.com/api/workspace/warehouses
 */

import { z } from 'zod';
import { decodeStatementCursor, encodeCursor } from '../../assembly/cursor.js';
import { assembleStatementResult, type StatementAssembly } from '../../assembly/statement.js';
import type { StatementCursor, StatementLimits, StatementSnapshot } from '../../assembly/types.js';
import type { ApiObject } from '../../databricks/types.js';
import type { Result } from '../../utils/result.js';
import { callApi, listInputShape, runListing, summarizeFailure } from '../helpers.js';
import {
  defineTool,
  invocationShape,
  type InvocationContext,
  type RegisteredTool,
  type ToolDependencies,
} from '../types.js';

/** Rows per statement in a batch unless max_items says otherwise */
const BATCH_DEFAULT_MAX_ITEMS = 100;

const WAREHOUSE_SUMMARY_FIELDS = [
  'id',
  'name',
  'state',
  'cluster_size',
  'warehouse_type',
  'enable_serverless_compute',
  'num_clusters',
  'creator_name',
] as const;

const statementContextShape = {
  warehouse_id: z.string().min(1).describe('The SQL warehouse ID to execute on'),
  catalog: z.string().optional().describe('Default catalog for the statement'),
  schema: z.string().optional().describe('Default schema for the statement'),
  wait_timeout: z
    .string()
    .regex(/^(0|[5-9]|[1-4][0-9]|50)s$/)
    .optional()
    .describe("Time to wait for the result: '0s' for async execution, or '5s' to '50s' (default: '10s')"),
  row_limit: z.number().int().positive().optional().describe('Row limit applied by the warehouse'),
};

const statementContextSchema = z.object(statementContextShape);

const resultLimitShape = {
  max_items: z.number().int().positive().optional().describe('Maximum number of rows to return'),
  max_bytes: z.number().int().positive().optional().describe('Approximate cap on the returned rows, in bytes'),
  best_effort: z.boolean().optional().describe('Return the rows gathered so far if a chunk fetch fails'),
};

const statementIdShape = {
  statement_id: z.string().min(1).describe('The statement ID returned by execute_statement'),
};

type ResultLimitInput = { max_items?: number; max_bytes?: number; best_effort?: boolean };

export interface StatementOutput {
  statement_id: string;
  status: StatementSnapshot['state'];
  error_message?: string;
  schema?: unknown;
  row_count?: number;
  data_array?: Array<Array<string | null>>;
  truncated?: boolean;
  next_cursor?: string | null;
  total_row_count?: number | null;
  error?: ReturnType<typeof summarizeFailure>;
}

export function sqlTools(deps: ToolDependencies): RegisteredTool[] {
  const limitsFor = (input: ResultLimitInput, defaultMaxItems?: number): StatementLimits => ({
    maxItems: input.max_items ?? defaultMaxItems ?? deps.statementLimits.maxItems,
    maxBytes: input.max_bytes ?? deps.statementLimits.maxBytes,
  });

  /**
   * Status of a statement, with its assembled rows once it succeeded.
   */
  const describeStatement = async (
    snapshot: StatementSnapshot,
    limits: StatementLimits,
    bestEffort: boolean | undefined,
    context: InvocationContext
  ): Promise<Result<StatementOutput>> => {
    if (snapshot.state !== 'SUCCEEDED') {
      return {
        success: true,
        data: {
          statement_id: snapshot.statementId,
          status: snapshot.state,
          error_message: snapshot.errorMessage,
        },
      };
    }

    const assembled = await assembleStatementResult(deps.statements, snapshot.statementId, limits, {
      initial: snapshot,
      bestEffort,
      retry: context.retry,
    });
    if (!assembled.success) return assembled;

    return {
      success: true,
      data: {
        ...resultOutput(snapshot.statementId, assembled.data),
        schema: snapshot.manifest?.schema ?? null,
      },
    };
  };

  const executeAndDescribe = async (
    input: z.infer<typeof statementContextSchema> & { statement: string },
    limits: StatementLimits,
    bestEffort: boolean | undefined,
    context: InvocationContext
  ): Promise<Result<StatementOutput>> => {
    const executed = await callApi(context, 'statements.execute', (signal) =>
      deps.statements.executeStatement(
        {
          warehouseId: input.warehouse_id,
          statement: input.statement,
          catalog: input.catalog,
          schema: input.schema,
          waitTimeout: input.wait_timeout,
          rowLimit: input.row_limit,
        },
        signal
      ),
      // Not idempotent: after a 5xx or a dropped connection the warehouse may
      // already be running the statement. Only a 429 means it was refused.
      { retryIf: (error) => error.kind === 'RateLimited' }
    );
    if (!executed.success) return executed;
    return describeStatement(executed.data, limits, bestEffort, context);
  };

  return [
    defineTool({
      name: 'execute_statement',
      description:
        'Execute a SQL statement on a SQL warehouse and return its result rows; ' +
        'large results are returned in parts resumable with fetch_statement_result',
      inputSchema: z.object({
        ...statementContextShape,
        statement: z.string().min(1).describe('The SQL statement to execute'),
        ...resultLimitShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        executeAndDescribe(input, limitsFor(input), input.best_effort, context),
    }),

    defineTool({
      name: 'get_statement',
      description: 'Get the status of a SQL statement and, once it succeeded, its result rows',
      inputSchema: z.object({ ...statementIdShape, ...resultLimitShape, ...invocationShape }),
      handler: async (input, context) => {
        const fetched = await callApi(context, 'statements.get', (signal) =>
          deps.statements.fetchStatementFirstChunk(input.statement_id, signal)
        );
        if (!fetched.success) return fetched;
        return describeStatement(fetched.data, limitsFor(input), input.best_effort, context);
      },
    }),

    defineTool({
      name: 'fetch_statement_result',
      description:
        'Fetch result rows of a succeeded statement, continuing from next_cursor when given',
      inputSchema: z.object({
        ...statementIdShape,
        cursor: z.string().min(1).optional().describe('next_cursor from a previous call'),
        ...resultLimitShape,
        ...invocationShape,
      }),
      handler: async (input, context) => {
        let resumeCursor: StatementCursor | undefined;
        if (input.cursor !== undefined) {
          const decoded = decodeStatementCursor(input.cursor, input.statement_id);
          if (!decoded.success) return decoded;
          resumeCursor = decoded.data;
        }

        const assembled = await assembleStatementResult(
          deps.statements,
          input.statement_id,
          limitsFor(input),
          { resumeCursor, bestEffort: input.best_effort, retry: context.retry }
        );
        if (!assembled.success) return assembled;
        return { success: true, data: resultOutput(input.statement_id, assembled.data) };
      },
    }),

    defineTool({
      name: 'cancel_statement_execution',
      description: 'Cancel an executing SQL statement',
      inputSchema: z.object({ ...statementIdShape, ...invocationShape }),
      handler: async ({ statement_id }, context) => {
        const cancelled = await callApi(context, 'statements.cancel', (signal) =>
          deps.statements.cancelStatement(statement_id, signal)
        );
        if (!cancelled.success) return cancelled;
        return { success: true, data: { statement_id, status: 'cancel_requested' } };
      },
    }),

    defineTool({
      name: 'execute_statements_batch',
      description:
        'Execute several SQL statements one after another; a failing statement is reported ' +
        'and the batch continues',
      inputSchema: z.object({
        ...statementContextShape,
        statements: z.array(z.string().min(1)).min(1).max(100).describe('SQL statements, run in order'),
        ...resultLimitShape,
        ...invocationShape,
      }),
      handler: async (input, context) => {
        const limits = limitsFor(input, BATCH_DEFAULT_MAX_ITEMS);
        const results: Array<{ index: number; statement: string } & Partial<StatementOutput>> = [];
        let failed = 0;

        for (const [index, statement] of input.statements.entries()) {
          const outcome = await executeAndDescribe(
            { ...input, statement },
            limits,
            input.best_effort,
            context
          );

          if (!outcome.success) {
            // The whole invocation is over; no later statement can run.
            if (outcome.error.kind === 'Cancelled' || outcome.error.kind === 'Timeout') return outcome;
            failed += 1;
            results.push({ index, statement, error: summarizeFailure(outcome.error, index) });
            continue;
          }

          if (outcome.data.status === 'FAILED') failed += 1;
          results.push({ index, statement, ...outcome.data });
        }

        return {
          success: true,
          data: { total: input.statements.length, succeeded: input.statements.length - failed, failed, results },
        };
      },
    }),

    defineTool({
      name: 'list_warehouses',
      description: 'List SQL warehouses',
      inputSchema: z.object({ ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'warehouses',
          itemsKey: 'warehouses',
          input,
          fields: WAREHOUSE_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_warehouse',
      description: 'Get details of a SQL warehouse',
      inputSchema: z.object({ id: z.string().min(1).describe('The warehouse ID'), ...invocationShape }),
      handler: ({ id }, context) =>
        callApi(context, 'warehouses.get', (signal) =>
          deps.workspace().get<ApiObject>(`/api/2.0/sql/warehouses/${encodeURIComponent(id)}`, { signal })
        ),
    }),

    defineTool({
      name: 'start_warehouse',
      description: 'Start a stopped SQL warehouse',
      inputSchema: z.object({ id: z.string().min(1).describe('The warehouse ID'), ...invocationShape }),
      handler: async ({ id }, context) => {
        const started = await callApi(context, 'warehouses.start', (signal) =>
          deps
            .workspace()
            .post<ApiObject>(`/api/2.0/sql/warehouses/${encodeURIComponent(id)}/start`, undefined, { signal })
        );
        if (!started.success) return started;
        return { success: true, data: { id, status: 'starting' } };
      },
    }),

    defineTool({
      name: 'stop_warehouse',
      description: 'Stop a running SQL warehouse',
      inputSchema: z.object({ id: z.string().min(1).describe('The warehouse ID'), ...invocationShape }),
      handler: async ({ id }, context) => {
        const stopped = await callApi(context, 'warehouses.stop', (signal) =>
          deps
            .workspace()
            .post<ApiObject>(`/api/2.0/sql/warehouses/${encodeURIComponent(id)}/stop`, undefined, { signal })
        );
        if (!stopped.success) return stopped;
        return { success: true, data: { id, status: 'stopping' } };
      },
    }),
  ];
}

function resultOutput(statementId: string, assembly: StatementAssembly): StatementOutput {
  const output: StatementOutput = {
    statement_id: statementId,
    status: 'SUCCEEDED',
    row_count: assembly.itemsSoFar.length,
    data_array: assembly.itemsSoFar,
    truncated: assembly.truncated,
    next_cursor: assembly.cursor ? encodeCursor(assembly.cursor) : null,
    total_row_count: assembly.totalKnown,
  };
  if (assembly.failure) {
    output.error = summarizeFailure(assembly.failure.error, assembly.failure.index);
  }
  return output;
}
