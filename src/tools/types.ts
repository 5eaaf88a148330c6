/**
 * Tool definition types.
 *
 * A tool is a name, a description, a zod input schema and a handler. The
 * schema is published through tools/list as JSON Schema and validates the
 * arguments of every tools/call before the handler runs.
 */

import { z } from 'zod';
import type { ListingSource, StatementSnapshot, StatementSource } from '../assembly/types.js';
import type { ClientProvider } from '../databricks/sources.js';
import type { ApiObject, ExecuteStatementParams } from '../databricks/types.js';
import type { RetryOptions } from '../retry/retry.js';
import { classifyError } from '../retry/classifier.js';
import type { Result } from '../utils/result.js';

/**
 * Per-call state handed to every handler.
 */
export interface InvocationContext {
  traceId: string;
  /** Aborts with a ClassifiedError reason: Timeout at the deadline, Cancelled on caller cancel */
  signal: AbortSignal;
  /** Epoch ms */
  deadline: number;
  /** Spread into every withRetry call the handler makes */
  retry: Omit<RetryOptions, 'operation'>;
}

export interface StatementService extends StatementSource {
  executeStatement(params: ExecuteStatementParams, signal?: AbortSignal): Promise<StatementSnapshot>;
  cancelStatement(statementId: string, signal?: AbortSignal): Promise<void>;
}

export interface ToolDependencies {
  workspace: ClientProvider;
  account: ClientProvider;
  listings: ListingSource<ApiObject>;
  statements: StatementService;
  statementLimits: { maxItems: number; maxBytes: number };
}

export interface ToolDefinition<S extends z.ZodType> {
  name: string;
  description: string;
  inputSchema: S;
  handler: (input: z.output<S>, context: InvocationContext) => Promise<Result<unknown>>;
}

/**
 * A tool with its input type erased, as held by the registry.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  /** JSON Schema of the accepted arguments */
  inputSchema: Record<string, unknown>;
  invoke: (args: unknown, context: InvocationContext) => Promise<Result<unknown>>;
}

/**
 * Arguments every tool accepts besides its own.
 */
export const invocationShape = {
  timeout_seconds: z
    .number()
    .positive()
    .max(3600)
    .optional()
    .describe('Overall deadline for this call in seconds (default: server TOOL_DEADLINE)'),
};

export function defineTool<S extends z.ZodType>(definition: ToolDefinition<S>): RegisteredTool {
  const { name, description, inputSchema, handler } = definition;
  return {
    name,
    description,
    inputSchema: { ...z.toJSONSchema(inputSchema, { io: 'input' }) },
    invoke: async (args, context) => {
      const parsed = inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return { success: false, error: classifyError(parsed.error) };
      }
      return handler(parsed.data, context);
    },
  };
}
