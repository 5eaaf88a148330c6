/**
 * Response shapes for the Databricks endpoints the sources read.
 *
 * Only the fields the adapter consumes are declared; everything else in a
 * response is dropped on parse.
 */

import { z } from 'zod';

export const statementStateSchema = z.enum([
  'PENDING',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'CANCELED',
  'CLOSED',
]);

const rowSchema = z.array(z.string().nullable());

export const statementChunkSchema = z.object({
  chunk_index: z.number().int().optional(),
  row_count: z.number().int().optional(),
  data_array: z.array(rowSchema).optional(),
  next_chunk_index: z.number().int().optional(),
});

export const statementResponseSchema = z.object({
  statement_id: z.string(),
  status: z
    .object({
      state: statementStateSchema,
      error: z
        .object({
          error_code: z.string().optional(),
          message: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  manifest: z
    .object({
      total_chunk_count: z.number().int().optional(),
      total_row_count: z.number().int().optional(),
      truncated: z.boolean().optional(),
      schema: z.unknown().optional(),
    })
    .optional(),
  result: statementChunkSchema.optional(),
});

export type StatementResponse = z.infer<typeof statementResponseSchema>;
export type StatementChunkResponse = z.infer<typeof statementChunkSchema>;

/** A resource as returned by a list or get endpoint */
export type ApiObject = Record<string, unknown>;

export const apiObjectSchema = z.record(z.string(), z.unknown());

export const apiObjectListSchema = z.array(apiObjectSchema);

/**
 * Parameters for POST /api/2.0/sql/statements.
 *
 * @see https://docs.databricks.com/api/workspace/statementexecution/executestatement
 */
export interface ExecuteStatementParams {
  warehouseId: string;
  statement: string;
  catalog?: string;
  schema?: string;
  /** `0s` or 5s to 50s */
  waitTimeout?: string;
  rowLimit?: number;
}
