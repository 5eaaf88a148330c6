/**
 * Building blocks shared by the tool definitions.
 */

import { z } from 'zod';
import { decodeListingCursor, encodeCursor } from '../assembly/cursor.js';
import { assembleListing, DEFAULT_LIST_MAX_ITEMS, LIST_MAX_ITEMS_CEILING } from '../assembly/listing.js';
import type { ListingCursor, ListingFilter } from '../assembly/types.js';
import type { ListingResourceKind } from '../databricks/sources.js';
import type { ApiObject } from '../databricks/types.js';
import { withRetry, type RetryOptions } from '../retry/retry.js';
import type { ClassifiedError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';
import type { InvocationContext, ToolDependencies } from './types.js';

/**
 * One remote call through the retry coordinator, with the invocation's
 * deadline and signal.
 */
export async function callApi<T>(
  context: InvocationContext,
  operation: string,
  call: (signal?: AbortSignal) => Promise<T>,
  options: Pick<RetryOptions, 'retryIf'> = {}
): Promise<Result<T>> {
  const outcome = await withRetry(({ signal }) => call(signal), { ...context.retry, ...options, operation });
  if (!outcome.success) return outcome;
  return { success: true, data: outcome.data };
}

const maxItemsSchema = z.number().int().min(1).max(LIST_MAX_ITEMS_CEILING);

/**
 * Arguments of every list tool.
 */
export const listInputShape = {
  max_items: maxItemsSchema
    .optional()
    .describe(
      `Maximum number of items to return (default: ${DEFAULT_LIST_MAX_ITEMS}, max: ${LIST_MAX_ITEMS_CEILING})`
    ),
  page_size: maxItemsSchema.optional().describe('Alias of max_items'),
  cursor: z.string().min(1).optional().describe('next_cursor from a previous call, to continue the listing'),
  best_effort: z
    .boolean()
    .optional()
    .describe('Return the items gathered so far if a page fetch fails'),
};

export interface ListInput {
  max_items?: number;
  page_size?: number;
  cursor?: string;
  best_effort?: boolean;
}

export interface ListingOutput {
  count: number;
  truncated: boolean;
  next_cursor: string | null;
  total_known: number | null;
  error?: ReturnType<typeof summarizeFailure>;
  [itemsKey: string]: unknown;
}

/**
 * Run a listing assembly for a list tool and shape the response.
 */
export async function runListing(
  deps: ToolDependencies,
  context: InvocationContext,
  params: {
    resourceKind: ListingResourceKind;
    itemsKey: string;
    filter?: ListingFilter;
    input: ListInput;
    /** Keep only these fields of each item */
    fields?: readonly string[];
  }
): Promise<Result<ListingOutput>> {
  const { resourceKind, itemsKey, input, fields } = params;

  let resumeCursor: ListingCursor | undefined;
  if (input.cursor !== undefined) {
    const decoded = decodeListingCursor(input.cursor, resourceKind);
    if (!decoded.success) return decoded;
    resumeCursor = decoded.data;
  }

  const assembled = await assembleListing(
    deps.listings,
    resourceKind,
    params.filter ?? {},
    { maxItems: input.max_items ?? input.page_size },
    { resumeCursor, bestEffort: input.best_effort, retry: context.retry }
  );
  if (!assembled.success) return assembled;

  const result = assembled.data;
  const items = fields ? result.itemsSoFar.map((item) => pick(item, fields)) : result.itemsSoFar;

  const output: ListingOutput = {
    [itemsKey]: items,
    count: items.length,
    truncated: result.truncated,
    next_cursor: result.cursor ? encodeCursor(result.cursor) : null,
    total_known: result.totalKnown,
  };
  if (result.failure) {
    output.error = summarizeFailure(result.failure.error, result.failure.index);
  }
  return { success: true, data: output };
}

export function summarizeFailure(
  error: ClassifiedError,
  index: number
): { kind: string; message: string; guidance: string; failed_at_index: number } {
  return { kind: error.kind, message: error.message, guidance: error.guidance, failed_at_index: index };
}

export function pick(item: ApiObject, fields: readonly string[]): ApiObject {
  const picked: ApiObject = {};
  for (const field of fields) {
    if (item[field] !== undefined) picked[field] = item[field];
  }
  return picked;
}
