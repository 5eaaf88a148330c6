/**
 * Resource listing assembly.
 *
 * Follows a listing's page tokens, one page at a time through the retry
 * coordinator, until the remote runs out of pages or `maxItems` is reached.
 * Items keep the order the remote yields them.
 */

import { withRetry } from '../retry/retry.js';
import { createClassifiedError, type ClassifiedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { ResultAccumulator } from './accumulator.js';
import type {
  AssembledResult,
  AssemblyOptions,
  ListingCursor,
  ListingFilter,
  ListingLimits,
  ListingPage,
  ListingSource,
} from './types.js';

export const DEFAULT_LIST_MAX_ITEMS = 100;
export const LIST_MAX_ITEMS_CEILING = 1000;

export type ListingAssembly<T> = AssembledResult<T, ListingCursor>;

export function clampMaxItems(maxItems: number | undefined): number {
  if (maxItems === undefined || !Number.isFinite(maxItems)) return DEFAULT_LIST_MAX_ITEMS;
  return Math.min(LIST_MAX_ITEMS_CEILING, Math.max(1, Math.floor(maxItems)));
}

export async function assembleListing<T>(
  source: ListingSource<T>,
  resourceKind: string,
  filter: ListingFilter,
  limits: ListingLimits = {},
  options: AssemblyOptions<ListingCursor> = {}
): Promise<Result<ListingAssembly<T>>> {
  const { resumeCursor, bestEffort = false } = options;

  if (resumeCursor && resumeCursor.resourceKind !== resourceKind) {
    return {
      success: false,
      error: createClassifiedError(
        'BadRequestError',
        `Cursor belongs to ${resumeCursor.resourceKind}, not ${resourceKind}`
      ),
    };
  }

  const maxItems = clampMaxItems(limits.maxItems);
  const pageSize = resumeCursor?.pageSize ?? maxItems;
  const accumulator = new ResultAccumulator<T>(maxItems, limits.maxBytes);

  let pageToken = resumeCursor?.pageToken ?? null;
  let skip = resumeCursor?.rowOffset ?? 0;
  let totalKnown: number | null = null;
  let pageIndex = 0;

  const cursorAt = (token: string | null, rowOffset: number): ListingCursor => ({
    type: 'listing',
    resourceKind,
    pageToken: token,
    rowOffset,
    pageSize,
  });

  for (;;) {
    if (accumulator.isFull) {
      return { success: true, data: truncated(accumulator, cursorAt(pageToken, 0), totalKnown) };
    }

    const token = pageToken;
    const fetched = await withRetry<ListingPage<T>>(
      ({ signal }) =>
        token === null
          ? source.fetchFirstPage(resourceKind, filter, pageSize, signal)
          : source.fetchNextPage(resourceKind, token, pageSize, filter, signal),
      { ...options.retry, operation: `listing.${resourceKind}` }
    );
    if (!fetched.success) {
      return fail(fetched.error, pageIndex, accumulator, cursorAt(token, skip), totalKnown, bestEffort);
    }

    const page = fetched.data;
    totalKnown = page.totalKnown ?? totalKnown;

    for (let i = skip; i < page.items.length; i++) {
      if (!accumulator.admit(page.items[i])) {
        return { success: true, data: truncated(accumulator, cursorAt(token, i), totalKnown) };
      }
    }

    if (page.nextPageToken === null) {
      return {
        success: true,
        data: {
          itemsSoFar: accumulator.items,
          cursor: null,
          isComplete: true,
          truncated: false,
          totalKnown,
          bytesSoFar: accumulator.bytesSoFar,
        },
      };
    }

    pageToken = page.nextPageToken;
    skip = 0;
    pageIndex++;
  }
}

/**
 * Lazily yield every item of a listing, fetching the next page only once the
 * consumer has drained the current one. Failures throw the ClassifiedError.
 */
export async function* streamListing<T>(
  source: ListingSource<T>,
  resourceKind: string,
  filter: ListingFilter,
  options: Pick<AssemblyOptions<ListingCursor>, 'resumeCursor' | 'retry'> & { pageSize?: number } = {}
): AsyncGenerator<T, void, undefined> {
  const { resumeCursor } = options;
  const pageSize = resumeCursor?.pageSize ?? clampMaxItems(options.pageSize);

  let pageToken = resumeCursor?.pageToken ?? null;
  let skip = resumeCursor?.rowOffset ?? 0;

  for (;;) {
    const token = pageToken;
    const fetched = await withRetry<ListingPage<T>>(
      ({ signal }) =>
        token === null
          ? source.fetchFirstPage(resourceKind, filter, pageSize, signal)
          : source.fetchNextPage(resourceKind, token, pageSize, filter, signal),
      { ...options.retry, operation: `listing.${resourceKind}` }
    );
    if (!fetched.success) throw fetched.error;

    const { items, nextPageToken } = fetched.data;
    for (let i = skip; i < items.length; i++) {
      yield items[i];
    }

    if (nextPageToken === null) return;
    pageToken = nextPageToken;
    skip = 0;
  }
}

function truncated<T>(
  accumulator: ResultAccumulator<T>,
  cursor: ListingCursor,
  totalKnown: number | null
): ListingAssembly<T> {
  logger.info({
    event: 'assembly.truncated',
    kind: 'listing',
    resourceKind: cursor.resourceKind,
    items: accumulator.items.length,
    bytes: accumulator.bytesSoFar,
  });
  return {
    itemsSoFar: accumulator.items,
    cursor,
    isComplete: false,
    truncated: true,
    totalKnown,
    bytesSoFar: accumulator.bytesSoFar,
  };
}

function fail<T>(
  error: ClassifiedError,
  index: number,
  accumulator: ResultAccumulator<T>,
  cursor: ListingCursor,
  totalKnown: number | null,
  bestEffort: boolean
): Result<ListingAssembly<T>> {
  logger.classifiedError(error, {
    event: 'assembly.failed',
    kind: 'listing',
    resourceKind: cursor.resourceKind,
    index,
    bestEffort,
  });
  if (!bestEffort) return { success: false, error };

  return {
    success: true,
    data: {
      itemsSoFar: accumulator.items,
      cursor,
      isComplete: false,
      truncated: false,
      totalKnown,
      bytesSoFar: accumulator.bytesSoFar,
      failure: { error, index },
    },
  };
}
