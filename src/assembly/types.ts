/**
 * Chunked result assembly types.
 *
 * The sources are the remote surface the assemblers consume; the Databricks
 * implementations live in databricks/sources.ts and tests substitute
 * in-memory ones.
 */

import type { ClassifiedError } from '../utils/errors.js';
import type { RetryOptions } from '../retry/retry.js';

// ─────────────────────────────────────────────────────────────────────────────
// Cursors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resume position in a statement result: the next chunk to read and how many
 * of its rows were already returned.
 */
export interface StatementCursor {
  readonly type: 'statement';
  readonly statementId: string;
  readonly nextChunkIndex: number;
  readonly rowOffset: number;
}

/**
 * Resume position in a resource listing. `pageToken` is null for the first
 * page; `pageSize` is the hint the page was fetched with, so a partially
 * consumed page is re-fetched with identical boundaries.
 */
export interface ListingCursor {
  readonly type: 'listing';
  readonly resourceKind: string;
  readonly pageToken: string | null;
  readonly rowOffset: number;
  readonly pageSize: number;
}

export type ChunkCursor = StatementCursor | ListingCursor;

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

export interface AssemblyFailure {
  readonly error: ClassifiedError;
  /** Chunk index (statements) or page index within this call (listings) */
  readonly index: number;
}

export interface AssembledResult<T, C extends ChunkCursor = ChunkCursor> {
  itemsSoFar: T[];
  /** Where a follow-up call resumes; null once complete */
  cursor: C | null;
  isComplete: boolean;
  /** A cap stopped the assembly before the remote ran out of items */
  truncated: boolean;
  totalKnown: number | null;
  bytesSoFar: number;
  /** Set only in best-effort mode when a fetch failed */
  failure?: AssemblyFailure;
}

export interface AssemblyOptions<C extends ChunkCursor> {
  resumeCursor?: C;
  /** Return the partial result with `failure` instead of discarding it */
  bestEffort?: boolean;
  retry?: Omit<RetryOptions, 'operation'>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Statement source
// ─────────────────────────────────────────────────────────────────────────────

export type StatementState = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELED' | 'CLOSED';

export type StatementRow = Array<string | null>;

export interface StatementManifest {
  totalChunkCount: number;
  totalRowCount: number | null;
  schema: unknown;
}

export interface StatementSnapshot {
  statementId: string;
  state: StatementState;
  /** Rows of chunk 0, when the result is available */
  rows: StatementRow[];
  manifest: StatementManifest | null;
  /** Remote failure description for FAILED statements */
  errorMessage?: string;
}

export interface StatementSource {
  fetchStatementFirstChunk(statementId: string, signal?: AbortSignal): Promise<StatementSnapshot>;
  fetchStatementChunk(
    statementId: string,
    chunkIndex: number,
    signal?: AbortSignal
  ): Promise<StatementRow[]>;
}

export interface StatementLimits {
  maxItems: number;
  maxBytes: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Listing source
// ─────────────────────────────────────────────────────────────────────────────

export type FilterValue = string | number | boolean | undefined;

export type ListingFilter = Readonly<Record<string, FilterValue>>;

export interface ListingPage<T> {
  items: T[];
  nextPageToken: string | null;
  totalKnown: number | null;
}

export interface ListingSource<T> {
  fetchFirstPage(
    resourceKind: string,
    filter: ListingFilter,
    pageSize: number,
    signal?: AbortSignal
  ): Promise<ListingPage<T>>;
  fetchNextPage(
    resourceKind: string,
    pageToken: string,
    pageSize: number,
    filter: ListingFilter,
    signal?: AbortSignal
  ): Promise<ListingPage<T>>;
}

export interface ListingLimits {
  maxItems?: number;
  maxBytes?: number;
}
