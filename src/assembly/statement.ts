/**
 * Statement result assembly.
 *
 * Walks a statement's result chunks in order, 0..totalChunkCount-1, one
 * fetch at a time through the retry coordinator, until the result is
 * exhausted or a cap (items or approximate bytes) stops it. A stopped
 * assembly returns a StatementCursor that resumes at the first row not yet
 * returned, re-fetching a partially consumed chunk.
 *
 * A statement that vanished (404, CLOSED, CANCELED) while resuming or
 * mid-assembly yields StaleCursor, which is never retried.
 *
 * @see https://docs.databricks.com/api/workspace/statementexecution/getstatementresultchunkn
 */

import { withRetry } from '../retry/retry.js';
import { createClassifiedError, type ClassifiedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { ResultAccumulator } from './accumulator.js';
import type {
  AssembledResult,
  AssemblyOptions,
  StatementCursor,
  StatementLimits,
  StatementRow,
  StatementSnapshot,
  StatementSource,
} from './types.js';

export type StatementAssembly = AssembledResult<StatementRow, StatementCursor>;

export interface StatementAssemblyOptions extends AssemblyOptions<StatementCursor> {
  /** First-chunk snapshot already in hand, e.g. from executing the statement */
  initial?: StatementSnapshot;
}

const VANISHED_STATES = new Set(['CLOSED', 'CANCELED']);

export async function assembleStatementResult(
  source: StatementSource,
  statementId: string,
  limits: StatementLimits,
  options: StatementAssemblyOptions = {}
): Promise<Result<StatementAssembly>> {
  const { resumeCursor, bestEffort = false } = options;
  const resuming = resumeCursor !== undefined;

  if (resumeCursor && resumeCursor.statementId !== statementId) {
    return {
      success: false,
      error: createClassifiedError(
        'BadRequestError',
        `Cursor belongs to statement ${resumeCursor.statementId}, not ${statementId}`
      ),
    };
  }

  const accumulator = new ResultAccumulator<StatementRow>(limits.maxItems, limits.maxBytes);

  let snapshot: StatementSnapshot;
  if (options.initial && !resuming) {
    snapshot = options.initial;
    const stateError = checkState(snapshot, resuming);
    if (stateError) return { success: false, error: stateError };
  } else {
    const fetched = await withRetry(
      ({ signal }) => fetchSettled(source, statementId, resuming, signal),
      { ...options.retry, operation: 'statement.get' }
    );
    if (!fetched.success) {
      const error = resuming ? toStaleCursor(fetched.error, statementId) : fetched.error;
      return fail(
        error,
        0,
        accumulator,
        null,
        resumeCursor ?? { type: 'statement', statementId, nextChunkIndex: 0, rowOffset: 0 },
        bestEffort
      );
    }
    snapshot = fetched.data;
  }

  const totalChunkCount = snapshot.manifest?.totalChunkCount ?? (snapshot.rows.length > 0 ? 1 : 0);
  const totalKnown = snapshot.manifest?.totalRowCount ?? null;
  const startChunk = resumeCursor?.nextChunkIndex ?? 0;
  const startOffset = resumeCursor?.rowOffset ?? 0;

  if (resumeCursor && startChunk >= totalChunkCount) {
    return {
      success: false,
      error: createClassifiedError(
        'StaleCursor',
        `Cursor points at chunk ${startChunk} but statement ${statementId} has ${totalChunkCount} chunks`
      ),
    };
  }

  // A single-chunk result goes through the caps like any other, rather than
  // being returned whole; an oversized inline chunk still gets a cursor.
  for (let chunkIndex = startChunk; chunkIndex < totalChunkCount; chunkIndex++) {
    if (accumulator.isFull) {
      return { success: true, data: truncated(accumulator, statementId, chunkIndex, 0, totalKnown) };
    }

    let rows: StatementRow[];
    if (chunkIndex === 0) {
      rows = snapshot.rows;
    } else {
      const fetched = await withRetry(
        ({ signal }) => source.fetchStatementChunk(statementId, chunkIndex, signal),
        { ...options.retry, operation: 'statement.chunk' }
      );
      if (!fetched.success) {
        const offset = chunkIndex === startChunk ? startOffset : 0;
        return fail(
          toStaleCursor(fetched.error, statementId),
          chunkIndex,
          accumulator,
          totalKnown,
          { type: 'statement', statementId, nextChunkIndex: chunkIndex, rowOffset: offset },
          bestEffort
        );
      }
      rows = fetched.data;
    }

    const offset = chunkIndex === startChunk ? startOffset : 0;
    for (let rowIndex = offset; rowIndex < rows.length; rowIndex++) {
      if (!accumulator.admit(rows[rowIndex])) {
        return {
          success: true,
          data: truncated(accumulator, statementId, chunkIndex, rowIndex, totalKnown),
        };
      }
    }
  }

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

/**
 * First chunk of a statement that has reached SUCCEEDED. Any other state is
 * thrown as its ClassifiedError so the retry coordinator backs off on
 * PENDING / RUNNING and stops on the terminal states.
 */
async function fetchSettled(
  source: StatementSource,
  statementId: string,
  resuming: boolean,
  signal: AbortSignal | undefined
): Promise<StatementSnapshot> {
  const snapshot = await source.fetchStatementFirstChunk(statementId, signal);
  const stateError = checkState(snapshot, resuming);
  if (stateError) throw stateError;
  return snapshot;
}

function checkState(snapshot: StatementSnapshot, resuming: boolean): ClassifiedError | null {
  const { state, statementId } = snapshot;
  if (state === 'SUCCEEDED') return null;

  if (VANISHED_STATES.has(state)) {
    return resuming
      ? createClassifiedError('StaleCursor', `Statement ${statementId} is ${state}; its result is gone`)
      : createClassifiedError('NotFoundError', `Statement ${statementId} is ${state}; its result is gone`);
  }
  if (state === 'FAILED') {
    return createClassifiedError(
      'BadRequestError',
      `Statement ${statementId} failed: ${snapshot.errorMessage ?? 'no error message'}`
    );
  }
  return createClassifiedError('ResourceNotReady', `Statement ${statementId} is still ${state}`);
}

/**
 * A statement that can no longer be found while walking its chunks means the
 * cursor (explicit or internal) is stale.
 */
function toStaleCursor(error: ClassifiedError, statementId: string): ClassifiedError {
  if (error.kind !== 'NotFoundError') return error;
  return createClassifiedError(
    'StaleCursor',
    `Statement ${statementId} no longer exists or its result expired`,
    { httpStatus: error.httpStatus, errorCode: error.errorCode, history: error.history, cause: error }
  );
}

function truncated(
  accumulator: ResultAccumulator<StatementRow>,
  statementId: string,
  nextChunkIndex: number,
  rowOffset: number,
  totalKnown: number | null
): StatementAssembly {
  logger.info({
    event: 'assembly.truncated',
    kind: 'statement',
    statementId,
    items: accumulator.items.length,
    bytes: accumulator.bytesSoFar,
    nextChunkIndex,
    rowOffset,
  });
  return {
    itemsSoFar: accumulator.items,
    cursor: { type: 'statement', statementId, nextChunkIndex, rowOffset },
    isComplete: false,
    truncated: true,
    totalKnown,
    bytesSoFar: accumulator.bytesSoFar,
  };
}

function fail(
  error: ClassifiedError,
  index: number,
  accumulator: ResultAccumulator<StatementRow>,
  totalKnown: number | null,
  cursor: StatementCursor,
  bestEffort: boolean
): Result<StatementAssembly> {
  logger.classifiedError(error, { event: 'assembly.failed', kind: 'statement', index, bestEffort });
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

/**
 * Lazily yield every row of a statement result, fetching chunk N+1 only once
 * the consumer has drained chunk N. No caps apply; failures throw the
 * ClassifiedError.
 */
export async function* streamStatementRows(
  source: StatementSource,
  statementId: string,
  options: Pick<StatementAssemblyOptions, 'initial' | 'resumeCursor' | 'retry'> = {}
): AsyncGenerator<StatementRow, void, undefined> {
  const { resumeCursor } = options;
  const resuming = resumeCursor !== undefined;

  let snapshot: StatementSnapshot;
  if (options.initial && !resuming) {
    snapshot = options.initial;
    const stateError = checkState(snapshot, resuming);
    if (stateError) throw stateError;
  } else {
    const fetched = await withRetry(
      ({ signal }) => fetchSettled(source, statementId, resuming, signal),
      { ...options.retry, operation: 'statement.get' }
    );
    if (!fetched.success) {
      throw resuming ? toStaleCursor(fetched.error, statementId) : fetched.error;
    }
    snapshot = fetched.data;
  }

  const totalChunkCount = snapshot.manifest?.totalChunkCount ?? (snapshot.rows.length > 0 ? 1 : 0);
  const startChunk = resumeCursor?.nextChunkIndex ?? 0;
  const startOffset = resumeCursor?.rowOffset ?? 0;

  for (let chunkIndex = startChunk; chunkIndex < totalChunkCount; chunkIndex++) {
    let rows: StatementRow[];
    if (chunkIndex === 0) {
      rows = snapshot.rows;
    } else {
      const fetched = await withRetry(
        ({ signal }) => source.fetchStatementChunk(statementId, chunkIndex, signal),
        { ...options.retry, operation: 'statement.chunk' }
      );
      if (!fetched.success) throw toStaleCursor(fetched.error, statementId);
      rows = fetched.data;
    }

    const offset = chunkIndex === startChunk ? startOffset : 0;
    for (let rowIndex = offset; rowIndex < rows.length; rowIndex++) {
      yield rows[rowIndex];
    }
  }
}
