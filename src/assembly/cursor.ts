/**
 * Opaque cursor tokens.
 *
 * Cursors leave the process as base64url-encoded JSON so callers treat them
 * as opaque strings. Decoding validates the shape; anything malformed is a
 * BadRequestError.
 */

import { z } from 'zod';
import { createClassifiedError, type ClassifiedError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';
import type { ChunkCursor, ListingCursor, StatementCursor } from './types.js';

const statementCursorSchema = z.object({
  type: z.literal('statement'),
  statementId: z.string().min(1),
  nextChunkIndex: z.number().int().nonnegative(),
  rowOffset: z.number().int().nonnegative(),
});

const listingCursorSchema = z.object({
  type: z.literal('listing'),
  resourceKind: z.string().min(1),
  pageToken: z.string().min(1).nullable(),
  rowOffset: z.number().int().nonnegative(),
  pageSize: z.number().int().positive(),
});

const cursorSchema = z.discriminatedUnion('type', [statementCursorSchema, listingCursorSchema]);

export function encodeCursor(cursor: ChunkCursor): string {
  return Buffer.from(JSON.stringify(cursor), 'utf8').toString('base64url');
}

export function decodeCursor(token: string): Result<ChunkCursor> {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    return { success: false, error: malformed('not a cursor token') };
  }

  const parsed = cursorSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: malformed('unrecognized cursor contents') };
  }
  return { success: true, data: parsed.data };
}

export function decodeStatementCursor(token: string, statementId?: string): Result<StatementCursor> {
  const decoded = decodeCursor(token);
  if (!decoded.success) return decoded;

  const cursor = decoded.data;
  if (cursor.type !== 'statement') {
    return { success: false, error: malformed('cursor belongs to a resource listing') };
  }
  if (statementId !== undefined && cursor.statementId !== statementId) {
    return {
      success: false,
      error: malformed(`cursor belongs to statement ${cursor.statementId}, not ${statementId}`),
    };
  }
  return { success: true, data: cursor };
}

export function decodeListingCursor(token: string, resourceKind: string): Result<ListingCursor> {
  const decoded = decodeCursor(token);
  if (!decoded.success) return decoded;

  const cursor = decoded.data;
  if (cursor.type !== 'listing') {
    return { success: false, error: malformed('cursor belongs to a statement result') };
  }
  if (cursor.resourceKind !== resourceKind) {
    return {
      success: false,
      error: malformed(`cursor belongs to ${cursor.resourceKind}, not ${resourceKind}`),
    };
  }
  return { success: true, data: cursor };
}

function malformed(reason: string): ClassifiedError {
  return createClassifiedError('BadRequestError', `Invalid cursor: ${reason}`);
}
