// =============================================================================
// PDF SCAN — PostgreSQL Query Helpers
//
// Repositories depend on this narrow Queryable shape rather than on Pool,
// so a pg.Pool, a checked-out PoolClient or a test double can stand behind
// them.
// =============================================================================

import { QueryResultRow } from 'pg';
import { StorageError, errorMessageOf } from '../../types/errors';

export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

/**
 * Run one statement. Driver failures surface as StorageError with the
 * original error attached as `cause`.
 */
export async function runQuery(
  db: Queryable,
  operation: string,
  text: string,
  values: unknown[] = []
): Promise<{ rows: QueryResultRow[]; rowCount: number | null }> {
  try {
    return await db.query(text, values);
  } catch (err) {
    throw new StorageError(`${operation} failed: ${errorMessageOf(err)}`, { cause: err });
  }
}

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(String(value));
}
