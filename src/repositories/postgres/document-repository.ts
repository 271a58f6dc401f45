// =============================================================================
// PDF SCAN — PostgreSQL Document Repository
//
// Durable IDocumentRepository over the `documents` table (db/schema.sql).
// Writes are single statements, so concurrent pipeline runs are serialised
// by PostgreSQL row locking; no application-level lock is needed.
// =============================================================================

import { QueryResultRow } from 'pg';
import { Document, DocumentStatus, isDocumentStatus } from '../../types/entities';
import { NotFoundError, StorageError } from '../../types/errors';
import { IDocumentRepository } from '../../types/repositories';
import { Queryable, runQuery, toDate } from './queryable';

const DOCUMENT_COLUMNS = 'id, filename, upload_time, status, file_size, error_message';

function rowToDocument(row: QueryResultRow): Document {
  const status = String(row.status);
  if (!isDocumentStatus(status)) {
    throw new StorageError(`Unknown document status in store: ${status}`);
  }

  return {
    id: String(row.id),
    filename: String(row.filename),
    uploadTime: toDate(row.upload_time),
    status,
    // BIGINT arrives as a string
    fileSize: Number(row.file_size),
    errorMessage: row.error_message ? String(row.error_message) : null,
  };
}

export class PostgresDocumentRepository implements IDocumentRepository {
  readonly backendName = 'postgres';

  constructor(private readonly db: Queryable) {}

  async store(document: Document): Promise<void> {
    await runQuery(
      this.db,
      'store document',
      `INSERT INTO documents (${DOCUMENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (id) DO UPDATE
         SET filename = EXCLUDED.filename,
             upload_time = EXCLUDED.upload_time,
             status = EXCLUDED.status,
             file_size = EXCLUDED.file_size,
             error_message = EXCLUDED.error_message`,
      [
        document.id,
        document.filename,
        document.uploadTime,
        document.status,
        document.fileSize,
        document.errorMessage,
      ]
    );
  }

  async get(id: string): Promise<Document | null> {
    const result = await runQuery(
      this.db,
      'get document',
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1`,
      [id]
    );

    return result.rows.length === 0 ? null : rowToDocument(result.rows[0]);
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    errorMessage?: string | null
  ): Promise<void> {
    const result = await runQuery(
      this.db,
      'update document status',
      `UPDATE documents SET status = $2, error_message = $3 WHERE id = $1`,
      [id, status, status === 'failed' ? errorMessage ?? null : null]
    );

    if (!result.rowCount) {
      throw new NotFoundError(`Document not found: ${id}`);
    }
  }

  async list(limit: number, offset: number): Promise<Document[]> {
    const result = await runQuery(
      this.db,
      'list documents',
      `SELECT ${DOCUMENT_COLUMNS}
       FROM documents
       ORDER BY upload_time DESC, seq ASC
       LIMIT $1 OFFSET $2`,
      [limit, offset]
    );

    return result.rows.map(rowToDocument);
  }
}
