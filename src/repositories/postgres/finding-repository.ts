// =============================================================================
// PDF SCAN — PostgreSQL Finding Repository
// =============================================================================

import { QueryResultRow } from 'pg';
import { Finding, FindingType, isFindingType } from '../../types/entities';
import { StorageError } from '../../types/errors';
import { IFindingRepository } from '../../types/repositories';
import { Queryable, runQuery } from './queryable';

const FINDING_COLUMNS = 'id, document_id, finding_type, location, confidence';

function rowToFinding(row: QueryResultRow): Finding {
  const findingType = String(row.finding_type);
  if (!isFindingType(findingType)) {
    throw new StorageError(`Unknown finding type in store: ${findingType}`);
  }

  return {
    id: String(row.id),
    documentId: String(row.document_id),
    findingType,
    location: String(row.location),
    confidence: Number(row.confidence),
  };
}

export class PostgresFindingRepository implements IFindingRepository {
  readonly backendName = 'postgres';

  constructor(private readonly db: Queryable) {}

  async store(finding: Finding): Promise<void> {
    await runQuery(
      this.db,
      'store finding',
      `INSERT INTO findings (${FINDING_COLUMNS})
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (id) DO UPDATE
         SET document_id = EXCLUDED.document_id,
             finding_type = EXCLUDED.finding_type,
             location = EXCLUDED.location,
             confidence = EXCLUDED.confidence`,
      [finding.id, finding.documentId, finding.findingType, finding.location, finding.confidence]
    );
  }

  async getByDocument(documentId: string): Promise<Finding[]> {
    const result = await runQuery(
      this.db,
      'get findings',
      `SELECT ${FINDING_COLUMNS}
       FROM findings
       WHERE document_id = $1
       ORDER BY confidence DESC, seq ASC`,
      [documentId]
    );

    return result.rows.map(rowToFinding);
  }

  async getAll(limit: number, offset: number, findingType?: FindingType): Promise<Finding[]> {
    const result = findingType
      ? await runQuery(
          this.db,
          'list findings',
          `SELECT ${FINDING_COLUMNS}
           FROM findings
           WHERE finding_type = $3
           ORDER BY confidence DESC, seq ASC
           LIMIT $1 OFFSET $2`,
          [limit, offset, findingType]
        )
      : await runQuery(
          this.db,
          'list findings',
          `SELECT ${FINDING_COLUMNS}
           FROM findings
           ORDER BY confidence DESC, seq ASC
           LIMIT $1 OFFSET $2`,
          [limit, offset]
        );

    return result.rows.map(rowToFinding);
  }

  async count(documentId?: string, findingType?: FindingType): Promise<number> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (documentId !== undefined) {
      params.push(documentId);
      conditions.push(`document_id = $${params.length}`);
    }
    if (findingType !== undefined) {
      params.push(findingType);
      conditions.push(`finding_type = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await runQuery(
      this.db,
      'count findings',
      `SELECT COUNT(*) AS total FROM findings ${where}`,
      params
    );

    // COUNT(*) is BIGINT, returned as a string
    return result.rows.length === 0 ? 0 : Number(result.rows[0].total);
  }
}
