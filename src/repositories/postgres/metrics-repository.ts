// =============================================================================
// PDF SCAN — PostgreSQL Metrics Repository
//
// Metadata is stored as serialized JSON text. Filters are assembled into a
// parameterised WHERE clause; every supplied filter narrows the result.
// =============================================================================

import { QueryResultRow } from 'pg';
import { Metric } from '../../types/entities';
import { StorageError } from '../../types/errors';
import { IMetricsRepository, MetricQuery, OperationSummary } from '../../types/repositories';
import { Queryable, runQuery, toDate } from './queryable';

const METRIC_COLUMNS = 'id, operation, duration_ms, "timestamp", document_id, metadata';

function parseMetadata(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string' || raw.length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StorageError('Malformed metric metadata in store', { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function rowToMetric(row: QueryResultRow): Metric {
  return {
    id: String(row.id),
    operation: String(row.operation),
    durationMs: Number(row.duration_ms),
    timestamp: toDate(row.timestamp),
    documentId: row.document_id ? String(row.document_id) : null,
    metadata: parseMetadata(row.metadata),
  };
}

/**
 * Build a WHERE clause from the supplied filters. Placeholders start at
 * `firstParam` so callers can reserve earlier ones.
 */
function buildConditions(
  filters: { operation?: string; documentId?: string; startTime?: Date; endTime?: Date },
  firstParam = 1
): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let paramIndex = firstParam;

  if (filters.operation !== undefined) {
    conditions.push(`operation = $${paramIndex++}`);
    params.push(filters.operation);
  }
  if (filters.documentId !== undefined) {
    conditions.push(`document_id = $${paramIndex++}`);
    params.push(filters.documentId);
  }
  if (filters.startTime) {
    conditions.push(`"timestamp" >= $${paramIndex++}`);
    params.push(filters.startTime);
  }
  if (filters.endTime) {
    conditions.push(`"timestamp" <= $${paramIndex++}`);
    params.push(filters.endTime);
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

export class PostgresMetricsRepository implements IMetricsRepository {
  readonly backendName = 'postgres';

  constructor(private readonly db: Queryable) {}

  async store(metric: Metric): Promise<void> {
    await runQuery(
      this.db,
      'store metric',
      `INSERT INTO metrics (${METRIC_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        metric.id,
        metric.operation,
        metric.durationMs,
        metric.timestamp,
        metric.documentId,
        JSON.stringify(metric.metadata),
      ]
    );
  }

  async query(filters: MetricQuery): Promise<Metric[]> {
    // $1 and $2 are LIMIT / OFFSET
    const { where, params } = buildConditions(filters, 3);

    const result = await runQuery(
      this.db,
      'query metrics',
      `SELECT ${METRIC_COLUMNS}
       FROM metrics
       ${where}
       ORDER BY "timestamp" DESC, seq ASC
       LIMIT $1 OFFSET $2`,
      [filters.limit, filters.offset, ...params]
    );

    return result.rows.map(rowToMetric);
  }

  async averageDuration(operation: string, startTime?: Date, endTime?: Date): Promise<number> {
    const { where, params } = buildConditions({ operation, startTime, endTime });

    const result = await runQuery(
      this.db,
      'average metric duration',
      `SELECT AVG(duration_ms) AS avg_duration FROM metrics ${where}`,
      params
    );

    const avg = result.rows.length === 0 ? null : result.rows[0].avg_duration;
    return avg === null || avg === undefined ? 0 : Number(avg);
  }

  async summarize(
    filters: { operation?: string; startTime?: Date; endTime?: Date } = {}
  ): Promise<OperationSummary[]> {
    const { where, params } = buildConditions(filters);

    const result = await runQuery(
      this.db,
      'summarize metrics',
      `SELECT operation, COUNT(*) AS count, AVG(duration_ms) AS average_duration_ms
       FROM metrics
       ${where}
       GROUP BY operation
       ORDER BY operation COLLATE "C"`,
      params
    );

    return result.rows.map(row => ({
      operation: String(row.operation),
      count: Number(row.count),
      averageDurationMs: Number(row.average_duration_ms),
    }));
  }
}
