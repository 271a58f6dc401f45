// =============================================================================
// PDF SCAN — Repository Contracts
//
// Three independent storage abstractions. Every implementation (in-memory,
// PostgreSQL, ...) must satisfy the ordering and error rules documented on
// each method; the pipeline relies on nothing else.
//
// All methods are async so in-process and networked stores share one shape.
// =============================================================================

import { Document, DocumentStatus, Finding, FindingType, Metric } from './entities';

// ── Documents ──────────────────────────────────────────────────────────

export interface IDocumentRepository {
  /** Implementation label for logs and /health */
  readonly backendName: string;

  /**
   * Upsert by id. Storing the same id again overwrites the record.
   */
  store(document: Document): Promise<void>;

  get(id: string): Promise<Document | null>;

  /**
   * Replace the status of an existing document. The error message is kept
   * only for 'failed'. Throws NotFoundError for an unknown id and never
   * creates a document.
   */
  updateStatus(id: string, status: DocumentStatus, errorMessage?: string | null): Promise<void>;

  /**
   * Newest upload first. An offset past the end yields an empty page.
   */
  list(limit: number, offset: number): Promise<Document[]>;
}

// ── Findings ───────────────────────────────────────────────────────────

export interface IFindingRepository {
  readonly backendName: string;

  store(finding: Finding): Promise<void>;

  /**
   * Findings of one document, highest confidence first.
   * Equal confidences keep insertion order.
   */
  getByDocument(documentId: string): Promise<Finding[]>;

  /**
   * Same order as getByDocument. The type filter is applied before
   * pagination.
   */
  getAll(limit: number, offset: number, findingType?: FindingType): Promise<Finding[]>;

  /** Total, or restricted to one document and/or one finding type. */
  count(documentId?: string, findingType?: FindingType): Promise<number>;
}

// ── Metrics ────────────────────────────────────────────────────────────

export interface MetricQuery {
  operation?: string;
  documentId?: string;
  /** Inclusive */
  startTime?: Date;
  /** Inclusive */
  endTime?: Date;
  limit: number;
  offset: number;
}

export interface OperationSummary {
  operation: string;
  count: number;
  averageDurationMs: number;
}

export interface IMetricsRepository {
  readonly backendName: string;

  /** Append. Metrics are never updated. */
  store(metric: Metric): Promise<void>;

  /**
   * Newest first. Supplied filters are combined with AND.
   */
  query(filters: MetricQuery): Promise<Metric[]>;

  /**
   * Mean durationMs of the matching metrics, 0 when none match.
   */
  averageDuration(operation: string, startTime?: Date, endTime?: Date): Promise<number>;

  /**
   * Count and mean duration per operation, ordered by operation name.
   */
  summarize(filters?: { operation?: string; startTime?: Date; endTime?: Date }): Promise<OperationSummary[]>;
}
