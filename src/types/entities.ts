// =============================================================================
// PDF SCAN — Entity Model
//
// Document, Finding and Metric are independent top-level records. They are
// correlated by documentId only; none of them owns another.
//
// Entities are plain readonly objects. They are created through the
// factories below and "changed" only by producing a new object, so a
// repository never sees a half-updated record.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';

// ── Document ───────────────────────────────────────────────────────────

export const DOCUMENT_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type DocumentStatus = typeof DOCUMENT_STATUSES[number];

export interface Document {
  readonly id: string;
  readonly filename: string;
  readonly uploadTime: Date;
  readonly status: DocumentStatus;
  /** Size in bytes */
  readonly fileSize: number;
  /** Set only while status is 'failed' */
  readonly errorMessage: string | null;
}

export function isDocumentStatus(value: string): value is DocumentStatus {
  return (DOCUMENT_STATUSES as readonly string[]).includes(value);
}

/**
 * New document in 'pending' state with a generated id and upload time.
 */
export function createDocument(filename: string, fileSize: number): Document {
  if (!Number.isInteger(fileSize) || fileSize < 0) {
    throw new RangeError(`File size must be a non-negative integer, got ${fileSize}`);
  }

  return {
    id: uuidv4(),
    filename,
    uploadTime: new Date(),
    status: 'pending',
    fileSize,
    errorMessage: null,
  };
}

/**
 * Status transition. The error message survives only on 'failed'.
 */
export function withStatus(
  document: Document,
  status: DocumentStatus,
  errorMessage?: string | null
): Document {
  return {
    ...document,
    status,
    errorMessage: status === 'failed' ? errorMessage ?? null : null,
  };
}

// ── Finding ────────────────────────────────────────────────────────────

/** Kinds of sensitive data the scanners know about. Extend here. */
export const FINDING_TYPES = ['ssn', 'email'] as const;

export type FindingType = typeof FINDING_TYPES[number];

/**
 * One detected occurrence of a sensitive pattern.
 * The matched text itself is never kept, only where it was found.
 */
export interface Finding {
  readonly id: string;
  readonly documentId: string;
  readonly findingType: FindingType;
  /** e.g. "page 2" */
  readonly location: string;
  /** 0.0 - 1.0 */
  readonly confidence: number;
}

export function isFindingType(value: string): value is FindingType {
  return (FINDING_TYPES as readonly string[]).includes(value);
}

export function createFinding(params: {
  documentId: string;
  findingType: FindingType;
  location: string;
  confidence?: number;
}): Finding {
  const confidence = params.confidence ?? 1.0;
  if (Number.isNaN(confidence) || confidence < 0 || confidence > 1) {
    throw new RangeError(`Confidence must be between 0 and 1, got ${confidence}`);
  }

  return {
    id: uuidv4(),
    documentId: params.documentId,
    findingType: params.findingType,
    location: params.location,
    confidence,
  };
}

/** Same finding, attributed to another document. */
export function withDocumentId(finding: Finding, documentId: string): Finding {
  return { ...finding, documentId };
}

// ── Metric ─────────────────────────────────────────────────────────────

export interface Metric {
  readonly id: string;
  /** "upload", "scan", ... */
  readonly operation: string;
  readonly durationMs: number;
  readonly timestamp: Date;
  readonly documentId: string | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export function createMetric(params: {
  operation: string;
  durationMs: number;
  documentId?: string | null;
  metadata?: Record<string, unknown>;
}): Metric {
  if (Number.isNaN(params.durationMs) || params.durationMs < 0) {
    throw new RangeError(`Duration must be >= 0, got ${params.durationMs}`);
  }

  return {
    id: uuidv4(),
    operation: params.operation,
    durationMs: params.durationMs,
    timestamp: new Date(),
    documentId: params.documentId ?? null,
    metadata: { ...(params.metadata || {}) },
  };
}
