// =============================================================================
// PDF SCAN — Response Shapes
//
// Entities are camelCase internally; the HTTP API speaks snake_case.
// =============================================================================

import { Document, Finding } from '../types/entities';
import { OperationSummary } from '../types/repositories';

export function documentView(document: Document) {
  return {
    document_id: document.id,
    filename: document.filename,
    upload_time: document.uploadTime.toISOString(),
    status: document.status,
    file_size: document.fileSize,
    error_message: document.errorMessage,
  };
}

/** A finding listed under its own document. */
export function findingView(finding: Finding) {
  return {
    id: finding.id,
    type: finding.findingType,
    location: finding.location,
    confidence: finding.confidence,
  };
}

/** A finding listed across documents. */
export function findingWithDocumentView(finding: Finding) {
  return {
    id: finding.id,
    document_id: finding.documentId,
    type: finding.findingType,
    location: finding.location,
    confidence: finding.confidence,
  };
}

export function operationSummaryView(summary: OperationSummary) {
  return {
    operation: summary.operation,
    count: summary.count,
    average_duration_ms: summary.averageDurationMs,
  };
}
