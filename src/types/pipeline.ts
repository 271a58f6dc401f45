// =============================================================================
// PDF SCAN — Document Pipeline Types
//
// Types for the upload pipeline: upload rules, the request handed to the
// pipeline, and the outcome it reports back to the HTTP layer.
// =============================================================================

import { DocumentStatus } from './entities';
import { ErrorKind } from './errors';

/**
 * Upload rules. Only PDFs are accepted.
 */
export const ALLOWED_CONTENT_TYPES: readonly string[] = ['application/pdf'];
export const ALLOWED_EXTENSIONS: readonly string[] = ['.pdf'];

/**
 * What the HTTP layer knows about an incoming file before validation.
 */
export interface UploadCandidate {
  filename: string | undefined;
  /** Advisory; declared by the client */
  contentType: string | undefined;
  size: number;
  content: Buffer;
}

/**
 * A validated upload handed to the pipeline.
 */
export interface UploadRequest {
  filename: string;
  fileSize: number;
  content: Buffer;
}

/**
 * Response payload of a successful upload. Field names are the wire names.
 */
export interface UploadResponse {
  document_id: string;
  filename: string;
  status: DocumentStatus;
  /** ISO-8601 */
  upload_time: string;
  file_size: number;
  findings_count: number;
}

/**
 * Result of one pipeline run. A failure has already been recorded on the
 * document (status 'failed') and its temp file removed by the time the
 * caller sees it. `error` is the original thrown value, untouched.
 */
export type PipelineOutcome =
  | { ok: true; response: UploadResponse }
  | { ok: false; kind: ErrorKind; message: string; documentId: string; error: unknown };

export interface PipelineOptions {
  /** Directory for the scan's temporary file. Defaults to config. */
  tempDir?: string;
}
