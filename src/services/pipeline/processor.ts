// =============================================================================
// PDF SCAN — Document Processing Pipeline
//
// Drives one validated upload through its lifecycle:
//
//   1. Register document (pending)
//   2. Mark processing
//   3. Write bytes to a private temp file
//   4. Scan
//   5. Rebind findings to the document and store them
//   6. Mark completed, record the scan metric
//   7. On any scan-phase failure: mark failed with the error message
//   8. Remove the temp file, on every path
//   9. Record the upload metric (success only)
//  10. Re-read the document and build the response
//
// A document never leaves this module in 'processing'. Storage errors in
// steps 1, 2, 7, 9 and 10 are not caught here; they propagate to the caller,
// as does a document that has vanished by step 10.
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { config } from '../../config';
import { Backends } from '../../types/backends';
import { createDocument, createMetric, withDocumentId } from '../../types/entities';
import { StorageError, errorKindOf, errorMessageOf } from '../../types/errors';
import {
  PipelineOptions,
  PipelineOutcome,
  UploadRequest,
  UploadResponse,
} from '../../types/pipeline';
import { createLogger } from '../log';

const log = createLogger('Pipeline');

function tempFilePath(dir: string, documentId: string): string {
  const suffix = Math.random().toString(36).slice(2, 10);
  return path.join(dir, `pdf_scan_${documentId}_${suffix}.pdf`);
}

async function removeTempFile(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (err) {
    // Leftover temp file; does not change the outcome
    log.warn(`Could not remove temp file ${filePath}: ${errorMessageOf(err)}`);
  }
}

/**
 * Run the pipeline and report the outcome as a value.
 *
 * A scan-phase failure is returned as `{ ok: false }` after the document
 * has been marked failed. Storage failures outside the scan phase throw.
 */
export async function runUpload(
  request: UploadRequest,
  backends: Backends,
  options: PipelineOptions = {}
): Promise<PipelineOutcome> {
  const startedAt = Date.now();
  const tempDir = options.tempDir ?? config.upload.tempDir;

  // ── Steps 1–2: Register ─────────────────────────────────────────────

  const document = createDocument(request.filename, request.fileSize);
  await backends.document.store(document);
  await backends.document.updateStatus(document.id, 'processing');

  log.info(`Document ${document.id} registered (${request.fileSize} bytes)`);

  // ── Steps 3–8: Scan ─────────────────────────────────────────────────

  const tempPath = tempFilePath(tempDir, document.id);
  let findingsCount = 0;

  try {
    await fs.promises.writeFile(tempPath, request.content, { flag: 'wx', mode: 0o600 });

    const scanStartedAt = Date.now();
    const findings = await backends.scanner.scan(tempPath);
    const scanDurationMs = Date.now() - scanStartedAt;

    for (const finding of findings) {
      await backends.finding.store(withDocumentId(finding, document.id));
    }
    findingsCount = findings.length;

    await backends.document.updateStatus(document.id, 'completed');
    await backends.metrics.store(createMetric({
      operation: 'scan',
      durationMs: scanDurationMs,
      documentId: document.id,
      metadata: {
        findings_count: findingsCount,
        scanner_type: backends.scanner.id,
      },
    }));
  } catch (err) {
    const kind = errorKindOf(err);
    const message = errorMessageOf(err);

    await backends.document.updateStatus(document.id, 'failed', message);
    log.error(`Document ${document.id} failed (${kind}): ${message}`);

    return { ok: false, kind, message, documentId: document.id, error: err };
  } finally {
    await removeTempFile(tempPath);
  }

  // ── Steps 9–10: Report ──────────────────────────────────────────────

  await backends.metrics.store(createMetric({
    operation: 'upload',
    durationMs: Date.now() - startedAt,
    documentId: document.id,
    metadata: {
      file_size: request.fileSize,
      filename: request.filename,
    },
  }));

  const stored = await backends.document.get(document.id);
  if (!stored) {
    throw new StorageError(`Document ${document.id} was not found after processing`);
  }

  const response: UploadResponse = {
    document_id: document.id,
    filename: request.filename,
    status: stored.status,
    upload_time: document.uploadTime.toISOString(),
    file_size: request.fileSize,
    findings_count: findingsCount,
  };

  log.info(`Document ${document.id} completed with ${findingsCount} finding(s)`);
  return { ok: true, response };
}

/**
 * Run the pipeline and throw the original error on failure.
 * The document is already marked failed when this throws.
 */
export async function processUpload(
  request: UploadRequest,
  backends: Backends,
  options: PipelineOptions = {}
): Promise<UploadResponse> {
  const outcome = await runUpload(request, backends, options);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.response;
}
