// =============================================================================
// PDF SCAN — Upload Validation
//
// Gate in front of the pipeline. Nothing is stored for a rejected upload.
//
// Checks, in order (the first failure wins):
//   1. A file part is present
//   2. It has a filename
//   3. The filename ends in .pdf (case-insensitive)
//   4. The declared content type, when given, is application/pdf
//   5. The file is not empty
//   6. The file is within the size limit
//
// Whether the bytes are really a PDF is the scanner's call, not ours.
// =============================================================================

import * as path from 'path';
import { config } from '../../config';
import { UploadValidationError } from '../../types/errors';
import {
  ALLOWED_CONTENT_TYPES,
  ALLOWED_EXTENSIONS,
  UploadCandidate,
  UploadRequest,
} from '../../types/pipeline';

/**
 * Validate an upload before it reaches the pipeline.
 * Throws UploadValidationError carrying the code of the first failed check.
 */
export function validateUpload(
  candidate: UploadCandidate | undefined,
  maxSizeBytes: number = config.upload.maxFileSizeBytes
): UploadRequest {
  if (!candidate) {
    throw new UploadValidationError('No file provided', 'MISSING_FILE');
  }

  const { filename, contentType, size, content } = candidate;

  if (!filename) {
    throw new UploadValidationError('Filename is required', 'MISSING_FILENAME');
  }

  const ext = path.extname(filename).toLowerCase();
  if (!ALLOWED_EXTENSIONS.includes(ext)) {
    throw new UploadValidationError(
      `Invalid file type. Only PDF files are allowed, got "${filename}"`,
      'INVALID_FILE_TYPE'
    );
  }

  // Parameters such as "; charset=binary" do not change the media type
  if (contentType) {
    const mediaType = contentType.split(';')[0].trim().toLowerCase();
    if (!ALLOWED_CONTENT_TYPES.includes(mediaType)) {
      throw new UploadValidationError(
        `Invalid content type. Expected application/pdf, got ${contentType}`,
        'INVALID_CONTENT_TYPE'
      );
    }
  }

  if (size === 0) {
    throw new UploadValidationError('File is empty', 'EMPTY_FILE');
  }

  if (size > maxSizeBytes) {
    throw new UploadValidationError(
      `File too large. Maximum size is ${maxSizeBytes} bytes`,
      'FILE_TOO_LARGE'
    );
  }

  return { filename, fileSize: size, content };
}
