// =============================================================================
// PDF SCAN — Error Taxonomy
//
// Every error raised by this service carries a `kind`. Only the HTTP layer
// turns kinds into status codes; the pipeline and repositories never
// translate one kind into another.
// =============================================================================

export type ErrorKind =
  | 'validation'      // Malformed upload, rejected before the pipeline
  | 'not_found'       // Referenced document or file does not exist
  | 'invalid_format'  // Not a well-formed PDF
  | 'unsupported'     // Encrypted / password-protected PDF
  | 'storage'         // A repository operation failed
  | 'processing';     // Anything else raised while scanning

export abstract class ScanServiceError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type UploadValidationCode =
  | 'MISSING_FILE'
  | 'MISSING_FILENAME'
  | 'INVALID_FILE_TYPE'
  | 'INVALID_CONTENT_TYPE'
  | 'EMPTY_FILE'
  | 'FILE_TOO_LARGE';

export class UploadValidationError extends ScanServiceError {
  readonly kind = 'validation' as const;

  constructor(message: string, readonly code: UploadValidationCode) {
    super(message);
  }
}

/** A query or path parameter outside its accepted range. */
export class InvalidParameterError extends ScanServiceError {
  readonly kind = 'validation' as const;
  readonly code = 'INVALID_PARAMETER' as const;

  constructor(readonly parameter: string, message: string) {
    super(message);
  }
}

export class NotFoundError extends ScanServiceError {
  readonly kind = 'not_found' as const;
}

export class InvalidFormatError extends ScanServiceError {
  readonly kind = 'invalid_format' as const;
}

export class UnsupportedDocumentError extends ScanServiceError {
  readonly kind = 'unsupported' as const;
}

export class StorageError extends ScanServiceError {
  readonly kind = 'storage' as const;
}

export class ProcessingError extends ScanServiceError {
  readonly kind = 'processing' as const;
}

/**
 * Kind of an arbitrary thrown value. Errors from outside the taxonomy
 * count as processing failures.
 */
export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof ScanServiceError ? err.kind : 'processing';
}

export function errorMessageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
