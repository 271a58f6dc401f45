// =============================================================================
// PDF SCAN — Scanner Contract
//
// A scanner turns a file on disk into findings. It does not know which
// document the file belongs to: every finding carries a placeholder
// documentId that the caller must replace before persisting.
// =============================================================================

import { Finding, FindingType } from './entities';

export interface IScanner {
  /** Stable identity used to label metrics, e.g. "regex-v1" */
  readonly id: string;

  /**
   * Scan a PDF file.
   *
   * Throws NotFoundError if the file is missing, InvalidFormatError if it is
   * not a well-formed PDF, UnsupportedDocumentError if it is encrypted.
   * A page whose text cannot be extracted is skipped, not fatal.
   */
  scan(filePath: string): Promise<Finding[]>;

  /** Finding types this scanner can produce */
  supportedPatterns(): FindingType[];
}
