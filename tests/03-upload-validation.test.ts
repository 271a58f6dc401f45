// =============================================================================
// PDF SCAN — Test Suite 03: Upload Validation
// =============================================================================

import { validateUpload } from '../src/services/pipeline/validation';
import { UploadValidationError } from '../src/types/errors';
import { UploadCandidate } from '../src/types/pipeline';

const MAX = 1024;

function candidate(overrides: Partial<UploadCandidate> = {}): UploadCandidate {
  const content = Buffer.from('%PDF-1.4 test');
  return {
    filename: 'report.pdf',
    contentType: 'application/pdf',
    size: content.length,
    content,
    ...overrides,
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof UploadValidationError) return err.code;
    throw err;
  }
  return undefined;
}

describe('validateUpload', () => {
  test('returns the upload request for a valid PDF', () => {
    const input = candidate();
    expect(validateUpload(input, MAX)).toEqual({
      filename: 'report.pdf',
      fileSize: 13,
      content: input.content,
    });
  });

  test('MISSING_FILE when there is no file part', () => {
    expect(codeOf(() => validateUpload(undefined, MAX))).toBe('MISSING_FILE');
  });

  test('MISSING_FILENAME for an empty or absent filename', () => {
    expect(codeOf(() => validateUpload(candidate({ filename: '' }), MAX))).toBe('MISSING_FILENAME');
    expect(codeOf(() => validateUpload(candidate({ filename: undefined }), MAX))).toBe('MISSING_FILENAME');
  });

  test('INVALID_FILE_TYPE for a non-.pdf extension', () => {
    expect(codeOf(() => validateUpload(candidate({ filename: 'notes.txt' }), MAX))).toBe('INVALID_FILE_TYPE');
    expect(codeOf(() => validateUpload(candidate({ filename: 'pdf' }), MAX))).toBe('INVALID_FILE_TYPE');
  });

  test('the extension check ignores case', () => {
    expect(validateUpload(candidate({ filename: 'SCAN.PDF' }), MAX).filename).toBe('SCAN.PDF');
  });

  test('INVALID_CONTENT_TYPE when another type is declared', () => {
    expect(codeOf(() => validateUpload(candidate({ contentType: 'text/plain' }), MAX)))
      .toBe('INVALID_CONTENT_TYPE');
  });

  test('content type parameters and absence are accepted', () => {
    expect(() => validateUpload(candidate({ contentType: 'application/pdf; charset=binary' }), MAX)).not.toThrow();
    expect(() => validateUpload(candidate({ contentType: undefined }), MAX)).not.toThrow();
  });

  test('EMPTY_FILE for zero bytes', () => {
    expect(codeOf(() => validateUpload(candidate({ size: 0, content: Buffer.alloc(0) }), MAX))).toBe('EMPTY_FILE');
  });

  test('FILE_TOO_LARGE above the limit, not at it', () => {
    expect(codeOf(() => validateUpload(candidate({ size: MAX + 1 }), MAX))).toBe('FILE_TOO_LARGE');
    expect(() => validateUpload(candidate({ size: MAX }), MAX)).not.toThrow();
  });

  test('checks run in order: the first failure wins', () => {
    expect(codeOf(() => validateUpload(candidate({ filename: 'a.txt', contentType: 'text/plain', size: 0 }), MAX)))
      .toBe('INVALID_FILE_TYPE');
    expect(codeOf(() => validateUpload(candidate({ contentType: 'image/png', size: 0 }), MAX)))
      .toBe('INVALID_CONTENT_TYPE');
    expect(codeOf(() => validateUpload(candidate({ filename: '', size: MAX + 1 }), MAX)))
      .toBe('MISSING_FILENAME');
  });

  test('errors carry the validation kind', () => {
    try {
      validateUpload(undefined, MAX);
      throw new Error('expected validateUpload to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(UploadValidationError);
      expect(err instanceof UploadValidationError && err.kind).toBe('validation');
    }
  });
});
