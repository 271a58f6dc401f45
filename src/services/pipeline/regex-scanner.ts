// =============================================================================
// PDF SCAN — Regex Sensitive-Data Scanner
//
// Reference IScanner. Extracts text page by page and matches:
//   ssn   — ddd-dd-dddd
//   email — local@domain.tld
//
// Each match becomes a Finding with confidence 1.0 and location "page N".
// The matched text is never stored, logged or returned.
//
// Findings carry a placeholder documentId (one fresh uuid per scan call);
// the pipeline rebinds them to the real document before storing.
//
// Failure modes:
//   missing file                     → NotFoundError
//   no %PDF- header / parser reject  → InvalidFormatError
//   /Encrypt in trailer / password   → UnsupportedDocumentError
//   anything else from the parser    → ProcessingError
//   one unreadable page              → page skipped, scan continues
// =============================================================================

import * as fs from 'fs';
import pdfParse from 'pdf-parse';
import { v4 as uuidv4 } from 'uuid';
import { Finding, FindingType, createFinding } from '../../types/entities';
import {
  InvalidFormatError,
  NotFoundError,
  ProcessingError,
  ScanServiceError,
  UnsupportedDocumentError,
  errorMessageOf,
} from '../../types/errors';
import { IScanner } from '../../types/scanner';
import { createLogger } from '../log';

const SCANNER_ID = 'regex-v1';

const log = createLogger('Scanner');

/** Checked in this order within a page. */
const PATTERNS: ReadonlyArray<{ type: FindingType; pattern: RegExp }> = [
  { type: 'ssn',   pattern: /\b\d{3}-\d{2}-\d{4}\b/g },
  { type: 'email', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
];

// The PDF header may be preceded by junk; readers accept it in the first 1KB.
const HEADER_WINDOW_BYTES = 1024;

/**
 * pdf-parse's entry point, taking a plain Uint8Array. pdf.js copies a
 * Buffer argument through Buffer's own constructor, which can place it in
 * Node's shared pool at a non-zero offset that pdf.js then ignores.
 */
interface PdfParser {
  parse(data: Uint8Array, options?: pdfParse.Options): Promise<pdfParse.Result>;
}

const parser: PdfParser = { parse: pdfParse };

/** Shape of pdf.js text content handed to the page renderer. */
interface PageTextContent {
  items: Array<{ str: string; transform: number[] }>;
}

// ── Byte-Level Checks ──────────────────────────────────────────────────

function hasPdfHeader(buffer: Buffer): boolean {
  return buffer.subarray(0, HEADER_WINDOW_BYTES).includes('%PDF-');
}

/** Index just past a literal string `( … )` starting at `start`. */
function skipLiteralString(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')' && --depth === 0) {
      return i + 1;
    }
  }
  return text.length;
}

/**
 * The dictionary opening at `open` (which must point at "<<"), up to and
 * including its matching ">>". Strings are skipped so their brackets
 * do not count.
 */
function dictionaryAt(text: string, open: number): string {
  let depth = 0;
  let i = open;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '(') {
      i = skipLiteralString(text, i);
    } else if (ch === '<' && next === '<') {
      depth++;
      i += 2;
    } else if (ch === '>' && next === '>') {
      depth--;
      i += 2;
      if (depth === 0) return text.slice(open, i);
    } else if (ch === '<') {
      // hex string
      const close = text.indexOf('>', i);
      i = close === -1 ? text.length : close + 1;
    } else {
      i++;
    }
  }

  return text.slice(open);
}

const TRAILER_OPEN = /trailer\s*<</g;
const OBJECT_OPEN = /\d+\s+\d+\s+obj\s*<</g;
const XREF_STREAM_TYPE = /\/Type\s*\/XRef\b/;
const ENCRYPT_KEY = /\/Encrypt\b/;

/** Classic trailer dictionaries plus the dictionaries of xref streams. */
function trailerDictionaries(text: string): string[] {
  const dictionaries: string[] = [];

  for (const match of text.matchAll(TRAILER_OPEN)) {
    dictionaries.push(dictionaryAt(text, (match.index ?? 0) + match[0].length - 2));
  }
  for (const match of text.matchAll(OBJECT_OPEN)) {
    const dictionary = dictionaryAt(text, (match.index ?? 0) + match[0].length - 2);
    if (XREF_STREAM_TYPE.test(dictionary)) dictionaries.push(dictionary);
  }

  return dictionaries;
}

/**
 * An /Encrypt entry in the trailer means the content streams are
 * encrypted, whether or not a user password is required to open them.
 * The token anywhere else (page text, metadata) does not count.
 */
function isEncrypted(buffer: Buffer): boolean {
  return trailerDictionaries(buffer.toString('latin1')).some(d => ENCRYPT_KEY.test(d));
}

// ── Text Extraction ────────────────────────────────────────────────────

/**
 * Join text items into lines: a change in baseline starts a new line.
 */
export function joinTextItems(items: PageTextContent['items']): string {
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }

  return text;
}

function errorName(err: unknown): string {
  return typeof err === 'object' && err !== null && 'name' in err ? String(err.name) : '';
}

function errnoCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err ? String(err.code) : undefined;
}

function classifyParserError(err: unknown, filePath: string): ScanServiceError {
  const name = errorName(err);
  const message = errorMessageOf(err);

  if (name === 'PasswordException') {
    return new UnsupportedDocumentError('PDF is password-protected and cannot be scanned', { cause: err });
  }
  if (name === 'InvalidPDFException' || name === 'FormatError' || /invalid pdf/i.test(message)) {
    return new InvalidFormatError(`Invalid or corrupt PDF file: ${filePath}`, { cause: err });
  }
  return new ProcessingError(`Failed to process PDF: ${message}`, { cause: err });
}

/**
 * Text of every readable page, keyed by 1-based page number.
 * The parser drops a page whose rendering throws; it is simply absent here.
 */
async function extractPages(buffer: Buffer, filePath: string): Promise<Map<number, string>> {
  const pages = new Map<number, string>();

  let pageCount: number;
  try {
    const result = await parser.parse(new Uint8Array(buffer), {
      pagerender: pageData =>
        pageData
          .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
          .then((content: PageTextContent) => {
            const text = joinTextItems(content.items);
            pages.set(Number(pageData.pageIndex) + 1, text);
            return text;
          }),
    });
    pageCount = result.numpages;
  } catch (err) {
    throw classifyParserError(err, filePath);
  }

  if (pages.size < pageCount) {
    log.warn(`Skipped ${pageCount - pages.size} unreadable page(s) of ${pageCount}`);
  }

  return pages;
}

// ── Scanner ────────────────────────────────────────────────────────────

export class RegexScanner implements IScanner {
  readonly id = SCANNER_ID;

  async scan(filePath: string): Promise<Finding[]> {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(`PDF file not found: ${filePath}`, { cause: err });
      }
      throw new ProcessingError(`Failed to read PDF: ${errorMessageOf(err)}`, { cause: err });
    }

    if (!hasPdfHeader(buffer)) {
      throw new InvalidFormatError(`Invalid or corrupt PDF file: ${filePath}`);
    }
    if (isEncrypted(buffer)) {
      throw new UnsupportedDocumentError('PDF is password-protected and cannot be scanned');
    }

    const pages = await extractPages(buffer, filePath);
    const placeholderId = uuidv4();
    const findings: Finding[] = [];

    const pageNumbers = [...pages.keys()].sort((a, b) => a - b);
    for (const pageNumber of pageNumbers) {
      const text = pages.get(pageNumber) ?? '';
      for (const { type, pattern } of PATTERNS) {
        const matchCount = text.match(pattern)?.length ?? 0;
        for (let i = 0; i < matchCount; i++) {
          findings.push(createFinding({
            documentId: placeholderId,
            findingType: type,
            location: `page ${pageNumber}`,
            confidence: 1.0,
          }));
        }
      }
    }

    log.debug(`Scanned ${pages.size} page(s), ${findings.length} finding(s)`);
    return findings;
  }

  supportedPatterns(): FindingType[] {
    return PATTERNS.map(p => p.type);
  }
}
