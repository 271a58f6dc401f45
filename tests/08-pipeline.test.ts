// =============================================================================
// PDF SCAN — Test Suite 08: Document Processing Pipeline
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { createBackends } from '../src/backends';
import {
  InMemoryDocumentRepository,
  InMemoryFindingRepository,
  InMemoryMetricsRepository,
} from '../src/repositories';
import { processUpload, runUpload } from '../src/services/pipeline/processor';
import { Backends } from '../src/types/backends';
import { Document, DocumentStatus, Finding, FindingType, createFinding } from '../src/types/entities';
import { InvalidFormatError, StorageError } from '../src/types/errors';
import { UploadRequest } from '../src/types/pipeline';
import { IScanner } from '../src/types/scanner';
import { buildPdf } from './fixtures/pdf';
import { makeTempDir, removeDir } from './helpers';

const PLACEHOLDER_ID = '00000000-0000-4000-8000-000000000000';

/** Returns canned findings and records what it was given. */
class FakeScanner implements IScanner {
  readonly id = 'fake-v1';
  scannedPath: string | null = null;
  scannedBytes: Buffer | null = null;

  constructor(private readonly types: FindingType[] = []) {}

  async scan(filePath: string): Promise<Finding[]> {
    this.scannedPath = filePath;
    this.scannedBytes = fs.readFileSync(filePath);
    return this.types.map((findingType, i) =>
      createFinding({ documentId: PLACEHOLDER_ID, findingType, location: `page ${i + 1}` })
    );
  }

  supportedPatterns(): FindingType[] {
    return ['ssn', 'email'];
  }
}

class FailingScanner implements IScanner {
  readonly id = 'failing-v1';
  scannedPath: string | null = null;

  constructor(private readonly error: Error) {}

  async scan(filePath: string): Promise<Finding[]> {
    this.scannedPath = filePath;
    throw this.error;
  }

  supportedPatterns(): FindingType[] {
    return [];
  }
}

function request(content: Buffer | string = 'fake pdf bytes', filename = 'report.pdf'): UploadRequest {
  const buffer = Buffer.from(content);
  return { filename, fileSize: buffer.length, content: buffer };
}

function backendsWith(parts: Partial<Omit<Backends, 'kind'>>): Backends {
  return Object.freeze({
    kind: 'memory' as const,
    document: parts.document ?? new InMemoryDocumentRepository(),
    finding: parts.finding ?? new InMemoryFindingRepository(),
    metrics: parts.metrics ?? new InMemoryMetricsRepository(),
    scanner: parts.scanner ?? new FakeScanner(),
  });
}

describe('Document processing pipeline', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  describe('success', () => {
    test('returns the upload response and completes the document', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FakeScanner(['ssn', 'email']) });

      const outcome = await runUpload(request('0123456789', 'scan.pdf'), backends, { tempDir });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      const { response } = outcome;
      expect(response.filename).toBe('scan.pdf');
      expect(response.file_size).toBe(10);
      expect(response.status).toBe('completed');
      expect(response.findings_count).toBe(2);

      const stored = await backends.document.get(response.document_id);
      expect(stored?.status).toBe('completed');
      expect(stored?.errorMessage).toBeNull();
      expect(response.upload_time).toBe(stored?.uploadTime.toISOString());
    });

    test('rebinds placeholder findings to the document', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FakeScanner(['ssn', 'email']) });

      const response = await processUpload(request(), backends, { tempDir });
      const findings = await backends.finding.getByDocument(response.document_id);

      expect(findings).toHaveLength(2);
      expect(findings.every(f => f.documentId === response.document_id)).toBe(true);
      expect(await backends.finding.getByDocument(PLACEHOLDER_ID)).toEqual([]);
    });

    test('hands the scanner a private temp file holding the upload', async () => {
      const scanner = new FakeScanner();
      const backends = createBackends({ kind: 'memory', scanner });

      const response = await processUpload(request('%PDF-1.4 body'), backends, { tempDir });

      expect(scanner.scannedBytes?.toString()).toBe('%PDF-1.4 body');
      expect(path.dirname(scanner.scannedPath ?? '')).toBe(tempDir);
      expect(path.basename(scanner.scannedPath ?? '')).toMatch(
        new RegExp(`^pdf_scan_${response.document_id}_[a-z0-9]+\\.pdf$`)
      );
    });

    test('removes the temp file afterwards', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FakeScanner(['ssn']) });
      await processUpload(request(), backends, { tempDir });
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });

    test('records a scan metric and an upload metric', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FakeScanner(['email']) });

      const response = await processUpload(request('abc', 'm.pdf'), backends, { tempDir });
      const metrics = await backends.metrics.query({ documentId: response.document_id, limit: 10, offset: 0 });

      const scan = metrics.find(m => m.operation === 'scan');
      const upload = metrics.find(m => m.operation === 'upload');

      expect(scan?.metadata).toEqual({ findings_count: 1, scanner_type: 'fake-v1' });
      expect(upload?.metadata).toEqual({ file_size: 3, filename: 'm.pdf' });
      expect(scan?.durationMs).toBeGreaterThanOrEqual(0);
      expect(upload?.durationMs).toBeGreaterThanOrEqual(scan?.durationMs ?? 0);
      expect(metrics).toHaveLength(2);
    });

    test('a clean document completes with zero findings', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FakeScanner([]) });
      const response = await processUpload(request(), backends, { tempDir });

      expect(response.findings_count).toBe(0);
      expect(response.status).toBe('completed');
    });
  });

  describe('scan failure', () => {
    test('marks the document failed and reports the error kind', async () => {
      const error = new InvalidFormatError('Invalid or corrupt PDF file: /tmp/x.pdf');
      const backends = createBackends({ kind: 'memory', scanner: new FailingScanner(error) });

      const outcome = await runUpload(request(), backends, { tempDir });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;

      expect(outcome.kind).toBe('invalid_format');
      expect(outcome.message).toBe('Invalid or corrupt PDF file: /tmp/x.pdf');
      expect(outcome.error).toBe(error);

      const stored = await backends.document.get(outcome.documentId);
      expect(stored?.status).toBe('failed');
      expect(stored?.errorMessage).toBe('Invalid or corrupt PDF file: /tmp/x.pdf');
    });

    test('foreign errors are processing failures', async () => {
      const backends = createBackends({ kind: 'memory', scanner: new FailingScanner(new TypeError('bad state')) });

      const outcome = await runUpload(request(), backends, { tempDir });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.kind).toBe('processing');
    });

    test('processUpload re-throws the original error', async () => {
      const error = new InvalidFormatError('not a pdf');
      const backends = createBackends({ kind: 'memory', scanner: new FailingScanner(error) });

      await expect(processUpload(request(), backends, { tempDir })).rejects.toBe(error);
    });

    test('records no metrics and removes the temp file', async () => {
      const scanner = new FailingScanner(new Error('parser crashed'));
      const backends = createBackends({ kind: 'memory', scanner });

      await runUpload(request(), backends, { tempDir });

      expect(scanner.scannedPath).not.toBeNull();
      expect(fs.readdirSync(tempDir)).toEqual([]);
      expect(await backends.metrics.summarize()).toEqual([]);
    });

    test('an encrypted PDF through the real scanner is unsupported', async () => {
      const backends = createBackends({ kind: 'memory' });
      const pdf = buildPdf([['SSN: 123-45-6789']], { encrypted: true });

      const outcome = await runUpload(request(pdf, 'locked.pdf'), backends, { tempDir });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.kind).toBe('unsupported');
      expect(await backends.finding.count()).toBe(0);
    });

    test('findings stored before a failure are kept', async () => {
      class FlakyFindingRepository extends InMemoryFindingRepository {
        private stored = 0;

        async store(finding: Finding): Promise<void> {
          if (this.stored++ === 1) throw new StorageError('store finding failed: disk full');
          await super.store(finding);
        }
      }

      const finding = new FlakyFindingRepository();
      const backends = backendsWith({ finding, scanner: new FakeScanner(['ssn', 'email', 'ssn']) });

      const outcome = await runUpload(request(), backends, { tempDir });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.kind).toBe('storage');
      expect(await finding.count(outcome.documentId)).toBe(1);
      expect((await backends.document.get(outcome.documentId))?.status).toBe('failed');
    });
  });

  describe('fatal storage errors', () => {
    test('a failure registering the document propagates before any scan', async () => {
      class BrokenDocumentRepository extends InMemoryDocumentRepository {
        async store(_document: Document): Promise<void> {
          throw new StorageError('store document failed: connection refused');
        }
      }

      const scanner = new FakeScanner();
      const backends = backendsWith({ document: new BrokenDocumentRepository(), scanner });

      await expect(runUpload(request(), backends, { tempDir })).rejects.toThrow(StorageError);
      expect(scanner.scannedPath).toBeNull();
    });

    test('a failure recording the failed status propagates and still cleans up', async () => {
      class NoFailedStatusRepository extends InMemoryDocumentRepository {
        async updateStatus(id: string, status: DocumentStatus, errorMessage?: string | null): Promise<void> {
          if (status === 'failed') throw new StorageError('update document status failed: timeout');
          await super.updateStatus(id, status, errorMessage);
        }
      }

      const backends = backendsWith({
        document: new NoFailedStatusRepository(),
        scanner: new FailingScanner(new InvalidFormatError('bad pdf')),
      });

      await expect(runUpload(request(), backends, { tempDir }))
        .rejects.toThrow('update document status failed: timeout');
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });

    test('a document missing when the response is built is a StorageError, not a made-up status', async () => {
      class ForgetfulDocumentRepository extends InMemoryDocumentRepository {
        async get(_id: string): Promise<Document | null> {
          return null;
        }
      }

      const backends = backendsWith({
        document: new ForgetfulDocumentRepository(),
        scanner: new FakeScanner(['ssn']),
      });

      const err = await runUpload(request(), backends, { tempDir }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(StorageError);
      expect(err instanceof StorageError && err.message).toMatch(/^Document [0-9a-f-]{36} was not found after processing$/);
    });
  });
});
