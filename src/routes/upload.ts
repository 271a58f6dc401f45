// =============================================================================
// PDF SCAN — Upload Route
//
// Routes:
//   POST /upload   — multipart field "file"; validate → pipeline → response
//
// Validation failures never create a document. Once the pipeline has
// started, failures are reported with the id of the (failed) document.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import { runUpload, validateUpload } from '../services/pipeline';
import { createLogger } from '../services/log';
import { codeForKind, statusForKind } from '../middleware/security';
import { Backends } from '../types/backends';
import { UploadValidationError } from '../types/errors';

const log = createLogger('Upload');

export interface UploadRouteOptions {
  maxFileSizeBytes: number;
  tempDir: string;
  rateLimitPerMinute: number;
}

/**
 * Multer's own limit errors, in the vocabulary of upload validation.
 */
function translateMulterError(err: unknown, maxFileSizeBytes: number): unknown {
  if (!(err instanceof multer.MulterError)) return err;

  switch (err.code) {
    case 'LIMIT_FILE_SIZE':
      return new UploadValidationError(
        `File too large. Maximum size is ${maxFileSizeBytes} bytes`,
        'FILE_TOO_LARGE'
      );
    case 'LIMIT_UNEXPECTED_FILE':
      return new UploadValidationError(
        `Unexpected file field "${err.field ?? ''}". Send the PDF in the "file" field`,
        'MISSING_FILE'
      );
    default:
      return err;
  }
}

export function uploadRouter(backends: Backends, options: UploadRouteOptions): Router {
  const router = Router();

  // Held in memory: the pipeline writes its own private temp file
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxFileSizeBytes },
  });

  const receiveFile = (req: Request, res: Response): Promise<void> =>
    new Promise((resolve, reject) => {
      upload.single('file')(req, res, (err?: unknown) => {
        if (err) reject(translateMulterError(err, options.maxFileSizeBytes));
        else resolve();
      });
    });

  const uploadLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: options.rateLimitPerMinute,
    message: { error: 'Too many uploads. Try again later.', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * POST /upload
   * Scan a PDF for sensitive data.
   *
   * 200 — upload response (document_id, status, findings_count, ...)
   * 400/413 — validation failure, nothing stored
   * 404/422/500/503 — pipeline failure; the document is marked failed
   */
  router.post('/', uploadLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await receiveFile(req, res);

      const file = req.file;
      const request = validateUpload(
        file && {
          filename: file.originalname,
          contentType: file.mimetype,
          size: file.size,
          content: file.buffer,
        },
        options.maxFileSizeBytes
      );

      const outcome = await runUpload(request, backends, { tempDir: options.tempDir });

      if (!outcome.ok) {
        log.warn(`Upload of document ${outcome.documentId} failed (${outcome.kind})`);
        res.status(statusForKind(outcome.kind)).json({
          error: `Failed to process document: ${outcome.message}`,
          code: codeForKind(outcome.kind),
          document_id: outcome.documentId,
        });
        return;
      }

      res.json(outcome.response);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
