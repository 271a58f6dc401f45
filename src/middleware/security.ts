// =============================================================================
// PDF SCAN — Request Tracing & Error Middleware
//
// Covers:
//   - Request IDs (X-Request-ID, echoed or generated)
//   - 404 for unknown routes
//   - Error handling: error kind → HTTP status, no stack traces in production
//
// Security headers, CORS and rate limiting come from helmet, cors and
// express-rate-limit; see app.ts.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger } from '../services/log';
import {
  ErrorKind,
  InvalidParameterError,
  UploadValidationError,
  errorKindOf,
  errorMessageOf,
} from '../types/errors';

const log = createLogger('Server');

// ── Error Mapping ──────────────────────────────────────────────────────

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  not_found: 404,
  invalid_format: 422,
  unsupported: 422,
  storage: 503,
  processing: 500,
};

const CODE_BY_KIND: Record<ErrorKind, string> = {
  validation: 'VALIDATION_ERROR',
  not_found: 'NOT_FOUND',
  invalid_format: 'INVALID_FORMAT',
  unsupported: 'UNSUPPORTED_DOCUMENT',
  storage: 'STORAGE_ERROR',
  processing: 'PROCESSING_ERROR',
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function codeForKind(kind: ErrorKind): string {
  return CODE_BY_KIND[kind];
}

/** 4xx status set by body parsers and other http-errors middleware. */
function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** FILE_TOO_LARGE is the one validation failure that is not a 400. */
export function statusForError(err: unknown): number {
  if (err instanceof UploadValidationError && err.code === 'FILE_TOO_LARGE') {
    return 413;
  }
  return clientStatusOf(err) ?? statusForKind(errorKindOf(err));
}

export function codeForError(err: unknown): string {
  if (err instanceof UploadValidationError || err instanceof InvalidParameterError) {
    return err.code;
  }
  if (clientStatusOf(err) !== undefined) return 'BAD_REQUEST';
  return codeForKind(errorKindOf(err));
}

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing. Available to handlers as
 * res.locals.requestId.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `scan-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    res.set('X-Request-ID', id);
    res.locals.requestId = id;
    next();
  };
}

// ── 404 Handler ────────────────────────────────────────────────────────

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * Global error handler. Never leaks stack traces in production; 5xx
 * messages are hidden there too.
 */
export function errorHandler(nodeEnv: string) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const isProd = nodeEnv === 'production';
    const status = statusForError(err);
    const message = errorMessageOf(err);
    const stack = err instanceof Error ? err.stack : undefined;

    if (status >= 500) {
      log.error(`${message} [${String(res.locals.requestId)}]`, isProd ? '' : stack);
    } else {
      log.debug(`${status} ${message}`);
    }

    res.status(status).json({
      error: isProd && status >= 500 ? 'Internal server error' : message,
      code: codeForError(err),
      ...(isProd || status < 500 ? {} : { stack }),
    });
  };
}
