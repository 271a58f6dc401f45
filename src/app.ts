// =============================================================================
// PDF SCAN — HTTP Application
//
//   GET  /health                  — liveness and backend description
//   POST /upload                  — scan a PDF
//   GET  /documents               — uploaded documents
//   GET  /findings                — findings across documents
//   GET  /findings/:documentId    — one document and its findings
//   GET  /metrics                 — per-operation timing summary
//
// The app holds no storage of its own: everything goes through the
// Backends it is given.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { config } from './config';
import { describeBackends } from './backends';
import { errorHandler, notFound, requestId } from './middleware/security';
import { documentsRouter } from './routes/documents';
import { findingsRouter } from './routes/findings';
import { metricsRouter } from './routes/metrics';
import { uploadRouter } from './routes/upload';
import { Backends } from './types/backends';

export const SERVICE_NAME = 'pdf-scan-service';

export interface AppOptions {
  nodeEnv?: string;
  maxFileSizeBytes?: number;
  tempDir?: string;
  rateLimitPerMinute?: number;
}

export function createApp(backends: Backends, options: AppOptions = {}): Express {
  const nodeEnv = options.nodeEnv ?? config.nodeEnv;

  const app = express();

  // ── Middleware ───────────────────────────────────────────────────────

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());

  // ── Routes ───────────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: config.version,
      backends: describeBackends(backends),
    });
  });

  app.use('/upload', uploadRouter(backends, {
    maxFileSizeBytes: options.maxFileSizeBytes ?? config.upload.maxFileSizeBytes,
    tempDir: options.tempDir ?? config.upload.tempDir,
    rateLimitPerMinute: options.rateLimitPerMinute ?? config.upload.rateLimitPerMinute,
  }));
  app.use('/documents', documentsRouter(backends));
  app.use('/findings', findingsRouter(backends));
  app.use('/metrics', metricsRouter(backends));

  app.use(notFound());
  app.use(errorHandler(nodeEnv));

  return app;
}
