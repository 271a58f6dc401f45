// =============================================================================
// PDF SCAN — Application Configuration
// Loads from environment variables with defaults for development.
//
// Resolved once at process start. The storage backend in particular is
// chosen here and never per request.
// =============================================================================

import * as os from 'os';

export const BACKEND_KINDS = ['memory', 'postgres'] as const;
export type BackendKind = typeof BACKEND_KINDS[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface DatabaseConfig {
  /** Full connection string; wins over the individual parts when set */
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  version: string;
  storageBackend: BackendKind;
  db: DatabaseConfig;
  upload: {
    maxFileSizeBytes: number;
    tempDir: string;
    rateLimitPerMinute: number;
  };
  logging: {
    level: LogLevel;
  };
}

export function parseBackendKind(value: string): BackendKind {
  const normalized = value.trim().toLowerCase();
  const kind = BACKEND_KINDS.find(k => k === normalized);
  if (!kind) {
    throw new Error(
      `Unknown storage backend "${value}". Expected one of: ${BACKEND_KINDS.join(', ')}`
    );
  }
  return kind;
}

function parseLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find(l => l === value.trim().toLowerCase()) ?? 'info';
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFromEnv(env.PORT, 8000),
    nodeEnv: env.NODE_ENV || 'development',
    version: '0.1.0',

    storageBackend: parseBackendKind(env.STORAGE_BACKEND || 'memory'),

    db: {
      connectionString: env.DATABASE_URL || undefined,
      host: env.DB_HOST || 'localhost',
      port: intFromEnv(env.DB_PORT, 5432),
      user: env.DB_USER || 'pdf_scan',
      password: env.DB_PASSWORD || 'pdf_scan_dev_only',
      database: env.DB_NAME || 'pdf_scan',
      poolMax: intFromEnv(env.DB_POOL_MAX, 10),
    },

    upload: {
      maxFileSizeBytes: intFromEnv(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024), // 10MB
      tempDir: env.SCAN_TEMP_DIR || os.tmpdir(),
      rateLimitPerMinute: intFromEnv(env.UPLOAD_RATE_LIMIT_MAX, 60),
    },

    logging: {
      level: parseLogLevel(env.LOG_LEVEL || 'info'),
    },
  };
}

export const config: AppConfig = loadConfig();
