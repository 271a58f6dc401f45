// =============================================================================
// PDF SCAN — Backend Factory
//
// Builds the repository/scanner bundle for one storage kind. The kind is
// read from configuration once, at start-up; request handlers only ever
// see the bundle they were given.
//
//   memory   — Map-backed repositories; data lives as long as the process
//   postgres — repositories over a pg Pool (or any Queryable)
// =============================================================================

import { Pool } from 'pg';
import { AppConfig, BackendKind } from '../config';
import { createPool } from '../db/pool';
import {
  InMemoryDocumentRepository,
  InMemoryFindingRepository,
  InMemoryMetricsRepository,
  PostgresDocumentRepository,
  PostgresFindingRepository,
  PostgresMetricsRepository,
  Queryable,
} from '../repositories';
import { RegexScanner } from '../services/pipeline';
import { Backends } from '../types/backends';
import { IScanner } from '../types/scanner';

export interface BackendOptions {
  kind: BackendKind;
  /** Required for 'postgres' */
  db?: Queryable;
  /** Defaults to RegexScanner */
  scanner?: IScanner;
}

/**
 * Build a frozen backend bundle. All three repositories share one kind.
 */
export function createBackends(options: BackendOptions): Backends {
  const scanner = options.scanner ?? new RegexScanner();

  switch (options.kind) {
    case 'memory':
      return Object.freeze({
        kind: options.kind,
        document: new InMemoryDocumentRepository(),
        finding: new InMemoryFindingRepository(),
        metrics: new InMemoryMetricsRepository(),
        scanner,
      });

    case 'postgres': {
      const { db } = options;
      if (!db) {
        throw new Error('The postgres backend requires a database connection');
      }
      return Object.freeze({
        kind: options.kind,
        document: new PostgresDocumentRepository(db),
        finding: new PostgresFindingRepository(db),
        metrics: new PostgresMetricsRepository(db),
        scanner,
      });
    }
  }
}

/**
 * Backends for the configured storage kind. For postgres the pool is
 * returned as well so the caller can apply the schema and close it.
 */
export function createBackendsFromConfig(appConfig: AppConfig): { backends: Backends; pool: Pool | null } {
  if (appConfig.storageBackend === 'postgres') {
    const pool = createPool(appConfig.db);
    return { backends: createBackends({ kind: 'postgres', db: pool }), pool };
  }
  return { backends: createBackends({ kind: appConfig.storageBackend }), pool: null };
}

/**
 * One line for logs and /health,
 * e.g. "documents=memory findings=memory metrics=memory scanner=regex-v1".
 */
export function describeBackends(backends: Backends): string {
  return [
    `documents=${backends.document.backendName}`,
    `findings=${backends.finding.backendName}`,
    `metrics=${backends.metrics.backendName}`,
    `scanner=${backends.scanner.id}`,
  ].join(' ');
}
