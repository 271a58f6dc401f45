// =============================================================================
// PDF SCAN — Schema Bootstrap
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { Queryable, runQuery } from '../repositories';
import { createLogger } from '../services/log';

const log = createLogger('DB');

// Resolves from both src/db and dist/db
export const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

/**
 * Apply db/schema.sql. Every statement in it is idempotent, so this runs
 * on every start-up.
 */
export async function ensureSchema(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await fs.promises.readFile(schemaPath, 'utf8');
  await runQuery(db, 'apply schema', sql);
  log.info(`Schema applied from ${path.basename(schemaPath)}`);
}
