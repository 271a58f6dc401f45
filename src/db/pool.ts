// =============================================================================
// PDF SCAN — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { DatabaseConfig } from '../config';
import { createLogger } from '../services/log';

const log = createLogger('DB');

/**
 * Pool for the postgres backend. Connections are opened lazily on the
 * first query, so creating a pool never touches the network.
 */
export function createPool(db: DatabaseConfig): Pool {
  const pool = db.connectionString
    ? new Pool({ connectionString: db.connectionString, max: db.poolMax })
    : new Pool({
        host: db.host,
        port: db.port,
        user: db.user,
        password: db.password,
        database: db.database,
        max: db.poolMax,
      });

  pool.on('error', (err) => {
    log.error('Unexpected pool error:', err.message);
  });

  return pool;
}
