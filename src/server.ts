// =============================================================================
// PDF SCAN — Main Server
//
// Builds the backends once from configuration, applies the schema when
// running on PostgreSQL, and starts listening.
// =============================================================================

import { config } from './config';
import { createApp } from './app';
import { createBackendsFromConfig, describeBackends } from './backends';
import { ensureSchema } from './db/schema';
import { createLogger } from './services/log';

const log = createLogger('Server');

async function main(): Promise<void> {
  const { backends, pool } = createBackendsFromConfig(config);

  if (pool) {
    await ensureSchema(pool);
  }

  const app = createApp(backends);

  const server = app.listen(config.port, () => {
    log.info(`PDF scan service listening on port ${config.port} (${config.nodeEnv})`);
    log.info(`Backends: ${describeBackends(backends)}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      if (!pool) return;
      pool.end().catch((err: Error) => {
        log.error('Error closing database pool:', err.message);
      });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: Error) => {
  log.error('Failed to start:', err.message);
  process.exit(1);
});
