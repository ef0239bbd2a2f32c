/**
 * Query API
 *
 * Read-only API for consolidation runs and their exports.
 */

import { logger, config, createPool, PgRunStore } from '@payroll-consolidator/shared';
import { createApp } from './lib/app';

const pool = createPool();

const app = createApp({
  runStore: new PgRunStore(pool),
  healthCheck: async () => {
    // Test database connection
    await pool.query('SELECT 1');
  },
});

// Start server
const server = app.listen(config.queryApiPort, () => {
  logger.info('Query API started', { port: config.queryApiPort });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
