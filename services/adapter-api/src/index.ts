/**
 * Adapter API
 *
 * Intake service: accepts payroll statements and queues consolidation runs.
 */

import {
  logger,
  config,
  createQueue,
  checkBackpressure,
  createPool,
  FileObjectStore,
  PgRunStore,
  QUEUE_NAMES,
  type ConsolidateRunJob,
} from '@payroll-consolidator/shared';
import { createApp } from './lib/app';

const pool = createPool();
const consolidateRunQueue = createQueue<ConsolidateRunJob, void>(QUEUE_NAMES.CONSOLIDATE_RUN);

const app = createApp({
  runStore: new PgRunStore(pool),
  objectStore: new FileObjectStore(),
  queue: consolidateRunQueue,
  checkBackpressure: () => checkBackpressure(consolidateRunQueue),
  healthCheck: async () => {
    // Check Redis connection via queue
    const metrics = await checkBackpressure(consolidateRunQueue);
    return { queue_depth: metrics.depth };
  },
});

// Start server
const server = app.listen(config.adapterApiPort, () => {
  logger.info('Adapter API started', { port: config.adapterApiPort });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await consolidateRunQueue.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
