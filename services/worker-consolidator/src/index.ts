/**
 * Consolidator Worker
 *
 * Runs the extraction-and-consolidation pipeline for queued runs, away from
 * the API that accepted them. Progress is reported per document.
 */

import type { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  createPool,
  serveMetrics,
  FileObjectStore,
  PgRunStore,
  QUEUE_NAMES,
  type ConsolidateRunJob,
} from '@payroll-consolidator/shared';
import { processConsolidateRun, type RunOutcome } from './lib/process-run';

const pool = createPool();
const deps = {
  runStore: new PgRunStore(pool),
  objectStore: new FileObjectStore(),
};

// Create and start the worker
const worker = createWorker<ConsolidateRunJob, RunOutcome>(
  QUEUE_NAMES.CONSOLIDATE_RUN,
  (job: Job<ConsolidateRunJob, RunOutcome>) => processConsolidateRun(job, deps)
);

serveMetrics(config.workerMetricsPort);

logger.info('Consolidator worker started', {
  document_concurrency: config.documentConcurrency,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
