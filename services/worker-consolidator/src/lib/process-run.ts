/**
 * consolidate_run processor
 *
 * Loads a run's documents from the object store, runs the pipeline with
 * document-granularity progress, and persists the terminal state.
 */

import {
  logger,
  config,
  runWithContextAsync,
  runPipeline,
  validatePipelineResult,
  isTerminalStatus,
  FieldSelectionError,
  PipelineCancelledError,
  PipelineError,
  QUEUE_NAMES,
  jobDurationHistogram,
  jobsProcessedCounter,
  runsCounter,
  type ConsolidateRunJob,
  type InputDocument,
  type ObjectStore,
  type PipelineEvent,
  type RunProgress,
  type RunStatus,
  type RunStore,
  type TextExtractor,
} from '@payroll-consolidator/shared';

/** The parts of a BullMQ job the processor uses */
export interface RunJob {
  id?: string;
  data: ConsolidateRunJob;
  attemptsMade: number;
  updateProgress(progress: RunProgress): Promise<void>;
}

export interface ProcessDependencies {
  runStore: RunStore;
  objectStore: ObjectStore;
  extractor?: TextExtractor;
  concurrency?: number;
  maxAttempts?: number;
}

export type RunOutcome = Extract<RunStatus, 'completed' | 'failed' | 'cancelled'> | 'skipped';

/**
 * Cancellation check for the pipeline's document boundaries. Reads the
 * store on every call until a cancel is seen, then stays true.
 */
export function cancellationProbe(runStore: RunStore, runId: string): () => Promise<boolean> {
  let requested = false;

  return async () => {
    if (!requested) {
      requested = await runStore.isCancelRequested(runId);
    }
    return requested;
  };
}

/** Uploaded bytes are only needed until the run reaches a terminal state */
async function discardDocuments(objectStore: ObjectStore, runId: string): Promise<void> {
  try {
    await objectStore.deleteRun(runId);
  } catch (error) {
    logger.warn('Failed to delete run documents', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

async function loadDocuments(job: ConsolidateRunJob, objectStore: ObjectStore): Promise<InputDocument[]> {
  const documents: InputDocument[] = [];
  for (const ref of job.documents) {
    documents.push(await objectStore.getDocument(ref));
  }
  return documents;
}

function recordJob(status: string, startTime: number): void {
  const duration = (Date.now() - startTime) / 1000;
  jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONSOLIDATE_RUN, status });
  jobDurationHistogram.observe({ queue: QUEUE_NAMES.CONSOLIDATE_RUN, status }, duration);
}

/**
 * Process one consolidate_run job.
 *
 * Pipeline failures and cancellations are terminal states of the run, not
 * job failures, so they resolve. Infrastructure errors are rethrown for
 * BullMQ to retry; the run is marked failed on the last attempt.
 */
export async function processConsolidateRun(
  job: RunJob,
  deps: ProcessDependencies
): Promise<RunOutcome> {
  const { correlation_id, run_id } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, runId: run_id }, async () => {
    const startTime = Date.now();
    const { runStore } = deps;

    logger.info('Processing consolidate_run', {
      jobId: job.id,
      documents: job.data.documents.length,
      attempt: job.attemptsMade + 1,
    });

    const existing = await runStore.get(run_id);
    if (!existing) {
      logger.warn('Run not found, dropping job');
      recordJob('skipped', startTime);
      return 'skipped';
    }
    if (isTerminalStatus(existing.status)) {
      logger.info('Run already finished, skipping', { status: existing.status });
      recordJob('skipped', startTime);
      return 'skipped';
    }

    const total = job.data.documents.length;

    try {
      await runStore.markRunning(run_id, total);
      const documents = await loadDocuments(job.data, deps.objectStore);

      let processed = 0;
      const onEvent = async (event: PipelineEvent): Promise<void> => {
        if (event.type !== 'document_finished') return;
        processed++;
        const progress: RunProgress = { processed, total };
        await runStore.updateProgress(run_id, progress);
        await job.updateProgress(progress);
      };

      const result = await runPipeline(documents, {
        fieldSelection: job.data.field_selection,
        ordering: job.data.ordering,
        onEvent,
        shouldCancel: cancellationProbe(runStore, run_id),
        extractor: deps.extractor,
        concurrency: deps.concurrency ?? config.documentConcurrency,
      });

      const validation = validatePipelineResult(result);
      if (!validation.valid) {
        logger.warn('PipelineResult validation failed', { errors: validation.errors });
      }

      if (!(await runStore.complete(run_id, result))) {
        // Cancel requested after the last check, or the run was finalized elsewhere
        if (await runStore.isCancelRequested(run_id)) {
          throw new PipelineCancelledError(total);
        }
        logger.warn('Run was finalized elsewhere, result discarded');
        recordJob('skipped', startTime);
        return 'skipped';
      }
      await discardDocuments(deps.objectStore, run_id);
      runsCounter.inc({ status: 'completed' });
      recordJob('success', startTime);

      logger.info('Run completed', {
        unique_employees: result.unique_employees,
        total_blocks: result.total_blocks,
        document_errors: result.document_errors.length,
      });
      return 'completed';
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        await runStore.markCancelled(run_id);
        await discardDocuments(deps.objectStore, run_id);
        runsCounter.inc({ status: 'cancelled' });
        recordJob('cancelled', startTime);
        logger.info('Run cancelled', { documents_processed: error.documentsProcessed });
        return 'cancelled';
      }

      if (error instanceof PipelineError) {
        await runStore.fail(run_id, error.message, [...error.documentErrors]);
        await discardDocuments(deps.objectStore, run_id);
        runsCounter.inc({ status: 'failed' });
        recordJob('failed', startTime);
        logger.warn('Run failed', { message: error.message });
        return 'failed';
      }

      if (error instanceof FieldSelectionError) {
        await runStore.fail(run_id, error.message, []);
        await discardDocuments(deps.objectStore, run_id);
        runsCounter.inc({ status: 'failed' });
        recordJob('failed', startTime);
        logger.warn('Run rejected', { message: error.message });
        return 'failed';
      }

      recordJob('error', startTime);
      const maxAttempts = deps.maxAttempts ?? config.maxJobAttempts;
      if (job.attemptsMade + 1 >= maxAttempts) {
        const message = error instanceof Error ? error.message : String(error);
        await runStore.fail(run_id, `Run aborted: ${message}`, []);
        await discardDocuments(deps.objectStore, run_id);
        runsCounter.inc({ status: 'failed' });
      }
      throw error;
    }
  });
}
