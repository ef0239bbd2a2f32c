/**
 * Run Submission
 *
 * Decodes the submitted documents, stores them in the object store,
 * records the run, and enqueues a consolidate_run job.
 */

import { ulid } from 'ulid';
import {
  logger,
  config,
  resolveFieldSelection,
  resolveOrdering,
  QUEUE_NAMES,
  type ConsolidateRunJob,
  type InputDocument,
  type ObjectStore,
  type RunAcceptedResponse,
  type RunRequest,
  type RunStore,
  type StoredDocumentRef,
} from '@payroll-consolidator/shared';

export interface RunQueue {
  add(name: string, data: ConsolidateRunJob, opts?: { jobId?: string }): Promise<unknown>;
}

export interface BackpressureStatus {
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}

export interface SubmitDependencies {
  runStore: RunStore;
  objectStore: ObjectStore;
  queue: RunQueue;
  checkBackpressure: () => Promise<BackpressureStatus>;
  generateId?: () => string;
}

export type SubmitErrorCode = 'payload_too_large' | 'invalid_document' | 'service_unavailable';

/**
 * Rejection that maps onto an HTTP status
 */
export class SubmitError extends Error {
  constructor(
    readonly status: number,
    readonly code: SubmitErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SubmitError';
  }
}

const BASE64_BODY = /^[A-Za-z0-9+/\r\n]*={0,2}$/;

/**
 * Decode the base64 payloads and enforce the intake limits
 */
export function decodeDocuments(request: RunRequest): InputDocument[] {
  if (request.documents.length > config.maxDocumentsPerRun) {
    throw new SubmitError(
      413,
      'payload_too_large',
      `A run accepts at most ${config.maxDocumentsPerRun} documents, received ${request.documents.length}`
    );
  }

  return request.documents.map((doc) => {
    if (!BASE64_BODY.test(doc.content_base64)) {
      throw new SubmitError(400, 'invalid_document', `${doc.filename} is not valid base64`);
    }

    const bytes = Buffer.from(doc.content_base64, 'base64');
    if (bytes.byteLength > config.maxDocumentBytes) {
      throw new SubmitError(
        413,
        'payload_too_large',
        `${doc.filename} exceeds ${config.maxDocumentBytes} bytes`
      );
    }

    return { filename: doc.filename, bytes: new Uint8Array(bytes) };
  });
}

/**
 * Accept a run. Field selection and ordering are resolved here so an
 * invalid request is rejected before anything is stored.
 */
export async function submitRun(
  request: RunRequest,
  correlationId: string,
  deps: SubmitDependencies
): Promise<RunAcceptedResponse> {
  const fieldSelection = resolveFieldSelection(request.field_selection);
  const ordering = resolveOrdering(request.ordering, config.defaultOrdering);
  const documents = decodeDocuments(request);

  const backpressure = await deps.checkBackpressure();
  if (backpressure.shouldReject) {
    throw new SubmitError(
      503,
      'service_unavailable',
      'System is under heavy load. Please retry later.'
    );
  }
  if (backpressure.shouldWarn) {
    logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
  }

  const runId = (deps.generateId ?? ulid)();

  let created = false;
  try {
    const stored: StoredDocumentRef[] = [];
    for (const [position, document] of documents.entries()) {
      stored.push(await deps.objectStore.putDocument(runId, position, document));
    }

    await deps.runStore.create({
      run_id: runId,
      correlation_id: correlationId,
      field_selection: fieldSelection,
      ordering,
      document_names: documents.map((d) => d.filename),
    });
    created = true;

    const job: ConsolidateRunJob = {
      event_type: 'run.submitted',
      correlation_id: correlationId,
      run_id: runId,
      documents: stored,
      field_selection: fieldSelection,
      ordering,
      submitted_at: new Date().toISOString(),
    };

    await deps.queue.add(QUEUE_NAMES.CONSOLIDATE_RUN, job, { jobId: `run_${runId}` });
  } catch (error) {
    logger.warn('Run submission failed, discarding stored documents', { run_id: runId });
    await deps.objectStore.deleteRun(runId);
    if (created) {
      await deps.runStore.fail(runId, 'Run could not be queued', []);
    }
    throw error;
  }

  logger.info('Enqueued consolidate_run job', {
    run_id: runId,
    documents: documents.length,
    ordering,
    field_selection: fieldSelection,
  });

  return { run_id: runId, correlation_id: correlationId };
}
