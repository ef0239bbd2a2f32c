/**
 * Run Store
 *
 * Persistence of consolidation runs in the consolidation_runs table.
 * Services depend on the RunStore interface; PgRunStore is the Postgres implementation.
 */

import { Pool, type QueryResultRow } from 'pg';
import { config } from './config';
import { logger } from './logger';
import { dbQueryDurationHistogram } from './metrics';
import type {
  DocumentError,
  FieldId,
  Ordering,
  PipelineResult,
  RunProgress,
  RunRecord,
  RunStatus,
} from './types';

export interface NewRun {
  run_id: string;
  correlation_id: string;
  field_selection: FieldId[];
  ordering: Ordering;
  document_names: string[];
}

export type CancelOutcome = 'requested' | 'not_found' | 'already_finished';

export interface RunStore {
  create(run: NewRun): Promise<RunRecord>;
  get(runId: string): Promise<RunRecord | null>;
  markRunning(runId: string, total: number): Promise<void>;
  updateProgress(runId: string, progress: RunProgress): Promise<void>;
  isCancelRequested(runId: string): Promise<boolean>;
  requestCancel(runId: string): Promise<CancelOutcome>;
  /**
   * Store the result of a running run. Returns false, leaving the run
   * untouched, when a cancel was requested or the run is no longer running.
   */
  complete(runId: string, result: PipelineResult): Promise<boolean>;
  fail(runId: string, message: string, documentErrors: DocumentError[]): Promise<void>;
  markCancelled(runId: string): Promise<void>;
}

export const TERMINAL_STATUSES: readonly RunStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

interface RunRow extends QueryResultRow {
  run_id: string;
  correlation_id: string;
  status: RunStatus;
  field_selection: FieldId[];
  ordering: Ordering;
  document_names: string[];
  processed: number;
  total: number;
  cancel_requested: boolean;
  result: PipelineResult | null;
  document_errors: DocumentError[];
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
}

const RUN_COLUMNS = `run_id, correlation_id, status, field_selection, ordering, document_names,
  processed, total, cancel_requested, result, document_errors, error_message,
  created_at, updated_at`;

function toRecord(row: RunRow): RunRecord {
  return {
    run_id: row.run_id,
    correlation_id: row.correlation_id,
    status: row.status,
    field_selection: row.field_selection,
    ordering: row.ordering,
    document_names: row.document_names,
    progress: { processed: row.processed, total: row.total },
    cancel_requested: row.cancel_requested,
    result: row.result,
    document_errors: row.document_errors,
    error_message: row.error_message,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

export class PgRunStore implements RunStore {
  constructor(private readonly pool: Pool) {}

  private async query<R extends QueryResultRow>(
    operation: string,
    sql: string,
    params: unknown[]
  ): Promise<R[]> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query<R>(sql, params);
      return result.rows;
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  async create(run: NewRun): Promise<RunRecord> {
    const rows = await this.query<RunRow>(
      'create_run',
      `INSERT INTO consolidation_runs
         (run_id, correlation_id, status, field_selection, ordering, document_names, total)
       VALUES ($1, $2, 'queued', $3, $4, $5, $6)
       RETURNING ${RUN_COLUMNS}`,
      [
        run.run_id,
        run.correlation_id,
        JSON.stringify(run.field_selection),
        run.ordering,
        JSON.stringify(run.document_names),
        run.document_names.length,
      ]
    );

    logger.info('Run created', { run_id: run.run_id, documents: run.document_names.length });
    return toRecord(rows[0]);
  }

  async get(runId: string): Promise<RunRecord | null> {
    const rows = await this.query<RunRow>(
      'get_run',
      `SELECT ${RUN_COLUMNS} FROM consolidation_runs WHERE run_id = $1`,
      [runId]
    );
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async markRunning(runId: string, total: number): Promise<void> {
    await this.query(
      'mark_running',
      `UPDATE consolidation_runs
       SET status = 'running', processed = 0, total = $2, updated_at = NOW()
       WHERE run_id = $1 AND status IN ('queued', 'running')`,
      [runId, total]
    );
  }

  async updateProgress(runId: string, progress: RunProgress): Promise<void> {
    await this.query(
      'update_progress',
      `UPDATE consolidation_runs
       SET processed = $2, total = $3, updated_at = NOW()
       WHERE run_id = $1`,
      [runId, progress.processed, progress.total]
    );
  }

  async isCancelRequested(runId: string): Promise<boolean> {
    const rows = await this.query<{ cancel_requested: boolean }>(
      'is_cancel_requested',
      'SELECT cancel_requested FROM consolidation_runs WHERE run_id = $1',
      [runId]
    );
    return rows.length > 0 && rows[0].cancel_requested;
  }

  async requestCancel(runId: string): Promise<CancelOutcome> {
    const rows = await this.query<{ run_id: string }>(
      'request_cancel',
      `UPDATE consolidation_runs
       SET cancel_requested = TRUE, updated_at = NOW()
       WHERE run_id = $1 AND status IN ('queued', 'running')
       RETURNING run_id`,
      [runId]
    );
    if (rows.length > 0) {
      return 'requested';
    }

    const existing = await this.get(runId);
    return existing ? 'already_finished' : 'not_found';
  }

  async complete(runId: string, result: PipelineResult): Promise<boolean> {
    const rows = await this.query<{ run_id: string }>(
      'complete_run',
      `UPDATE consolidation_runs
       SET status = 'completed', result = $2, document_errors = $3,
           processed = total, error_message = NULL, updated_at = NOW()
       WHERE run_id = $1 AND status = 'running' AND cancel_requested = FALSE
       RETURNING run_id`,
      [runId, JSON.stringify(result), JSON.stringify(result.document_errors)]
    );
    return rows.length > 0;
  }

  async fail(runId: string, message: string, documentErrors: DocumentError[]): Promise<void> {
    await this.query(
      'fail_run',
      `UPDATE consolidation_runs
       SET status = 'failed', error_message = $2, document_errors = $3, updated_at = NOW()
       WHERE run_id = $1`,
      [runId, message, JSON.stringify(documentErrors)]
    );
  }

  async markCancelled(runId: string): Promise<void> {
    await this.query(
      'cancel_run',
      `UPDATE consolidation_runs
       SET status = 'cancelled', result = NULL, updated_at = NOW()
       WHERE run_id = $1 AND status IN ('queued', 'running')`,
      [runId]
    );
  }
}

export function createPool(connectionString: string = config.databaseUrl): Pool {
  return new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}
