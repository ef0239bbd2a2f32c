/**
 * Query API application
 *
 * Read side of consolidation runs: status, result and table export.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  buildCsv,
  buildWorkbook,
  type ErrorEnvelope,
  type RunRecord,
  type RunStatusResponse,
  type RunStore,
} from '@payroll-consolidator/shared';

export interface QueryDependencies {
  runStore: RunStore;
  healthCheck: () => Promise<void>;
}

export type ExportFormat = 'xlsx' | 'csv';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function toStatusResponse(run: RunRecord): RunStatusResponse {
  return {
    run_id: run.run_id,
    status: run.status,
    progress: run.progress,
    documents: run.document_names,
    document_errors: run.document_errors,
    error_message: run.error_message,
    created_at: run.created_at,
    updated_at: run.updated_at,
  };
}

export function parseExportFormat(value: unknown): ExportFormat | null {
  if (value === undefined || value === 'xlsx') return 'xlsx';
  if (value === 'csv') return 'csv';
  return null;
}

function correlationIdOf(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

export function createApp(deps: QueryDependencies): Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path: string = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.healthCheck();

      res.json({
        status: 'healthy',
        service: 'query-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'query-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * Load a run or answer 404. Returns null when a response was sent.
   */
  async function loadRun(req: Request, res: Response): Promise<RunRecord | null> {
    const { run_id } = req.params;
    const run = await deps.runStore.get(run_id);
    if (!run) {
      sendError(res, 404, 'not_found', `Run ${run_id} not found`);
      return null;
    }
    return run;
  }

  /**
   * GET /runs/:run_id
   * Status, document-granularity progress and per-document errors
   */
  app.get('/runs/:run_id', async (req: Request, res: Response) => {
    try {
      const run = await loadRun(req, res);
      if (!run) return;

      res.json(toStatusResponse(run));
    } catch (error) {
      logger.error('Failed to get run', error, { run_id: req.params.run_id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve run');
    }
  });

  /**
   * GET /runs/:run_id/result
   * The PipelineResult of a completed run
   */
  app.get('/runs/:run_id/result', async (req: Request, res: Response) => {
    try {
      const run = await loadRun(req, res);
      if (!run) return;

      if (run.status !== 'completed' || !run.result) {
        sendError(res, 409, 'run_not_completed', `Run ${run.run_id} is ${run.status}`);
        return;
      }

      res.json(run.result);
    } catch (error) {
      logger.error('Failed to get run result', error, { run_id: req.params.run_id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve run result');
    }
  });

  /**
   * GET /runs/:run_id/export?format=xlsx|csv
   * The consolidated table as a file download
   */
  app.get('/runs/:run_id/export', async (req: Request, res: Response) => {
    const format = parseExportFormat(req.query.format);
    if (!format) {
      sendError(res, 400, 'invalid_request', 'format must be xlsx or csv');
      return;
    }

    try {
      const run = await loadRun(req, res);
      if (!run) return;

      if (run.status !== 'completed' || !run.result) {
        sendError(res, 409, 'run_not_completed', `Run ${run.run_id} is ${run.status}`);
        return;
      }

      const filename = `liquidaciones_${run.run_id}.${format}`;
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);

      if (format === 'csv') {
        res.type('text/csv; charset=utf-8').send(buildCsv(run.result));
      } else {
        res.type(XLSX_CONTENT_TYPE).send(buildWorkbook(run.result));
      }

      logger.info('Run exported', { run_id: run.run_id, format });
    } catch (error) {
      logger.error('Failed to export run', error, { run_id: req.params.run_id });
      sendError(res, 500, 'internal_error', 'Failed to export run');
    }
  });

  return app;
}
