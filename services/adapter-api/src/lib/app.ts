/**
 * Adapter API application
 *
 * POST /runs             - Accepts payroll statements and queues a consolidation run
 * POST /runs/:run_id/cancel - Requests cooperative cancellation of a run
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  validateRunRequest,
  FieldSelectionError,
  type ErrorEnvelope,
} from '@payroll-consolidator/shared';
import { SubmitError, submitRun, type SubmitDependencies } from './submit';

export interface AdapterDependencies extends SubmitDependencies {
  healthCheck: () => Promise<{ queue_depth: number }>;
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

/** HTTP status carried by body-parser errors */
function errorStatus(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

export function createApp(deps: AdapterDependencies): Express {
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

  app.use(express.json({ limit: config.maxRequestBody }));

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      const status = await deps.healthCheck();

      res.json({
        status: 'healthy',
        service: 'adapter-api',
        queue_depth: status.queue_depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'adapter-api',
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
   * POST /runs
   * Stores the documents and queues a consolidation run
   */
  app.post('/runs', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);

    const validation = validateRunRequest(req.body);
    if (!validation.valid) {
      sendError(res, 400, 'invalid_request', validation.errors.join('; '));
      return;
    }

    try {
      const accepted = await submitRun(validation.value, correlationId, deps);
      res.status(202).json(accepted);
    } catch (error) {
      if (error instanceof FieldSelectionError) {
        sendError(res, 400, error.code, error.message);
        return;
      }
      if (error instanceof SubmitError) {
        if (error.status === 503) {
          backpressureRejectionsCounter.inc();
          logger.warn('Request rejected due to backpressure');
        }
        sendError(res, error.status, error.code, error.message);
        return;
      }

      logger.error('Run submission failed', error);
      sendError(res, 500, 'internal_error', 'Failed to submit run');
    }
  });

  /**
   * POST /runs/:run_id/cancel
   * Flags the run; the worker stops before its next document
   */
  app.post('/runs/:run_id/cancel', async (req: Request, res: Response) => {
    const { run_id } = req.params;

    try {
      const outcome = await deps.runStore.requestCancel(run_id);

      if (outcome === 'not_found') {
        sendError(res, 404, 'not_found', `Run ${run_id} not found`);
        return;
      }
      if (outcome === 'already_finished') {
        sendError(res, 409, 'run_finished', `Run ${run_id} has already finished`);
        return;
      }

      logger.info('Run cancellation requested', { run_id });
      res.status(202).json({ run_id, status: 'cancel_requested' });
    } catch (error) {
      logger.error('Failed to request cancellation', error, { run_id });
      sendError(res, 500, 'internal_error', 'Failed to request cancellation');
    }
  });

  // Body parser failures (malformed JSON, oversized body)
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = errorStatus(err);
    if (status === 413) {
      sendError(res, 413, 'payload_too_large', `Request body exceeds ${config.maxRequestBody}`);
      return;
    }
    if (status === 400) {
      sendError(res, 400, 'invalid_request', 'Request body is not valid JSON');
      return;
    }
    next(err);
  });

  return app;
}
