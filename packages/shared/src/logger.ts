/**
 * Structured Logging
 *
 * JSON lines carrying the correlation id, run and document of the current
 * AsyncLocalStorage context. Payroll errors are serialized with their code
 * and the details a failed run or document needs for triage.
 */

import { getCorrelationId, getContext } from './context';
import { ExtractionError, PayrollError, PipelineError } from './errors';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogContext {
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  document?: string;
  attempts?: ReadonlyArray<{ strategy: string; reason: string }>;
  failed_documents?: string[];
  cause?: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError | string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if (error instanceof PayrollError) {
    serialized.code = error.code;
  }
  if (error instanceof ExtractionError) {
    serialized.document = error.document;
    serialized.attempts = error.attempts;
  }
  if (error instanceof PipelineError) {
    serialized.failed_documents = error.documentErrors.map((e) => e.document);
  }
  if (error.cause !== undefined) {
    serialized.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
  }

  return serialized;
}

export function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const runContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    runId: runContext?.runId,
    documentName: runContext?.documentName,
    message,
    ...context,
  });
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    console.error(formatLog('ERROR', message, { ...context, error: serializeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (debugEnabled()) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
