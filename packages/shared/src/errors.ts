/**
 * Error Taxonomy
 *
 * Per-document failures are captured on the result; only PipelineError and
 * PipelineCancelledError reach the caller of a run.
 */

import type { DocumentError } from './types';

export type PayrollErrorCode =
  | 'sniff_error'
  | 'extraction_error'
  | 'pipeline_error'
  | 'pipeline_cancelled'
  | 'invalid_field_selection';

export class PayrollError extends Error {
  readonly code: PayrollErrorCode;

  constructor(code: PayrollErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Unreadable input during sniffing. Recovered by treating the input as
 * empty plain text; never surfaces from a run.
 */
export class SniffError extends PayrollError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sniff_error', message, options);
  }
}

/**
 * Every decoding strategy failed for a document.
 */
export class ExtractionError extends PayrollError {
  readonly document: string;
  readonly attempts: ReadonlyArray<{ strategy: string; reason: string }>;

  constructor(
    document: string,
    attempts: ReadonlyArray<{ strategy: string; reason: string }>,
    options?: { cause?: unknown }
  ) {
    const detail = attempts.map((a) => `${a.strategy}: ${a.reason}`).join('; ');
    super('extraction_error', `Could not extract text from ${document} (${detail})`, options);
    this.document = document;
    this.attempts = attempts;
  }
}

/**
 * No document in the run produced a usable block.
 */
export class PipelineError extends PayrollError {
  readonly documentErrors: readonly DocumentError[];

  constructor(message: string, documentErrors: readonly DocumentError[]) {
    super('pipeline_error', message);
    this.documentErrors = documentErrors;
  }
}

export class PipelineCancelledError extends PayrollError {
  readonly documentsProcessed: number;

  constructor(documentsProcessed: number) {
    super('pipeline_cancelled', `Run cancelled after ${documentsProcessed} document(s)`);
    this.documentsProcessed = documentsProcessed;
  }
}

export class FieldSelectionError extends PayrollError {
  constructor(message: string) {
    super('invalid_field_selection', message);
  }
}

/**
 * Non-fatal parse diagnostic. Collected on the parse outcome, never thrown.
 */
export interface ParseWarning {
  kind: 'missing_name';
  document: string;
  block_index: number;
  excerpt: string;
}
