/**
 * Consolidation Pipeline
 *
 * Runs every document through sniffing, text extraction and parsing, then
 * consolidates all blocks of the run in a single pass. A failed document is
 * recorded on the result; the run fails only when no document yields a block.
 */

import { consolidate, orderEmployees } from './consolidation/consolidator';
import { withContextFields } from './context';
import { ExtractionError, PipelineCancelledError, PipelineError } from './errors';
import { classify } from './extraction/format-sniffer';
import { TextExtractor } from './extraction/text-extractor';
import { availableFields, computeGrandTotals, projectTable } from './export/table';
import {
  compilePayrollPatterns,
  parsePayrollStatement,
  type PayrollPatternSet,
} from './extractors/payroll-statement';
import { resolveFieldSelection, resolveOrdering } from './fields';
import { logger } from './logger';
import {
  blocksParsedCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
} from './metrics';
import type {
  DocumentError,
  DocumentSummary,
  InputDocument,
  Ordering,
  PipelineResult,
  RawEmployeeBlock,
} from './types';

export type PipelineEvent =
  | { type: 'run_started'; total: number }
  | { type: 'document_started'; document: string; index: number; total: number }
  | {
      type: 'document_finished';
      document: string;
      index: number;
      total: number;
      blocks: number;
      error: DocumentError | null;
    }
  | { type: 'run_completed'; total_blocks: number; unique_employees: number }
  | { type: 'run_failed'; message: string }
  | { type: 'run_cancelled'; documents_processed: number };

export interface PipelineOptions {
  /** Field ids to project, in column order. Defaults to every field. */
  fieldSelection?: readonly string[];
  /** Defaults to 'alphabetical' */
  ordering?: string;
  /** Document-granularity progress and terminal notifications */
  onEvent?: (event: PipelineEvent) => void | Promise<void>;
  /** Checked before each document and once after the last; true discards the run */
  shouldCancel?: () => boolean | Promise<boolean>;
  extractor?: TextExtractor;
  /** Documents extracted and parsed at once. Consolidation stays single-pass. */
  concurrency?: number;
}

interface DocumentOutcome {
  summary: DocumentSummary;
  blocks: RawEmployeeBlock[];
  error: DocumentError | null;
}

const DEFAULT_ORDERING: Ordering = 'alphabetical';

function laneCount(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) return 1;
  return Math.max(1, Math.floor(requested));
}

/**
 * Sniff, extract and parse one document. Extraction failures and empty
 * documents become a DocumentError instead of failing the run.
 */
export async function processDocument(
  document: InputDocument,
  extractor: TextExtractor,
  patterns: PayrollPatternSet
): Promise<DocumentOutcome> {
  const { classification, content } = classify(document.bytes);
  const summary: DocumentSummary = {
    document: document.filename,
    classification,
    extraction_method: null,
    blocks: 0,
    skipped_blocks: 0,
  };

  const startTime = Date.now();
  let text: string;
  try {
    const extracted = await extractor.extract(content, classification, document.filename);
    text = extracted.text;
    summary.extraction_method = extracted.method;
    extractionDurationHistogram.observe(
      { method: extracted.method },
      (Date.now() - startTime) / 1000
    );
  } catch (error) {
    if (!(error instanceof ExtractionError)) throw error;

    logger.warn('Document extraction failed', { error: error.message });
    documentsProcessedCounter.inc({ classification, status: 'extraction_error' });
    return {
      summary,
      blocks: [],
      error: { document: document.filename, error_type: 'extraction_error', message: error.message },
    };
  }

  const outcome = parsePayrollStatement(text, document.filename, patterns);
  summary.blocks = outcome.blocks.length;
  summary.skipped_blocks = outcome.skipped_blocks;
  blocksParsedCounter.inc({ outcome: 'emitted' }, outcome.blocks.length);
  blocksParsedCounter.inc({ outcome: 'skipped' }, outcome.skipped_blocks);

  if (outcome.blocks.length === 0) {
    documentsProcessedCounter.inc({ classification, status: 'no_blocks' });
    const skipped = outcome.skipped_blocks > 0 ? ` (${outcome.skipped_blocks} without a name)` : '';
    return {
      summary,
      blocks: [],
      error: {
        document: document.filename,
        error_type: 'no_blocks',
        message: `No employee blocks found${skipped}`,
      },
    };
  }

  documentsProcessedCounter.inc({ classification, status: 'success' });
  return { summary, blocks: outcome.blocks, error: null };
}

/**
 * Run the pipeline over a set of documents.
 *
 * Rejects with PipelineCancelledError when cancellation is observed
 * (no partial result), and with PipelineError when no document yields
 * any block.
 */
export async function runPipeline(
  documents: readonly InputDocument[],
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const fieldSelection = resolveFieldSelection(options.fieldSelection);
  const ordering = resolveOrdering(options.ordering, DEFAULT_ORDERING);
  const extractor = options.extractor ?? new TextExtractor();
  const concurrency = laneCount(options.concurrency);
  const emit = async (event: PipelineEvent) => {
    if (options.onEvent) await options.onEvent(event);
  };

  // One compiled pattern set for every block of the run
  const patterns = compilePayrollPatterns();
  const total = documents.length;
  const outcomes: Array<DocumentOutcome | undefined> = new Array(total);

  logger.info('Pipeline started', {
    documents: total,
    ordering,
    field_selection: fieldSelection,
    concurrency,
  });
  await emit({ type: 'run_started', total });

  let next = 0;
  let finished = 0;
  let cancelled = false;

  const lane = async (): Promise<void> => {
    while (!cancelled && next < total) {
      if (options.shouldCancel && (await options.shouldCancel())) {
        cancelled = true;
        return;
      }
      // Another lane may have claimed the last document while we awaited
      if (next >= total) return;

      const index = next++;
      const document = documents[index];
      await emit({ type: 'document_started', document: document.filename, index, total });

      const outcome = await withContextFields({ documentName: document.filename }, () =>
        processDocument(document, extractor, patterns)
      );
      outcomes[index] = outcome;
      finished++;

      await emit({
        type: 'document_finished',
        document: document.filename,
        index,
        total,
        blocks: outcome.blocks.length,
        error: outcome.error,
      });
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(total, 1)) }, lane));

  // A cancel that arrived during the last document still discards the run
  if (!cancelled && options.shouldCancel && (await options.shouldCancel())) {
    cancelled = true;
  }

  if (cancelled) {
    logger.info('Pipeline cancelled', { documents_processed: finished });
    await emit({ type: 'run_cancelled', documents_processed: finished });
    throw new PipelineCancelledError(finished);
  }

  const completed = outcomes.filter((o): o is DocumentOutcome => o !== undefined);
  const blocks = completed.flatMap((o) => o.blocks);
  const documentErrors = completed
    .map((o) => o.error)
    .filter((e): e is DocumentError => e !== null);
  const skippedBlocks = completed.reduce((sum, o) => sum + o.summary.skipped_blocks, 0);

  if (blocks.length === 0) {
    const message =
      total === 0
        ? 'No documents were provided'
        : `None of the ${total} document(s) yielded an employee block`;
    logger.warn('Pipeline failed', { message, document_errors: documentErrors.length });
    await emit({ type: 'run_failed', message });
    throw new PipelineError(message, documentErrors);
  }

  const employees = orderEmployees(consolidate(blocks), ordering);
  const grandTotals = computeGrandTotals(employees, fieldSelection);

  const result: PipelineResult = {
    schema_version: '1.0',
    field_selection: fieldSelection,
    ordering,
    employees,
    grand_totals: grandTotals,
    table: projectTable(employees, fieldSelection, grandTotals),
    total_blocks: blocks.length,
    unique_employees: employees.length,
    skipped_blocks: skippedBlocks,
    document_errors: documentErrors,
    documents: completed.map((o) => o.summary),
    available_fields: availableFields(employees),
  };

  logger.info('Pipeline completed', {
    total_blocks: result.total_blocks,
    unique_employees: result.unique_employees,
    skipped_blocks: result.skipped_blocks,
    document_errors: documentErrors.length,
  });
  await emit({
    type: 'run_completed',
    total_blocks: result.total_blocks,
    unique_employees: result.unique_employees,
  });

  return result;
}
