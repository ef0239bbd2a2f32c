/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withContextFields,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export {
  logger,
  formatLog,
  serializeError,
  type LogContext,
  type LogLevel,
  type SerializedError,
} from './logger';

// Config
export { config, parsePositiveInt, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PayrollError,
  SniffError,
  ExtractionError,
  PipelineError,
  PipelineCancelledError,
  FieldSelectionError,
  type PayrollErrorCode,
  type ParseWarning,
} from './errors';

// Field registry
export {
  MONETARY_FIELDS,
  FIELD_IDS,
  FIELD_LABELS,
  ORDERINGS,
  isFieldId,
  isMonetaryField,
  isOrdering,
  mapMonetaryFields,
  zeroAmounts,
  addAmounts,
  resolveFieldSelection,
  resolveOrdering,
} from './fields';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ConsolidateRunJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
  blocksParsedCounter,
  runsCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateRunRequest, validatePipelineResult, type ValidationResult } from './schemas';

// Storage
export {
  FileObjectStore,
  sanitizeFilename,
  documentKey,
  type ObjectStore,
} from './object-store';
export {
  PgRunStore,
  createPool,
  isTerminalStatus,
  TERMINAL_STATUSES,
  type RunStore,
  type NewRun,
  type CancelOutcome,
} from './run-store';

// Extraction
export { classify, PDF_MAGIC, type SniffResult } from './extraction/format-sniffer';
export {
  TextExtractor,
  decodePlainText,
  type ExtractedText,
  type TextExtractorOptions,
} from './extraction/text-extractor';
export {
  pdfjsLayoutStrategy,
  pdfParseStreamStrategy,
  type TextStrategy,
} from './extraction/pdf-text';

// Payroll statement parsing
export {
  PATTERN_VERSION,
  MONETARY_FIELD_SOURCES,
  compilePayrollPatterns,
  parseAmountToCents,
  parseArgentineAmount,
  centsToDecimal,
  cleanStatementText,
  splitIntoSegments,
  parseBlock,
  parsePayrollStatement,
  type PayrollPatternSet,
  type MonetaryFieldPattern,
  type AmountNormalizer,
  type IdentityFieldId,
  type ParseOutcome,
  type Segmentation,
} from './extractors/payroll-statement';

// Consolidation
export {
  emptyConsolidation,
  normalizeEmployeeName,
  conceptKey,
  employeeFromBlock,
  mergeEmployees,
  foldEmployee,
  foldBlock,
  finishConsolidation,
  consolidate,
  reconsolidate,
  orderEmployees,
  type ConsolidationState,
} from './consolidation/consolidator';

// Export
export {
  selectedMonetaryFields,
  computeGrandTotals,
  availableFields,
  projectTable,
} from './export/table';
export {
  buildWorkbook,
  buildCsv,
  DEFAULT_TITLE,
  SHEET_NAME,
  NUMBER_FORMAT,
  type WorkbookOptions,
} from './export/workbook';

// Pipeline
export {
  runPipeline,
  processDocument,
  type PipelineEvent,
  type PipelineOptions,
} from './pipeline';
