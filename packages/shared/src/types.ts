/**
 * Shared TypeScript Types
 *
 * Types for the payroll statement consolidation pipeline, matching JSON schemas in docs/contracts/
 */

import type { MONETARY_FIELDS } from './fields';

// ============================================================================
// Fields & Money
// ============================================================================

export type MonetaryFieldId = (typeof MONETARY_FIELDS)[number];

export type FieldId = 'name' | MonetaryFieldId;

/** Integer amount of cents. The canonical decimal value is cents / 100. */
export type Cents = number;

export type MonetaryAmounts = Record<MonetaryFieldId, Cents>;

export type Ordering = 'original' | 'alphabetical';

// ============================================================================
// Documents
// ============================================================================

export interface InputDocument {
  /** Origin filename, used only for labeling and diagnostics */
  filename: string;
  bytes: Uint8Array;
}

/** Pointer to a document's bytes in the object store */
export interface StoredDocumentRef {
  key: string;
  filename: string;
}

export type DocumentClassification = 'real_document' | 'plain_text';

export type ExtractionMethod = 'pdfjs_layout' | 'pdf_parse' | 'plain_text';

// ============================================================================
// Parsed Records
// ============================================================================

/** DV = accrual (devengado), RT = withholding (retención) */
export type ConceptKind = 'DV' | 'RT';

export interface ConceptLine {
  readonly kind: ConceptKind;
  readonly code: string;
  readonly label: string;
  readonly amount: Cents;
}

/**
 * One occurrence of an employee inside a statement. An employee holding
 * several roles appears once per role.
 */
export interface RawEmployeeBlock {
  readonly name: string;
  readonly amounts: Readonly<MonetaryAmounts>;
  readonly hr_id: string;
  readonly position_code: string;
  readonly role_code: string;
  readonly days_worked: string;
  readonly hire_date: string;
  readonly concepts: readonly ConceptLine[];
  readonly source_document: string;
  readonly block_index: number;
}

export interface ConceptTotal {
  readonly key: string;
  readonly kind: ConceptKind;
  readonly code: string;
  readonly label: string;
  readonly amount: Cents;
}

export interface ConsolidatedEmployee {
  readonly normalized_name: string;
  readonly display_name: string;
  readonly amounts: Readonly<MonetaryAmounts>;
  readonly block_count: number;
  readonly source_documents: readonly string[];
  readonly hr_ids: readonly string[];
  readonly concepts: readonly ConceptTotal[];
}

// ============================================================================
// Pipeline Result
// ============================================================================

export type DocumentErrorType = 'extraction_error' | 'no_blocks';

export interface DocumentError {
  document: string;
  error_type: DocumentErrorType;
  message: string;
}

export interface DocumentSummary {
  document: string;
  classification: DocumentClassification;
  extraction_method: ExtractionMethod | null;
  blocks: number;
  skipped_blocks: number;
}

export interface TableColumn {
  field: FieldId;
  label: string;
}

export type TableRow = {
  name?: string;
} & {
  [K in MonetaryFieldId]?: number;
};

export type TableTotals = {
  [K in MonetaryFieldId]?: number;
};

export interface ResultTable {
  columns: TableColumn[];
  rows: TableRow[];
  totals: TableTotals;
}

export interface PipelineResult {
  schema_version: '1.0';
  field_selection: FieldId[];
  ordering: Ordering;
  employees: ConsolidatedEmployee[];
  grand_totals: Partial<MonetaryAmounts>;
  table: ResultTable;
  total_blocks: number;
  unique_employees: number;
  skipped_blocks: number;
  document_errors: DocumentError[];
  documents: DocumentSummary[];
  available_fields: FieldId[];
}

// ============================================================================
// Runs
// ============================================================================

export type RunStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface RunProgress {
  processed: number;
  total: number;
}

export interface RunRecord {
  run_id: string;
  correlation_id: string;
  status: RunStatus;
  field_selection: FieldId[];
  ordering: Ordering;
  document_names: string[];
  progress: RunProgress;
  cancel_requested: boolean;
  result: PipelineResult | null;
  document_errors: DocumentError[];
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface RunRequestDocument {
  filename: string;
  content_base64: string;
}

export interface RunRequest {
  documents: RunRequestDocument[];
  field_selection?: string[];
  ordering?: string;
}

export interface RunAcceptedResponse {
  run_id: string;
  correlation_id: string;
}

export interface RunStatusResponse {
  run_id: string;
  status: RunStatus;
  progress: RunProgress;
  documents: string[];
  document_errors: DocumentError[];
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
