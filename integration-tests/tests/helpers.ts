/**
 * Test Helpers
 *
 * Fixtures, block builders and in-process stand-ins for the stores the
 * services depend on.
 */

import fs from 'fs';
import path from 'path';
import type { Server } from 'http';
import type { Express } from 'express';
import {
  documentKey,
  isTerminalStatus,
  zeroAmounts,
  type CancelOutcome,
  type DocumentError,
  type InputDocument,
  type MonetaryAmounts,
  type NewRun,
  type ObjectStore,
  type PipelineResult,
  type RawEmployeeBlock,
  type RunProgress,
  type RunRecord,
  type RunStore,
  type StoredDocumentRef,
} from '@payroll-consolidator/shared';

const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

export const FIXED_TIMESTAMP = '2024-04-30T12:00:00.000Z';

/**
 * Load a fixture file as an input document named after the file
 */
export function fixtureDocument(filename: string): InputDocument {
  const bytes = fs.readFileSync(path.join(FIXTURES_DIR, filename));
  return { filename, bytes: new Uint8Array(bytes) };
}

export function textDocument(
  filename: string,
  text: string,
  encoding: BufferEncoding = 'utf8'
): InputDocument {
  return { filename, bytes: new Uint8Array(Buffer.from(text, encoding)) };
}

/**
 * A document whose bytes start with the PDF signature followed by the given text
 */
export function pdfLikeDocument(filename: string, text: string): InputDocument {
  return textDocument(filename, `%PDF-1.7\n${text}`);
}

export interface PdfTextItem {
  x: number;
  y: number;
  text: string;
}

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, (c) => `\\${c}`);
}

/**
 * Build a one-page PDF that shows each item with Helvetica at its position.
 * Items are written in the given order, which need not be reading order.
 */
export function buildTextPdf(items: PdfTextItem[]): Uint8Array {
  const content = items
    .map(({ x, y, text }) => `BT /F1 10 Tf 1 0 0 1 ${x} ${y} Tm (${escapePdfString(text)}) Tj ET`)
    .join('\n');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ' +
      '/Resources << /Font << /F1 5 0 R >> >> /Contents 4 0 R >>',
    `<< /Length ${Buffer.byteLength(content, 'latin1')} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(Buffer.byteLength(pdf, 'latin1'));
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(pdf, 'latin1');
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

export function makeBlock(
  name: string,
  amounts: Partial<MonetaryAmounts> = {},
  overrides: Partial<RawEmployeeBlock> = {}
): RawEmployeeBlock {
  return {
    name,
    amounts: { ...zeroAmounts(), ...amounts },
    hr_id: '',
    position_code: '',
    role_code: '',
    days_worked: '',
    hire_date: '',
    concepts: [],
    source_document: 'test.txt',
    block_index: 0,
    ...overrides,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Start an app on an ephemeral local port
 */
export async function listen(app: Express): Promise<{ url: string; close: () => Promise<void> }> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, '127.0.0.1', () => resolve(started));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * RunStore backed by a Map
 */
export class InMemoryRunStore implements RunStore {
  readonly runs = new Map<string, RunRecord>();
  readonly progressUpdates: RunProgress[] = [];

  private update(runId: string, patch: Partial<RunRecord>): void {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Unknown run ${runId}`);
    }
    this.runs.set(runId, { ...run, ...patch, updated_at: FIXED_TIMESTAMP });
  }

  async create(run: NewRun): Promise<RunRecord> {
    const record: RunRecord = {
      run_id: run.run_id,
      correlation_id: run.correlation_id,
      status: 'queued',
      field_selection: run.field_selection,
      ordering: run.ordering,
      document_names: run.document_names,
      progress: { processed: 0, total: run.document_names.length },
      cancel_requested: false,
      result: null,
      document_errors: [],
      error_message: null,
      created_at: FIXED_TIMESTAMP,
      updated_at: FIXED_TIMESTAMP,
    };
    this.runs.set(run.run_id, record);
    return record;
  }

  async get(runId: string): Promise<RunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async markRunning(runId: string, total: number): Promise<void> {
    this.update(runId, { status: 'running', progress: { processed: 0, total } });
  }

  async updateProgress(runId: string, progress: RunProgress): Promise<void> {
    this.progressUpdates.push(progress);
    this.update(runId, { progress });
  }

  async isCancelRequested(runId: string): Promise<boolean> {
    return this.runs.get(runId)?.cancel_requested ?? false;
  }

  async requestCancel(runId: string): Promise<CancelOutcome> {
    const run = this.runs.get(runId);
    if (!run) return 'not_found';
    if (isTerminalStatus(run.status)) return 'already_finished';
    this.update(runId, { cancel_requested: true });
    return 'requested';
  }

  async complete(runId: string, result: PipelineResult): Promise<boolean> {
    const run = this.runs.get(runId);
    if (!run || run.status !== 'running' || run.cancel_requested) {
      return false;
    }
    const total = run.progress.total;
    this.update(runId, {
      status: 'completed',
      result,
      document_errors: result.document_errors,
      progress: { processed: total, total },
      error_message: null,
    });
    return true;
  }

  async fail(runId: string, message: string, documentErrors: DocumentError[]): Promise<void> {
    this.update(runId, { status: 'failed', error_message: message, document_errors: documentErrors });
  }

  async markCancelled(runId: string): Promise<void> {
    const run = this.runs.get(runId);
    if (!run || isTerminalStatus(run.status)) return;
    this.update(runId, { status: 'cancelled', result: null });
  }
}

/**
 * ObjectStore backed by a Map, using the same keys as the file store
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Uint8Array>();

  async putDocument(
    runId: string,
    position: number,
    document: InputDocument
  ): Promise<StoredDocumentRef> {
    const key = documentKey(runId, position, document.filename);
    this.objects.set(key, document.bytes);
    return { key, filename: document.filename };
  }

  async getDocument(ref: StoredDocumentRef): Promise<InputDocument> {
    const bytes = this.objects.get(ref.key);
    if (!bytes) {
      throw new Error(`Missing object ${ref.key}`);
    }
    return { filename: ref.filename, bytes };
  }

  async deleteRun(runId: string): Promise<void> {
    for (const key of [...this.objects.keys()]) {
      if (key.startsWith(`runs/${runId}/`)) {
        this.objects.delete(key);
      }
    }
  }
}
