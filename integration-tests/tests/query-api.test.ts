/**
 * Query API Tests
 *
 * Run status, result and export endpoints against an in-memory run store.
 */

import * as XLSX from 'xlsx';
import { runPipeline, SHEET_NAME, type PipelineResult } from '@payroll-consolidator/shared';
import { createApp, parseExportFormat } from '../../services/query-api/src/lib/app';
import { FIXED_TIMESTAMP, fixtureDocument, InMemoryRunStore, listen } from './helpers';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

describe('Query API', () => {
  let runStore: InMemoryRunStore;
  let result: PipelineResult;
  let server: { url: string; close: () => Promise<void> };

  beforeAll(async () => {
    result = await runPipeline([fixtureDocument('liquidacion_marzo.txt')], {
      fieldSelection: ['name', 'net_payable'],
      ordering: 'alphabetical',
    });
  });

  beforeEach(async () => {
    runStore = new InMemoryRunStore();

    await runStore.create({
      run_id: 'DONE',
      correlation_id: 'corr-1',
      field_selection: ['name', 'net_payable'],
      ordering: 'alphabetical',
      document_names: ['liquidacion_marzo.txt'],
    });
    await runStore.markRunning('DONE', 1);
    await runStore.complete('DONE', result);

    await runStore.create({
      run_id: 'BUSY',
      correlation_id: 'corr-2',
      field_selection: ['name'],
      ordering: 'original',
      document_names: ['a.txt', 'b.txt'],
    });
    await runStore.markRunning('BUSY', 2);
    await runStore.updateProgress('BUSY', { processed: 1, total: 2 });

    server = await listen(
      createApp({
        runStore,
        healthCheck: async () => undefined,
      })
    );
  });

  afterEach(async () => {
    await server.close();
  });

  describe('GET /runs/:run_id', () => {
    it('should return status and document-granularity progress', async () => {
      const response = await fetch(`${server.url}/runs/BUSY`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        run_id: 'BUSY',
        status: 'running',
        progress: { processed: 1, total: 2 },
        documents: ['a.txt', 'b.txt'],
        document_errors: [],
        error_message: null,
        created_at: FIXED_TIMESTAMP,
        updated_at: FIXED_TIMESTAMP,
      });
    });

    it('should answer 404 for an unknown run', async () => {
      const response = await fetch(`${server.url}/runs/NOPE`, {
        headers: { 'X-Correlation-Id': 'corr-404' },
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: { code: 'not_found', message: 'Run NOPE not found', correlation_id: 'corr-404' },
      });
    });
  });

  describe('GET /runs/:run_id/result', () => {
    it('should return the pipeline result of a completed run', async () => {
      const response = await fetch(`${server.url}/runs/DONE/result`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual(JSON.parse(JSON.stringify(result)));
    });

    it('should answer 409 while the run is in progress', async () => {
      const response = await fetch(`${server.url}/runs/BUSY/result`);

      expect(response.status).toBe(409);
      expect(await response.json()).toMatchObject({
        error: { code: 'run_not_completed', message: 'Run BUSY is running' },
      });
    });
  });

  describe('GET /runs/:run_id/export', () => {
    it('should download the table as CSV with a byte order mark', async () => {
      const response = await fetch(`${server.url}/runs/DONE/export?format=csv`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/csv; charset=utf-8');
      expect(response.headers.get('content-disposition')).toBe(
        'attachment; filename="liquidaciones_DONE.csv"'
      );

      const bytes = Buffer.from(await response.arrayBuffer());
      expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
      expect(bytes.subarray(3).toString('utf8').split('\n')).toEqual([
        'Apellido y Nombre,Líquido',
        'LOPEZ MARIA ELENA,125500',
        'PEREZ JUAN CARLOS,211836.82',
      ]);
    });

    it('should download the table as XLSX by default', async () => {
      const response = await fetch(`${server.url}/runs/DONE/export`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe(XLSX_CONTENT_TYPE);
      expect(response.headers.get('content-disposition')).toBe(
        'attachment; filename="liquidaciones_DONE.xlsx"'
      );

      const workbook = XLSX.read(Buffer.from(await response.arrayBuffer()), { type: 'buffer' });
      const sheet = workbook.Sheets[SHEET_NAME];
      expect(sheet['A4'].v).toBe('LOPEZ MARIA ELENA');
      expect(sheet['B6'].v).toBe(337336.82);
    });

    it('should reject an unknown format', async () => {
      const response = await fetch(`${server.url}/runs/DONE/export?format=pdf`);

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'invalid_request', message: 'format must be xlsx or csv' },
      });
    });

    it('should answer 409 for a run without a result', async () => {
      const response = await fetch(`${server.url}/runs/BUSY/export?format=csv`);

      expect(response.status).toBe(409);
    });
  });

  it('should parse export formats', () => {
    expect(parseExportFormat(undefined)).toBe('xlsx');
    expect(parseExportFormat('xlsx')).toBe('xlsx');
    expect(parseExportFormat('csv')).toBe('csv');
    expect(parseExportFormat(['csv', 'xlsx'])).toBeNull();
  });
});
