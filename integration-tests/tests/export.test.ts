/**
 * Spreadsheet Export Tests
 *
 * Reads the generated XLSX and CSV back and checks their layout.
 */

import * as XLSX from 'xlsx';
import {
  buildCsv,
  buildWorkbook,
  runPipeline,
  DEFAULT_TITLE,
  NUMBER_FORMAT,
  SHEET_NAME,
  type PipelineResult,
} from '@payroll-consolidator/shared';
import { fixtureDocument } from './helpers';

describe('Spreadsheet export', () => {
  let result: PipelineResult;

  beforeAll(async () => {
    result = await runPipeline([fixtureDocument('liquidacion_marzo.txt')], {
      fieldSelection: ['name', 'net_payable', 'remuneration_with_contribution'],
      ordering: 'alphabetical',
    });
  });

  describe('buildWorkbook', () => {
    function readSheet(buffer: Buffer): XLSX.WorkSheet {
      const workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
      expect(workbook.SheetNames).toEqual([SHEET_NAME]);
      return workbook.Sheets[SHEET_NAME];
    }

    it('should lay out title, header, one row per employee and a TOTAL row', () => {
      const sheet = readSheet(buildWorkbook(result));

      expect(sheet['A1'].v).toBe(DEFAULT_TITLE);
      expect([sheet['A3'].v, sheet['B3'].v, sheet['C3'].v]).toEqual([
        'Apellido y Nombre',
        'Líquido',
        'Rem c/ Aporte',
      ]);
      expect([sheet['A4'].v, sheet['B4'].v, sheet['C4'].v]).toEqual([
        'LOPEZ MARIA ELENA',
        125500,
        150000,
      ]);
      expect([sheet['A5'].v, sheet['B5'].v, sheet['C5'].v]).toEqual([
        'PEREZ JUAN CARLOS',
        211836.82,
        307006.97,
      ]);
      expect([sheet['A6'].v, sheet['B6'].v, sheet['C6'].v]).toEqual(['TOTAL', 337336.82, 457006.97]);
    });

    it('should format amount cells with thousands separators and two decimals', () => {
      const sheet = readSheet(buildWorkbook(result));

      for (const address of ['B4', 'C5', 'B6']) {
        expect(sheet[address].z).toBe(NUMBER_FORMAT);
      }
    });

    it('should merge the title across the table width', () => {
      const sheet = readSheet(buildWorkbook(result, { title: 'Marzo 2024' }));

      expect(sheet['A1'].v).toBe('Marzo 2024');
      expect(sheet['!merges']).toEqual([{ s: { r: 0, c: 0 }, e: { r: 0, c: 2 } }]);
    });
  });

  describe('buildCsv', () => {
    it('should start with a byte order mark and hold header and employee rows', () => {
      const csv = buildCsv(result);

      expect(csv.charCodeAt(0)).toBe(0xfeff);
      const lines = csv.slice(1).split('\n');
      expect(lines[0]).toBe('Apellido y Nombre,Líquido,Rem c/ Aporte');
      expect(lines[1]).toBe('LOPEZ MARIA ELENA,125500,150000');
      expect(lines[2]).toBe('PEREZ JUAN CARLOS,211836.82,307006.97');
    });
  });
});
