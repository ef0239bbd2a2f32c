/**
 * PDF Text Strategy Tests
 *
 * Runs pdfjs-dist and pdf-parse over a PDF built in memory.
 */

import {
  classify,
  parsePayrollStatement,
  pdfjsLayoutStrategy,
  pdfParseStreamStrategy,
  runPipeline,
} from '@payroll-consolidator/shared';
import { buildTextPdf, type PdfTextItem } from './helpers';

// The first row is written right to left to check x ordering
const STATEMENT_ITEMS: PdfTextItem[] = [
  { x: 300, y: 700, text: 'Cargo: 1203 Rol: 2' },
  { x: 50, y: 700, text: 'Id. Hr: 20456' },
  { x: 50, y: 680, text: 'Apellido y Nombre: PEREZ JUAN' },
  { x: 300, y: 680, text: 'Centro Pago: 114' },
  { x: 50, y: 660, text: 'Rem c/ Aporte' },
  { x: 300, y: 660, text: '216.881,97' },
  { x: 50, y: 640, text: 'Liq. Pesos:' },
  { x: 300, y: 640, text: '138.784,57' },
];

function normalizedLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

describe('PDF text strategies', () => {
  const pdf = buildTextPdf(STATEMENT_ITEMS);

  it('should be sniffed as a real document', () => {
    expect(classify(pdf).classification).toBe('real_document');
  });

  it('should rebuild printed rows with the layout strategy', async () => {
    const text = await pdfjsLayoutStrategy.extract(pdf);

    expect(normalizedLines(text)).toEqual([
      'Id. Hr: 20456 Cargo: 1203 Rol: 2',
      'Apellido y Nombre: PEREZ JUAN Centro Pago: 114',
      'Rem c/ Aporte 216.881,97',
      'Liq. Pesos: 138.784,57',
    ]);
  });

  it('should leave the caller bytes usable after the layout strategy', async () => {
    const bytes = buildTextPdf(STATEMENT_ITEMS);

    await pdfjsLayoutStrategy.extract(bytes);

    expect(bytes.byteLength).toBe(pdf.byteLength);
    expect(Buffer.from(bytes.subarray(0, 5)).toString('latin1')).toBe('%PDF-');
  });

  it('should extract parsable text with the stream strategy', async () => {
    const text = await pdfParseStreamStrategy.extract(pdf);

    expect(text).toContain('Apellido y Nombre: PEREZ JUAN');
    expect(text).not.toContain('\u0000');

    const outcome = parsePayrollStatement(text, 'liquidacion.pdf');
    expect(outcome.blocks).toHaveLength(1);
    expect(outcome.blocks[0].name).toBe('PEREZ JUAN');
    expect(outcome.blocks[0].amounts.net_payable).toBe(13878457);
    expect(outcome.blocks[0].amounts.remuneration_with_contribution).toBe(21688197);
  });

  it('should run a real PDF through the default pipeline', async () => {
    const result = await runPipeline([{ filename: 'liquidacion.pdf', bytes: pdf }], {
      fieldSelection: ['name', 'net_payable', 'remuneration_with_contribution'],
    });

    expect(result.documents).toEqual([
      {
        document: 'liquidacion.pdf',
        classification: 'real_document',
        extraction_method: 'pdfjs_layout',
        blocks: 1,
        skipped_blocks: 0,
      },
    ]);
    expect(result.employees.map((e) => [e.display_name, e.amounts.net_payable])).toEqual([
      ['PEREZ JUAN', 13878457],
    ]);
    expect(result.employees[0].hr_ids).toEqual(['20456']);
    expect(result.grand_totals).toEqual({
      net_payable: 13878457,
      remuneration_with_contribution: 21688197,
    });
  });
});
