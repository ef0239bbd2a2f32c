/**
 * Spreadsheet Export
 *
 * Renders a PipelineResult table as XLSX (title, header, one row per
 * employee, TOTAL row) or as CSV.
 */

import * as XLSX from 'xlsx';
import { isMonetaryField } from '../fields';
import type { PipelineResult, TableRow, TableColumn } from '../types';

export const DEFAULT_TITLE = 'Resumen de Liquidaciones';
export const SHEET_NAME = 'Liquidaciones';
export const NUMBER_FORMAT = '#,##0.00';

const HEADER_ROW = 2;
const MAX_COLUMN_WIDTH = 50;

type CellValue = string | number | null;

export interface WorkbookOptions {
  title?: string;
}

function rowValues(columns: readonly TableColumn[], row: TableRow): CellValue[] {
  return columns.map(({ field }) => {
    if (isMonetaryField(field)) return row[field] ?? 0;
    return row.name ?? '';
  });
}

function totalsValues(result: PipelineResult): CellValue[] {
  return result.table.columns.map(({ field }) => {
    if (isMonetaryField(field)) return result.table.totals[field] ?? 0;
    return 'TOTAL';
  });
}

function displayWidth(value: CellValue): number {
  if (value === null) return 0;
  if (typeof value === 'number') {
    return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 }).length;
  }
  return value.length;
}

/**
 * Build an XLSX workbook buffer for the result table
 */
export function buildWorkbook(result: PipelineResult, options: WorkbookOptions = {}): Buffer {
  const { columns, rows } = result.table;
  const title = options.title ?? DEFAULT_TITLE;

  const header: CellValue[] = columns.map((c) => c.label);
  const body = rows.map((row) => rowValues(columns, row));
  const totals = totalsValues(result);

  const aoa: CellValue[][] = [[title], [], header, ...body, totals];
  const sheet = XLSX.utils.aoa_to_sheet(aoa);

  // Amount cells carry a thousands-separated two-decimal format
  const firstDataRow = HEADER_ROW + 1;
  const lastRow = firstDataRow + body.length;
  columns.forEach((column, c) => {
    if (!isMonetaryField(column.field)) return;
    for (let r = firstDataRow; r <= lastRow; r++) {
      const cell = sheet[XLSX.utils.encode_cell({ r, c })];
      if (cell) cell.z = NUMBER_FORMAT;
    }
  });

  if (columns.length > 1) {
    sheet['!merges'] = [{ s: { r: 0, c: 0 }, e: { r: 0, c: columns.length - 1 } }];
  }

  sheet['!cols'] = columns.map((column, c) => {
    const widest = Math.max(
      column.label.length,
      ...body.map((values) => displayWidth(values[c])),
      displayWidth(totals[c])
    );
    return { wch: Math.min(widest + 3, MAX_COLUMN_WIDTH) };
  });

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);

  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/**
 * Build a UTF-8 CSV (with byte order mark) of the header and employee rows
 */
export function buildCsv(result: PipelineResult): string {
  const { columns, rows } = result.table;
  const aoa: CellValue[][] = [columns.map((c) => c.label), ...rows.map((row) => rowValues(columns, row))];
  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  return `\uFEFF${XLSX.utils.sheet_to_csv(sheet)}`;
}
