/**
 * XLSX Exporter Module
 *
 * Builds a workbook with a transactions sheet and a per-keyword summary sheet.
 * Values are stored as numbers with a currency number format.
 */

import * as XLSX from 'xlsx';
import type { ExtractionResult } from '../types/output.js';
import { toTable, type TableOptions, type TableRow } from './table.js';

export interface XlsxExportOptions extends TableOptions {
  /** Spreadsheet number format for money cells (default: '#,##0.00') */
  numberFormat?: string;
  transactionsSheetName?: string;
  summarySheetName?: string;
}

type CellValue = string | number;

const MAX_COLUMN_WIDTH = 60;

const TRANSACTION_HEADERS = ['Date', 'Description', 'Keyword', 'Value', 'Page'];
const SUMMARY_HEADERS = ['Keyword', 'Total'];

function toNumber(cents: number): number {
  return cents / 100;
}

function autosizeColumns(rows: CellValue[][]): XLSX.ColInfo[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      const length = String(cell).length;
      widths[index] = Math.max(widths[index] ?? 0, length);
    });
  }
  return widths.map((width) => ({ wch: Math.min(width + 2, MAX_COLUMN_WIDTH) }));
}

function applyNumberFormat(sheet: XLSX.WorkSheet, column: number, firstRow: number, lastRow: number, format: string): void {
  for (let r = firstRow; r <= lastRow; r++) {
    const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c: column })];
    if (cell !== undefined && cell.t === 'n') {
      cell.z = format;
    }
  }
}

function buildSheet(rows: CellValue[][], moneyColumn: number, format: string): XLSX.WorkSheet {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  applyNumberFormat(sheet, moneyColumn, 1, rows.length - 1, format);
  sheet['!cols'] = autosizeColumns(rows);
  return sheet;
}

function transactionRow(row: TableRow): CellValue[] {
  return [row.date, row.description, row.keyword, toNumber(row.cents), row.page ?? ''];
}

function summaryRow(row: TableRow): CellValue[] {
  return [row.kind === 'total' ? row.description : row.keyword, toNumber(row.cents)];
}

export function buildWorkbook(result: ExtractionResult, options: XlsxExportOptions = {}): XLSX.WorkBook {
  const format = options.numberFormat ?? '#,##0.00';
  const table = toTable(result, options);

  const transactionRows: CellValue[][] = [TRANSACTION_HEADERS];
  const summaryRows: CellValue[][] = [SUMMARY_HEADERS];
  for (const row of table.rows) {
    if (row.kind === 'transaction') {
      transactionRows.push(transactionRow(row));
    } else {
      summaryRows.push(summaryRow(row));
    }
  }

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    buildSheet(transactionRows, 3, format),
    options.transactionsSheetName ?? 'Transactions'
  );
  XLSX.utils.book_append_sheet(
    workbook,
    buildSheet(summaryRows, 1, format),
    options.summarySheetName ?? 'Summary'
  );
  return workbook;
}

/**
 * Export an extraction result as an .xlsx file body.
 */
export function exportXlsx(result: ExtractionResult, options: XlsxExportOptions = {}): Buffer {
  const body: Buffer = XLSX.write(buildWorkbook(result, options), { type: 'buffer', bookType: 'xlsx' });
  return body;
}
