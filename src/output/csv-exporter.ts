/**
 * CSV Exporter Module
 *
 * Writes the fixed-column table to CSV text for spreadsheet import.
 */

import type { ExtractionResult } from '../types/output.js';
import { TABLE_COLUMNS, rowCells, toTable, type Table, type TableColumn, type TableOptions } from './table.js';

/**
 * Options for CSV export
 */
export interface CsvExportOptions extends TableOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Include summary rows (default: true) */
  includeSummary?: boolean;
  /** Header labels per column */
  headers?: Partial<Record<TableColumn, string>>;
}

const DEFAULT_HEADERS: Record<TableColumn, string> = {
  date: 'Date',
  description: 'Description',
  keyword: 'Keyword',
  value: 'Value',
};

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting = value.includes(delimiter) ||
                       value.includes('"') ||
                       value.includes('\n') ||
                       value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function rowToCsvLine(row: string[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export an already rendered table to CSV text.
 */
export function exportTableCsv(table: Table, options: CsvExportOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const includeSummary = options.includeSummary ?? true;
  const headers = { ...DEFAULT_HEADERS, ...options.headers };

  const lines: string[] = [];

  if (options.includeHeader ?? true) {
    lines.push(rowToCsvLine(TABLE_COLUMNS.map(column => headers[column]), delimiter));
  }

  for (const row of table.rows) {
    if (!includeSummary && row.kind !== 'transaction') continue;
    lines.push(rowToCsvLine(rowCells(row), delimiter));
  }

  return lines.join('\n');
}

/**
 * Export an extraction result to CSV text.
 *
 * @param result - The extraction result to export
 * @param options - Table rendering and CSV options
 */
export function exportCsv(result: ExtractionResult, options: CsvExportOptions = {}): string {
  return exportTableCsv(toTable(result, options), options);
}
