/**
 * Table Exporter Module
 *
 * Flattens an ExtractionResult into fixed-column rows for CSV and spreadsheet writers.
 * Pure: no I/O, and writers must not reformat the strings produced here.
 */

import { LOCALE_PRESETS, DEFAULT_LOCALE } from '../config/locales.js';
import type { Locale } from '../schemas/index.js';
import type { ExtractionResult } from '../types/output.js';
import { formatISODate } from '../utils/date.js';
import { formatCents } from '../utils/money.js';

export const TABLE_COLUMNS = ['date', 'description', 'keyword', 'value'] as const;
export type TableColumn = (typeof TABLE_COLUMNS)[number];

export type TableRowKind = 'transaction' | 'subtotal' | 'total';

export interface TableRow {
  readonly kind: TableRowKind;
  readonly date: string;
  readonly description: string;
  readonly keyword: string;
  readonly value: string;
  /** The amount behind `value`, for writers that store numbers */
  readonly cents: number;
  /** Source page for transaction rows */
  readonly page: number | null;
}

export interface Table {
  readonly columns: readonly TableColumn[];
  readonly rows: readonly TableRow[];
}

/**
 * Options for table rendering
 */
export interface TableOptions {
  /** 'iso' (YYYY-MM-DD) or 'locale' (day/month order of the locale) (default: 'iso') */
  dateFormat?: 'iso' | 'locale';
  /** Separators and date order (default: pt-BR) */
  locale?: Locale;
  /** Group thousands in values (default: false) */
  grouping?: boolean;
  /** Description text of summary rows */
  labels?: {
    subtotal?: string;
    total?: string;
  };
}

export function toTable(result: ExtractionResult, options: TableOptions = {}): Table {
  const locale = options.locale ?? LOCALE_PRESETS[DEFAULT_LOCALE];
  const dateFormat = options.dateFormat ?? 'iso';
  const subtotalLabel = options.labels?.subtotal ?? 'Subtotal';
  const totalLabel = options.labels?.total ?? 'Grand total';
  const money = (cents: number): string => formatCents(cents, locale, { grouping: options.grouping ?? false });

  const rows: TableRow[] = [];

  for (const txn of result.transactions) {
    rows.push({
      kind: 'transaction',
      date: dateFormat === 'locale' ? formatISODate(txn.date, locale.dateOrder) : txn.date,
      description: txn.description,
      keyword: txn.matchedKeyword,
      value: money(txn.value),
      cents: txn.value,
      page: txn.sourceLine.page,
    });
  }

  for (const [keyword, cents] of result.subtotals) {
    rows.push({
      kind: 'subtotal',
      date: '',
      description: subtotalLabel,
      keyword,
      value: money(cents),
      cents,
      page: null,
    });
  }

  rows.push({
    kind: 'total',
    date: '',
    description: totalLabel,
    keyword: '',
    value: money(result.grandTotal),
    cents: result.grandTotal,
    page: null,
  });

  return { columns: TABLE_COLUMNS, rows };
}

export function rowCells(row: TableRow): string[] {
  return TABLE_COLUMNS.map((column) => row[column]);
}
