// Aggregation
export { aggregate, assertTotalsConsistent } from './aggregator.js';

// Tabular contract
export { toTable, rowCells, TABLE_COLUMNS } from './table.js';
export type { Table, TableRow, TableRowKind, TableColumn, TableOptions } from './table.js';

// Serializers
export { exportCsv, exportTableCsv } from './csv-exporter.js';
export type { CsvExportOptions } from './csv-exporter.js';
export { exportXlsx, buildWorkbook } from './xlsx-exporter.js';
export type { XlsxExportOptions } from './xlsx-exporter.js';
export { exportJson, toJsonOutput } from './json-exporter.js';
export type { JsonOutput, JsonTransaction } from './json-exporter.js';
