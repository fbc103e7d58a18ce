import { describe, it, expect } from 'vitest';
import { exportCsv, exportTableCsv } from '../../src/output/csv-exporter.js';
import { toTable } from '../../src/output/table.js';
import { createSampleResult, createTransaction } from '../support/fixtures.js';
import { aggregate } from '../../src/output/aggregator.js';

describe('exportCsv', () => {
  it('should export rows with a header and quote comma decimals', () => {
    const lines = exportCsv(createSampleResult()).split('\n');

    expect(lines).toEqual([
      'Date,Description,Keyword,Value',
      '2024-03-05,UBER TRIP,uber,"15,00"',
      '2024-03-07,99 CORRIDA,99,"12,50"',
      ',Subtotal,uber,"15,00"',
      ',Subtotal,99,"12,50"',
      ',Grand total,,"27,50"',
    ]);
  });

  it('should not quote values when the delimiter differs from the decimal separator', () => {
    const lines = exportCsv(createSampleResult(), { delimiter: ';' }).split('\n');
    expect(lines[1]).toBe('2024-03-05;UBER TRIP;uber;15,00');
    expect(lines[5]).toBe(';Grand total;;27,50');
  });

  it('should escape quotes in descriptions', () => {
    const result = aggregate([createTransaction({ description: 'UBER "BLACK"' })], ['uber']);
    const lines = exportCsv(result, { delimiter: ';', includeSummary: false }).split('\n');
    expect(lines).toEqual(['Date;Description;Keyword;Value', '2024-03-05;"UBER ""BLACK""";uber;15,00']);
  });

  it('should omit the header when requested', () => {
    const csv = exportCsv(createSampleResult(), { includeHeader: false, includeSummary: false, delimiter: ';' });
    expect(csv).toBe('2024-03-05;UBER TRIP;uber;15,00\n2024-03-07;99 CORRIDA;99;12,50');
  });

  it('should accept custom header labels', () => {
    const table = toTable(createSampleResult());
    const header = exportTableCsv(table, { headers: { date: 'Data', value: 'Valor' } }).split('\n')[0];
    expect(header).toBe('Data,Description,Keyword,Valor');
  });
});
