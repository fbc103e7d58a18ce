import { describe, it, expect } from 'vitest';
import { exportJson, toJsonOutput } from '../../src/output/json-exporter.js';
import { PARSER_VERSION } from '../../src/utils/constants.js';
import type { ExtractionDiagnostics } from '../../src/types/output.js';
import { createSampleResult } from '../support/fixtures.js';

const DIAGNOSTICS: ExtractionDiagnostics = {
  pagesRead: 2,
  linesRead: 10,
  boilerplateDropped: 1,
  candidateLines: 4,
  discarded: { DateParseError: 1, ValueParseError: 0, EmptyDescription: 0 },
  discardedTotal: 1,
  unmatched: 1,
};

describe('toJsonOutput', () => {
  it('should keep subtotals in registry order as an array', () => {
    const output = toJsonOutput(createSampleResult());

    expect(output.parserVersion).toBe(PARSER_VERSION);
    expect(output.subtotals).toEqual([
      { keyword: 'uber', totalCents: 1500 },
      { keyword: '99', totalCents: 1250 },
    ]);
    expect(output.grandTotalCents).toBe(2750);
    expect(output).not.toHaveProperty('diagnostics');
  });

  it('should describe transactions with their source line', () => {
    const [, second] = toJsonOutput(createSampleResult()).transactions;
    expect(second).toEqual({
      date: '2024-03-07',
      description: '99 CORRIDA',
      keyword: '99',
      valueCents: 1250,
      page: 2,
      lineIndex: 4,
      originalText: '07/03 99 CORRIDA 12,50',
    });
  });
});

describe('exportJson', () => {
  it('should include diagnostics when given', () => {
    const parsed: unknown = JSON.parse(exportJson(createSampleResult(), { diagnostics: DIAGNOSTICS }));
    expect(parsed).toMatchObject({ grandTotalCents: 2750, diagnostics: DIAGNOSTICS });
  });

  it('should print compact JSON on request', () => {
    expect(exportJson(createSampleResult(), { pretty: false })).not.toContain('\n');
  });
});
