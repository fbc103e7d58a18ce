import { describe, it, expect } from 'vitest';
import { isBoilerplate, isTransactionHead, segmentLines, type SegmentOptions } from '../../src/parsers/line-segmenter.js';

const OPTIONS: SegmentOptions = {
  referenceYear: 2024,
  referenceMonth: 3,
  locale: { decimalSeparator: ',', thousandsSeparator: '.', dateOrder: 'DMY' },
};

describe('isTransactionHead', () => {
  it('should require a date followed by a value', () => {
    expect(isTransactionHead('05/03 UBER TRIP 15,00', OPTIONS)).toBe(true);
    expect(isTransactionHead('Vencimento 10/04/2024', OPTIONS)).toBe(false);
    expect(isTransactionHead('UBER TRIP 15,00', OPTIONS)).toBe(false);
    expect(isTransactionHead('15,00 05/03', OPTIONS)).toBe(false);
  });
});

describe('isBoilerplate', () => {
  it('should match markers ignoring case and accents', () => {
    expect(isBoilerplate('Total da fatura R$ 2.750,00')).toBe(true);
    expect(isBoilerplate('Página 2 de 2')).toBe(true);
    expect(isBoilerplate('UBER TRIP')).toBe(false);
  });

  it('should never treat dated lines as boilerplate', () => {
    expect(isBoilerplate('Vencimento 10/04/2024 2.750,00')).toBe(false);
  });
});

describe('segmentLines', () => {
  it('should attach wrapped description lines to their head', () => {
    const { lines } = segmentLines([['05/03 UBER *TRIP 15,00', 'SAO PAULO BR', '06/03 99 CORRIDA 12,50']], OPTIONS);

    expect(lines).toHaveLength(2);
    expect(lines[0]).toEqual({
      text: '05/03 UBER *TRIP 15,00 SAO PAULO BR',
      headText: '05/03 UBER *TRIP 15,00',
      continuations: ['SAO PAULO BR'],
      page: 1,
      lineIndex: 0,
    });
    expect(lines[1]?.lineIndex).toBe(2);
  });

  it('should drop boilerplate and count it', () => {
    const result = segmentLines([['Total da fatura R$ 2.750,00', '05/03 UBER 15,00']], OPTIONS);

    expect(result.boilerplateDropped).toBe(1);
    expect(result.linesRead).toBe(2);
    expect(result.lines.map((line) => line.headText)).toEqual(['05/03 UBER 15,00']);
  });

  it('should keep dated lines that contain a marker', () => {
    const { lines, boilerplateDropped } = segmentLines([['Vencimento 10/04/2024 2.750,00']], OPTIONS);
    expect(boilerplateDropped).toBe(0);
    expect(lines.map((line) => line.headText)).toEqual(['Vencimento 10/04/2024 2.750,00']);
  });

  it('should stop a continuation chain at a blank line', () => {
    const { lines } = segmentLines([['05/03 UBER 15,00', '', 'SAO PAULO BR']], OPTIONS);

    expect(lines).toHaveLength(2);
    expect(lines[0]?.continuations).toEqual([]);
    expect(lines[1]?.headText).toBe('SAO PAULO BR');
  });

  it('should not continue a line across pages', () => {
    const { lines } = segmentLines([['05/03 UBER 15,00'], ['SAO PAULO BR']], OPTIONS);

    expect(lines).toHaveLength(2);
    expect(lines[0]?.continuations).toEqual([]);
    expect(lines[1]).toMatchObject({ headText: 'SAO PAULO BR', page: 2, lineIndex: 0 });
  });

  it('should keep lines with a value but no date on their own', () => {
    const { lines } = segmentLines([['05/03 UBER 15,00', 'IOF 0,38']], OPTIONS);

    expect(lines.map((line) => line.headText)).toEqual(['05/03 UBER 15,00', 'IOF 0,38']);
    expect(lines[0]?.continuations).toEqual([]);
  });

  it('should accept a custom marker list', () => {
    const result = segmentLines([['Encargos do mes', '05/03 UBER 15,00']], { ...OPTIONS, boilerplate: ['Encargos'] });
    expect(result.boilerplateDropped).toBe(1);
    expect(result.lines).toHaveLength(1);
  });

  it('should collapse whitespace in head and continuation lines', () => {
    const { lines } = segmentLines([['05/03   UBER   15,00', '  SAO   PAULO ']], OPTIONS);
    expect(lines[0]?.text).toBe('05/03 UBER 15,00 SAO PAULO');
  });
});
