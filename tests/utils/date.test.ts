import { describe, it, expect } from 'vitest';
import {
  containsDateToken,
  findDateToken,
  formatISODate,
  parseStatementDate,
  resolveYear,
  toISODate,
} from '../../src/utils/date.js';

const MARCH_2024 = { referenceYear: 2024, referenceMonth: 3 };

describe('findDateToken', () => {
  it('should resolve day/month with the reference year', () => {
    expect(findDateToken('05/03  UBER TRIP  15,00', MARCH_2024)).toEqual({
      raw: '05/03',
      iso: '2024-03-05',
      index: 0,
      end: 5,
    });
  });

  it('should skip tokens that are not calendar dates', () => {
    const token = findDateToken('99/99 X 31/01 Y', MARCH_2024);
    expect(token?.iso).toBe('2024-01-31');
    expect(token?.index).toBe(8);
  });

  it('should return null when no valid token exists', () => {
    expect(findDateToken('UBER TRIP 15,00', MARCH_2024)).toBeNull();
    expect(findDateToken('32/01 UBER', MARCH_2024)).toBeNull();
  });
});

describe('parseStatementDate', () => {
  it('should use an explicit year', () => {
    expect(parseStatementDate('05/03/2023', MARCH_2024)).toBe('2023-03-05');
    expect(parseStatementDate('05/03/23', MARCH_2024)).toBe('2023-03-05');
  });

  it('should place months after the closing month in the previous year', () => {
    expect(parseStatementDate('15/12', MARCH_2024)).toBe('2023-12-15');
    expect(parseStatementDate('15/03', MARCH_2024)).toBe('2024-03-15');
  });

  it('should reject out-of-range and impossible dates', () => {
    expect(parseStatementDate('32/01', MARCH_2024)).toBeNull();
    expect(parseStatementDate('10/13', MARCH_2024)).toBeNull();
    expect(parseStatementDate('30/02', MARCH_2024)).toBeNull();
    expect(parseStatementDate('00/02', MARCH_2024)).toBeNull();
  });

  it('should accept leap days in leap years', () => {
    expect(parseStatementDate('29/02', MARCH_2024)).toBe('2024-02-29');
  });

  it('should read month/day order when configured', () => {
    expect(parseStatementDate('03/05', MARCH_2024, 'MDY')).toBe('2024-03-05');
    expect(parseStatementDate('12/31', MARCH_2024, 'MDY')).toBe('2023-12-31');
  });
});

describe('resolveYear', () => {
  it('should roll back a year only for later months', () => {
    expect(resolveYear(1, { referenceYear: 2024, referenceMonth: 1 })).toBe(2024);
    expect(resolveYear(12, { referenceYear: 2024, referenceMonth: 1 })).toBe(2023);
    expect(resolveYear(12, { referenceYear: 2024, referenceMonth: 12 })).toBe(2024);
  });
});

describe('containsDateToken', () => {
  it('should detect date-shaped text', () => {
    expect(containsDateToken('PARC 01/10')).toBe(true);
    expect(containsDateToken('UBER TRIP')).toBe(false);
    expect(containsDateToken('1/3')).toBe(false);
  });
});

describe('toISODate / formatISODate', () => {
  it('should validate calendar dates', () => {
    expect(toISODate(2023, 2, 29)).toBeNull();
    expect(toISODate(2024, 4, 30)).toBe('2024-04-30');
  });

  it('should render in the locale date order', () => {
    expect(formatISODate('2024-03-05', 'DMY')).toBe('05/03/2024');
    expect(formatISODate('2024-03-05', 'MDY')).toBe('03/05/2024');
  });
});
