import type { DateOrder, ReferencePeriod } from '../schemas/index.js';

export interface DateToken {
  raw: string;
  iso: string;
  index: number;
  end: number;
}

const DATE_TOKEN_SOURCE = '(?<!\\d)(\\d{2})\\/(\\d{2})(?:\\/(\\d{4}|\\d{2}))?(?![\\d/])';

export function containsDateToken(text: string): boolean {
  return new RegExp(DATE_TOKEN_SOURCE).test(text);
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function toISODate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${year.toString().padStart(4, '0')}-${pad(month)}-${pad(day)}`;
}

/**
 * Year for a day/month token: a month after the closing month belongs to the
 * previous year (December purchases on a January statement).
 */
export function resolveYear(month: number, period: ReferencePeriod): number {
  return month > period.referenceMonth ? period.referenceYear - 1 : period.referenceYear;
}

function resolveToken(
  first: string,
  second: string,
  year: string | undefined,
  period: ReferencePeriod,
  order: DateOrder
): string | null {
  const a = Number.parseInt(first, 10);
  const b = Number.parseInt(second, 10);
  const day = order === 'DMY' ? a : b;
  const month = order === 'DMY' ? b : a;
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  let fullYear: number;
  if (year === undefined) {
    fullYear = resolveYear(month, period);
  } else if (year.length === 2) {
    fullYear = 2000 + Number.parseInt(year, 10);
  } else {
    fullYear = Number.parseInt(year, 10);
  }

  return toISODate(fullYear, month, day);
}

/**
 * First `DD/MM`, `DD/MM/YY` or `DD/MM/YYYY` token (or the MDY equivalents) that
 * resolves to a real calendar date. Invalid tokens are skipped.
 */
export function findDateToken(text: string, period: ReferencePeriod, order: DateOrder = 'DMY'): DateToken | null {
  const pattern = new RegExp(DATE_TOKEN_SOURCE, 'g');

  let match = pattern.exec(text);
  while (match !== null) {
    const [raw, first, second, year] = match;
    if (raw !== undefined && first !== undefined && second !== undefined) {
      const iso = resolveToken(first, second, year, period, order);
      if (iso !== null) {
        return { raw, iso, index: match.index, end: match.index + raw.length };
      }
    }
    match = pattern.exec(text);
  }

  return null;
}

export function parseStatementDate(dateStr: string, period: ReferencePeriod, order: DateOrder = 'DMY'): string | null {
  const trimmed = dateStr.trim();
  const token = findDateToken(trimmed, period, order);
  if (token === null || token.raw !== trimmed) {
    return null;
  }
  return token.iso;
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * Render an ISO date in the locale's day/month order.
 */
export function formatISODate(isoDate: string, order: DateOrder): string {
  const parts = isoDate.split('-');
  const [year, month, day] = parts;
  if (parts.length !== 3 || year === undefined || month === undefined || day === undefined) {
    return isoDate;
  }
  return order === 'DMY' ? `${day}/${month}/${year}` : `${month}/${day}/${year}`;
}
