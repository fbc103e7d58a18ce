import type { Locale } from '../schemas/index.js';
import { escapeRegExp } from './normalize.js';

export type NumberLocale = Pick<Locale, 'decimalSeparator' | 'thousandsSeparator'>;

export interface ValueToken {
  raw: string;
  cents: number;
  index: number;
  end: number;
}

export interface FormatCentsOptions {
  grouping?: boolean;
}

/**
 * Currency token: optional `(` or `-`, optional `R$`, integer part with or without
 * thousands groups, decimal separator, exactly two fractional digits, optional `)`.
 * The lookarounds reject tokens glued to further digits, so `12,5` and `12,555`
 * do not match.
 */
export function buildValuePattern(locale: NumberLocale): RegExp {
  const d = escapeRegExp(locale.decimalSeparator);
  const t = escapeRegExp(locale.thousandsSeparator);
  return new RegExp(
    `(?<![\\d${d}${t}])` +
      `(?<open>\\()?(?<sign>-)?(?:R\\$\\s?)?` +
      `(?<int>\\d{1,3}(?:${t}\\d{3})+|\\d+)${d}(?<frac>\\d{2})` +
      `(?<close>\\))?` +
      `(?!\\d)(?!${t}\\d)(?!${d}\\d)`,
    'g'
  );
}

function toCents(intPart: string, fracPart: string, negative: boolean, thousands: string): number | null {
  const digits = intPart.split(thousands).join('') + fracPart;
  const cents = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(cents)) {
    return null;
  }
  if (cents === 0) {
    return 0;
  }
  return negative ? -cents : cents;
}

export function findValueTokens(text: string, locale: NumberLocale): ValueToken[] {
  const pattern = buildValuePattern(locale);
  const tokens: ValueToken[] = [];

  let match = pattern.exec(text);
  while (match !== null) {
    const raw = match[0];
    const groups = match.groups ?? {};
    const intPart = groups['int'];
    const fracPart = groups['frac'];
    if (raw !== undefined && intPart !== undefined && fracPart !== undefined) {
      const negative =
        groups['sign'] !== undefined || (groups['open'] !== undefined && groups['close'] !== undefined);
      const cents = toCents(intPart, fracPart, negative, locale.thousandsSeparator);
      if (cents !== null) {
        tokens.push({
          raw,
          cents,
          index: match.index,
          end: match.index + raw.length,
        });
      }
    }
    match = pattern.exec(text);
  }

  return tokens;
}

export function findLastValueToken(text: string, locale: NumberLocale): ValueToken | null {
  const tokens = findValueTokens(text, locale);
  return tokens[tokens.length - 1] ?? null;
}

/**
 * Parse a standalone currency string into integer cents, or null when the whole
 * string is not a single value token.
 */
export function parseCents(value: string, locale: NumberLocale): number | null {
  const trimmed = value.trim();
  const tokens = findValueTokens(trimmed, locale);
  const token = tokens[0];
  if (tokens.length !== 1 || token === undefined || token.raw !== trimmed) {
    return null;
  }
  return token.cents;
}

export function formatCents(cents: number, locale: NumberLocale, options: FormatCentsOptions = {}): string {
  const negative = cents < 0;
  const abs = Math.abs(cents);
  const intPart = Math.floor(abs / 100).toString();
  const fracPart = (abs % 100).toString().padStart(2, '0');
  const grouped = options.grouping === true
    ? intPart.replace(/\B(?=(\d{3})+(?!\d))/g, locale.thousandsSeparator)
    : intPart;
  return `${negative ? '-' : ''}${grouped}${locale.decimalSeparator}${fracPart}`;
}

export function sumCents(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0);
}
