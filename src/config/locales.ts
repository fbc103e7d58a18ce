import type { Locale } from '../schemas/index.js';

export interface LocalePreset extends Locale {
  currencySymbol: string;
  /** Spreadsheet number format for money cells */
  numberFormat: string;
}

export const LOCALE_PRESETS = {
  'pt-BR': {
    decimalSeparator: ',',
    thousandsSeparator: '.',
    dateOrder: 'DMY',
    currencySymbol: 'R$',
    numberFormat: '"R$" #,##0.00;[Red]\\-"R$" #,##0.00',
  },
  'en-US': {
    decimalSeparator: '.',
    thousandsSeparator: ',',
    dateOrder: 'MDY',
    currencySymbol: '$',
    numberFormat: '"$"#,##0.00;[Red]\\-"$"#,##0.00',
  },
} as const satisfies Record<string, LocalePreset>;

export type LocaleName = keyof typeof LOCALE_PRESETS;

export const DEFAULT_LOCALE: LocaleName = 'pt-BR';

export const LOCALE_NAMES = Object.keys(LOCALE_PRESETS);

export function isLocaleName(name: string): name is LocaleName {
  return Object.prototype.hasOwnProperty.call(LOCALE_PRESETS, name);
}
