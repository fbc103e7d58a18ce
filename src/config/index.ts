/**
 * Environment-driven configuration for the CLI.
 * Precedence: CLI flag > environment (.env via dotenv) > default.
 */

import { z } from 'zod';
import { InvalidRunConfigError } from '../errors.js';
import { formatIssues, parseRunConfig, type ReferencePeriod, type RunConfig } from '../schemas/index.js';
import { DEFAULT_EXTRACTION_TIMEOUT_MS, DEFAULT_KEYWORDS_FILE } from '../utils/constants.js';
import { DEFAULT_LOCALE, LOCALE_NAMES, LOCALE_PRESETS, isLocaleName, type LocalePreset } from './locales.js';

export { LOCALE_PRESETS, LOCALE_NAMES, DEFAULT_LOCALE, isLocaleName } from './locales.js';
export type { LocaleName, LocalePreset } from './locales.js';

export const OUTPUT_FORMATS = ['xlsx', 'csv', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const envBool = (value: string | undefined, defaultVal: boolean): boolean => {
  if (value === undefined || value === '') return defaultVal;
  return value === 'true' || value === '1';
};

const EnvConfigSchema = z.object({
  keywordsFile: z.string().min(1).default(DEFAULT_KEYWORDS_FILE),
  reference: z.string().optional(),
  locale: z.string().default(DEFAULT_LOCALE),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_EXTRACTION_TIMEOUT_MS),
  format: z.enum(OUTPUT_FORMATS).default('xlsx'),
  outputFile: z.string().optional(),
  verbose: z.boolean().default(false),
});
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvConfigSchema.safeParse({
    keywordsFile: nonEmpty(env['TALLY_KEYWORDS_FILE']),
    reference: nonEmpty(env['TALLY_REFERENCE']),
    locale: nonEmpty(env['TALLY_LOCALE']),
    timeoutMs: nonEmpty(env['TALLY_TIMEOUT_MS']),
    format: nonEmpty(env['TALLY_FORMAT']),
    outputFile: nonEmpty(env['TALLY_OUTPUT_FILE']),
    verbose: envBool(env['TALLY_VERBOSE'], false),
  });
  if (!parsed.success) {
    throw new InvalidRunConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveLocale(name: string): LocalePreset {
  if (!isLocaleName(name)) {
    throw new InvalidRunConfigError([`locale: unknown locale "${name}" (expected ${LOCALE_NAMES.join(', ')})`]);
  }
  return LOCALE_PRESETS[name];
}

/**
 * Parse a `YYYY-MM` reference period.
 */
export function parseReference(value: string): ReferencePeriod {
  const match = /^(\d{4})-(\d{1,2})$/.exec(value.trim());
  const year = match?.[1];
  const month = match?.[2];
  if (year === undefined || month === undefined) {
    throw new InvalidRunConfigError([`reference: expected YYYY-MM, got "${value}"`]);
  }
  return { referenceYear: Number.parseInt(year, 10), referenceMonth: Number.parseInt(month, 10) };
}

export function currentReference(now: Date = new Date()): ReferencePeriod {
  return { referenceYear: now.getFullYear(), referenceMonth: now.getMonth() + 1 };
}

export function buildRunConfig(options: { reference?: string | undefined; locale: string }, now?: Date): RunConfig {
  const period = options.reference !== undefined ? parseReference(options.reference) : currentReference(now);
  const preset = resolveLocale(options.locale);
  return parseRunConfig({
    ...period,
    locale: {
      decimalSeparator: preset.decimalSeparator,
      thousandsSeparator: preset.thousandsSeparator,
      dateOrder: preset.dateOrder,
    },
  });
}
