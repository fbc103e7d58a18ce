/**
 * Option parsing and error reporting shared by the CLI commands.
 */

import { OUTPUT_FORMATS, loadEnvConfig, type EnvConfig, type OutputFormat } from '../config/index.js';

export const DATE_FORMATS = ['iso', 'locale'] as const;
export type DateFormat = (typeof DATE_FORMATS)[number];

export function reportError(error: unknown, verbose: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
}

/**
 * Environment defaults for the option definitions; a bad value ends the process like
 * any other command error.
 */
export function loadEnvOrExit(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    return loadEnvConfig(env);
  } catch (error) {
    reportError(error, false);
    return process.exit(1);
  }
}

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new Error(`Unknown format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

export function parseDateFormat(value: string): DateFormat {
  const format = DATE_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new Error(`Unknown date format "${value}" (expected ${DATE_FORMATS.join(', ')})`);
  }
  return format;
}

export function parseTimeout(value: string): number {
  const timeoutMs = Number.parseInt(value, 10);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Timeout must be a positive number of milliseconds, got "${value}"`);
  }
  return timeoutMs;
}
