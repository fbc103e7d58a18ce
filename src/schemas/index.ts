import type { z } from 'zod';
import { InvalidRunConfigError } from '../errors.js';
import { RunConfigSchema, type RunConfig } from './run-config.js';

export {
  DateOrderSchema,
  LocaleSchema,
  ReferencePeriodSchema,
  RunConfigSchema,
  KeywordFileSchema,
} from './run-config.js';

export type {
  DateOrder,
  Locale,
  ReferencePeriod,
  RunConfig,
  KeywordFile,
} from './run-config.js';

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path === '' ? issue.message : `${path}: ${issue.message}`;
  });
}

export function parseRunConfig(input: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRunConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}
