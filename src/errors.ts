/**
 * Error taxonomy for the registry and extraction runs.
 *
 * Per-line failures (`DateParseError`, `ValueParseError`, `EmptyDescription`) are not
 * thrown; they are reported as values by the field extractor. Everything here aborts
 * the operation that raised it.
 */

export type TallyErrorCode =
  | 'InvalidKeyword'
  | 'DuplicateKeyword'
  | 'NotFound'
  | 'ExtractionTimeout'
  | 'EmptySourceDocument'
  | 'InvalidRunConfig'
  | 'TotalsMismatch';

export class TallyError extends Error {
  readonly code: TallyErrorCode;

  constructor(code: TallyErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class InvalidKeywordError extends TallyError {
  readonly input: string;

  constructor(input: string) {
    super('InvalidKeyword', 'Keyword must not be empty');
    this.input = input;
  }
}

export class DuplicateKeywordError extends TallyError {
  readonly keyword: string;

  constructor(keyword: string) {
    super('DuplicateKeyword', `Keyword already registered: ${keyword}`);
    this.keyword = keyword;
  }
}

export class KeywordNotFoundError extends TallyError {
  readonly keyword: string;

  constructor(keyword: string) {
    super('NotFound', `Keyword not registered: ${keyword}`);
    this.keyword = keyword;
  }
}

export class ExtractionTimeoutError extends TallyError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ExtractionTimeout', `PDF text extraction did not finish within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class EmptySourceDocumentError extends TallyError {
  constructor(detail = 'no page contains text') {
    super('EmptySourceDocument', `Source document is empty: ${detail}`);
  }
}

export class InvalidRunConfigError extends TallyError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('InvalidRunConfig', `Invalid run configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class TotalsMismatchError extends TallyError {
  constructor(detail: string) {
    super('TotalsMismatch', `Totals are inconsistent: ${detail}`);
  }
}

export function isTallyError(error: unknown): error is TallyError {
  return error instanceof TallyError;
}
