/**
 * Canonical types for an extraction run.
 */

export type ISODate = string;

/**
 * Folded keyword text (lower-case, accent-free, single spaces). Always produced by
 * `normalizeKeyword`.
 */
export type Keyword = string;

/**
 * One logical statement line: a head line plus any wrapped continuation lines.
 */
export interface RawLine {
  /** Head and continuations joined by single spaces */
  text: string;
  /** The head line as read from the page */
  headText: string;
  continuations: readonly string[];
  /** 1-based page number */
  page: number;
  /** 0-based index of the head line within its page */
  lineIndex: number;
}

export type LineErrorCode = 'DateParseError' | 'ValueParseError' | 'EmptyDescription';

export interface ExtractedFields {
  date: ISODate;
  description: string;
  /** Signed integer cents */
  value: number;
}

export type LineParseResult =
  | { ok: true; fields: ExtractedFields; line: RawLine }
  | { ok: false; error: LineErrorCode; line: RawLine };

export interface Transaction {
  readonly date: ISODate;
  readonly description: string;
  readonly value: number;
  readonly matchedKeyword: Keyword;
  readonly sourceLine: RawLine;
}

export interface ExtractionResult {
  readonly transactions: readonly Transaction[];
  /** One entry per keyword of the run snapshot, in registry order */
  readonly subtotals: ReadonlyMap<Keyword, number>;
  readonly grandTotal: number;
}

export interface ExtractionDiagnostics {
  pagesRead: number;
  linesRead: number;
  boilerplateDropped: number;
  candidateLines: number;
  discarded: Record<LineErrorCode, number>;
  discardedTotal: number;
  unmatched: number;
}

export interface ExtractionReport {
  result: ExtractionResult;
  diagnostics: ExtractionDiagnostics;
}
