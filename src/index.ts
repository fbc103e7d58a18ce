// ─── Pipeline ───────────────────────────────────────────────────────────────
export { runExtraction, extractStatementFile } from './pipeline/index.js';
export type { StatementExtraction, ExtractStatementOptions } from './pipeline/index.js';

// ─── Keyword Registry ───────────────────────────────────────────────────────
export {
  KeywordRegistry,
  FileKeywordStore,
  InMemoryKeywordStore,
  normalizeKeyword,
  prepareKeywords,
} from './registry/index.js';
export type { KeywordStore, KeywordRegistryOptions } from './registry/index.js';

// ─── Extractors ─────────────────────────────────────────────────────────────
export { extractPDF, extractPDFFromBuffer, splitIntoPages } from './extractors/index.js';
export type { ExtractedPage, ExtractedPDF, ExtractOptions, PdfTextReader, PdfTextContent } from './extractors/index.js';

// ─── Parsers ────────────────────────────────────────────────────────────────
export { segmentLines, isTransactionHead, isBoilerplate, extractFields, rawLineOf } from './parsers/index.js';
export type { SegmentOptions, SegmentResult } from './parsers/index.js';

// ─── Matching ───────────────────────────────────────────────────────────────
export { matchKeyword, matchDescription } from './categorization/index.js';
export type { KeywordMatchResult } from './categorization/index.js';

// ─── Output ─────────────────────────────────────────────────────────────────
export {
  aggregate,
  assertTotalsConsistent,
  toTable,
  rowCells,
  TABLE_COLUMNS,
  exportCsv,
  exportTableCsv,
  exportXlsx,
  buildWorkbook,
  exportJson,
  toJsonOutput,
} from './output/index.js';
export type {
  Table,
  TableRow,
  TableRowKind,
  TableColumn,
  TableOptions,
  CsvExportOptions,
  XlsxExportOptions,
  JsonOutput,
  JsonTransaction,
} from './output/index.js';

// ─── Normalizers ────────────────────────────────────────────────────────────
export { sortResult, sortTransactions, SORT_KEYS } from './normalizers/index.js';
export type { SortKey } from './normalizers/index.js';

// ─── Schemas & config ───────────────────────────────────────────────────────
export { RunConfigSchema, LocaleSchema, KeywordFileSchema, parseRunConfig } from './schemas/index.js';
export type { RunConfig, Locale, DateOrder, ReferencePeriod } from './schemas/index.js';
export { LOCALE_PRESETS, buildRunConfig, parseReference, resolveLocale, loadEnvConfig } from './config/index.js';
export type { LocaleName, LocalePreset, EnvConfig, OutputFormat } from './config/index.js';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  TallyError,
  InvalidKeywordError,
  DuplicateKeywordError,
  KeywordNotFoundError,
  ExtractionTimeoutError,
  EmptySourceDocumentError,
  InvalidRunConfigError,
  TotalsMismatchError,
  isTallyError,
} from './errors.js';
export type { TallyErrorCode } from './errors.js';

// ─── Types & utils ──────────────────────────────────────────────────────────
export type {
  Keyword,
  RawLine,
  Transaction,
  ExtractionResult,
  ExtractionDiagnostics,
  ExtractionReport,
  ExtractedFields,
  LineErrorCode,
  LineParseResult,
} from './types/output.js';
export { parseCents, formatCents, findDateToken, parseStatementDate, foldText, PARSER_VERSION } from './utils/index.js';
