export {
  PARSER_VERSION,
  DEFAULT_KEYWORDS,
  DEFAULT_KEYWORDS_FILE,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  BOILERPLATE_MARKERS,
} from './constants.js';
export {
  containsDateToken,
  findDateToken,
  parseStatementDate,
  resolveYear,
  toISODate,
  compareDates,
  formatISODate,
  type DateToken,
} from './date.js';
export {
  buildValuePattern,
  findValueTokens,
  findLastValueToken,
  parseCents,
  formatCents,
  sumCents,
  type NumberLocale,
  type ValueToken,
  type FormatCentsOptions,
} from './money.js';
export { collapseWhitespace, foldText, escapeRegExp } from './normalize.js';
