import type { RunConfig } from '../schemas/index.js';
import type { LineErrorCode, LineParseResult, RawLine } from '../types/output.js';
import { findDateToken } from '../utils/date.js';
import { findLastValueToken } from '../utils/money.js';
import { collapseWhitespace } from '../utils/normalize.js';

function fail(error: LineErrorCode, line: RawLine): LineParseResult {
  return { ok: false, error, line };
}

/**
 * Parse a RawLine into date, description and value.
 *
 * The date is the first valid date token of the head line; the value is the last
 * value token after it; the description is the head text between the two, followed
 * by any continuation lines. Failures are returned, never thrown.
 */
export function extractFields(line: RawLine, config: RunConfig): LineParseResult {
  const head = line.headText;

  const date = findDateToken(head, config, config.locale.dateOrder);
  if (date === null) {
    return fail('DateParseError', line);
  }

  const rest = head.slice(date.end);
  const value = findLastValueToken(rest, config.locale);
  if (value === null) {
    return fail('ValueParseError', line);
  }

  const description = collapseWhitespace([rest.slice(0, value.index), ...line.continuations].join(' '));
  if (description === '') {
    return fail('EmptyDescription', line);
  }

  return {
    ok: true,
    fields: { date: date.iso, description, value: value.cents },
    line,
  };
}

/**
 * Build a RawLine for a single text line, for callers that bypass segmentation.
 */
export function rawLineOf(text: string, page = 1, lineIndex = 0): RawLine {
  const headText = collapseWhitespace(text);
  return { text: headText, headText, continuations: [], page, lineIndex };
}
