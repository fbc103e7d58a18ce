/**
 * Line segmenter for statement page text.
 * Reattaches wrapped description lines to their transaction head and drops
 * statement furniture, producing one RawLine per logical line.
 */

import type { Locale, ReferencePeriod } from '../schemas/index.js';
import type { RawLine } from '../types/output.js';
import { BOILERPLATE_MARKERS } from '../utils/constants.js';
import { containsDateToken, findDateToken } from '../utils/date.js';
import { findLastValueToken } from '../utils/money.js';
import { collapseWhitespace, foldText } from '../utils/normalize.js';

export interface SegmentOptions extends ReferencePeriod {
  locale: Locale;
  boilerplate?: readonly string[];
}

export interface SegmentResult {
  lines: RawLine[];
  linesRead: number;
  boilerplateDropped: number;
}

interface PendingLine {
  headText: string;
  continuations: string[];
  page: number;
  lineIndex: number;
}

/**
 * A head carries a valid date token followed somewhere later by a value token.
 */
export function isTransactionHead(text: string, options: SegmentOptions): boolean {
  const date = findDateToken(text, options, options.locale.dateOrder);
  if (date === null) {
    return false;
  }
  return findLastValueToken(text.slice(date.end), options.locale) !== null;
}

export function isBoilerplate(text: string, markers: readonly string[] = BOILERPLATE_MARKERS): boolean {
  if (containsDateToken(text)) {
    return false;
  }
  const folded = foldText(text);
  return markers.some((marker) => folded.includes(marker));
}

function toRawLine(pending: PendingLine): RawLine {
  return {
    text: [pending.headText, ...pending.continuations].join(' '),
    headText: pending.headText,
    continuations: pending.continuations,
    page: pending.page,
    lineIndex: pending.lineIndex,
  };
}

export function segmentLines(
  pages: ReadonlyArray<readonly string[]>,
  options: SegmentOptions
): SegmentResult {
  const markers = (options.boilerplate ?? BOILERPLATE_MARKERS).map(foldText);
  const lines: RawLine[] = [];
  let linesRead = 0;
  let boilerplateDropped = 0;

  for (let p = 0; p < pages.length; p++) {
    const page = pages[p];
    if (page === undefined) continue;

    let open: PendingLine | null = null;
    const close = (): void => {
      if (open !== null) {
        lines.push(toRawLine(open));
        open = null;
      }
    };

    for (let i = 0; i < page.length; i++) {
      const rawText = page[i];
      if (rawText === undefined) continue;
      linesRead += 1;

      const text = collapseWhitespace(rawText);
      if (text === '') {
        close();
        continue;
      }

      if (isBoilerplate(text, markers)) {
        boilerplateDropped += 1;
        close();
        continue;
      }

      if (isTransactionHead(text, options)) {
        close();
        open = { headText: text, continuations: [], page: p + 1, lineIndex: i };
        continue;
      }

      const hasDate = containsDateToken(text);
      const hasValue = findLastValueToken(text, options.locale) !== null;
      if (open !== null && !hasDate && !hasValue) {
        open.continuations.push(text);
        continue;
      }

      // Ambiguous: kept on its own and left to field extraction.
      close();
      lines.push(toRawLine({ headText: text, continuations: [], page: p + 1, lineIndex: i }));
    }

    close();
  }

  return { lines, linesRead, boilerplateDropped };
}
