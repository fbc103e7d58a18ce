import { basename } from 'path';
import { matchKeyword } from '../categorization/index.js';
import { EmptySourceDocumentError } from '../errors.js';
import { extractPDF, type PdfTextReader } from '../extractors/index.js';
import { aggregate, assertTotalsConsistent } from '../output/aggregator.js';
import { extractFields, segmentLines } from '../parsers/index.js';
import { prepareKeywords, type KeywordRegistry } from '../registry/index.js';
import { parseRunConfig, type RunConfig } from '../schemas/index.js';
import type {
  ExtractionDiagnostics,
  ExtractionReport,
  Keyword,
  LineErrorCode,
  Transaction,
} from '../types/output.js';

export interface StatementExtraction extends ExtractionReport {
  source: {
    fileName: string;
    pageCount: number;
  };
}

export interface ExtractStatementOptions {
  /** Bound on PDF text extraction */
  timeoutMs?: number;
  reader?: PdfTextReader;
  /** Fixed exclusion list override for the segmenter */
  boilerplate?: readonly string[];
}

/**
 * Run the extraction engine over page text.
 *
 * Lines that fail field extraction or match no keyword are excluded and counted in
 * the diagnostics. A document without any text is fatal.
 */
export function runExtraction(
  pages: ReadonlyArray<readonly string[]>,
  keywords: readonly Keyword[],
  config: RunConfig,
  options: Pick<ExtractStatementOptions, 'boilerplate'> = {}
): ExtractionReport {
  const runConfig = parseRunConfig(config);

  if (pages.every((page) => page.every((line) => line.trim() === ''))) {
    throw new EmptySourceDocumentError(pages.length === 0 ? 'no pages' : 'no page contains text');
  }

  const snapshot = prepareKeywords(keywords);
  const segmented = segmentLines(pages, { ...runConfig, boilerplate: options.boilerplate });

  const discarded: Record<LineErrorCode, number> = {
    DateParseError: 0,
    ValueParseError: 0,
    EmptyDescription: 0,
  };
  let unmatched = 0;
  const transactions: Transaction[] = [];

  for (const line of segmented.lines) {
    const parsed = extractFields(line, runConfig);
    if (!parsed.ok) {
      discarded[parsed.error] += 1;
      continue;
    }

    const matchedKeyword = matchKeyword(parsed.fields.description, snapshot);
    if (matchedKeyword === null) {
      unmatched += 1;
      continue;
    }

    transactions.push(
      Object.freeze({
        date: parsed.fields.date,
        description: parsed.fields.description,
        value: parsed.fields.value,
        matchedKeyword,
        sourceLine: line,
      })
    );
  }

  const result = aggregate(transactions, snapshot);
  assertTotalsConsistent(result);

  const diagnostics: ExtractionDiagnostics = {
    pagesRead: pages.length,
    linesRead: segmented.linesRead,
    boilerplateDropped: segmented.boilerplateDropped,
    candidateLines: segmented.lines.length,
    discarded,
    discardedTotal: discarded.DateParseError + discarded.ValueParseError + discarded.EmptyDescription,
    unmatched,
  };

  return { result, diagnostics };
}

/**
 * Extract a statement PDF against the registry's keywords as of the call.
 * Registry changes made while the PDF is being read do not affect this run.
 */
export async function extractStatementFile(
  filePath: string,
  registry: KeywordRegistry,
  config: RunConfig,
  options: ExtractStatementOptions = {}
): Promise<StatementExtraction> {
  const runConfig = parseRunConfig(config);
  const keywords = await registry.snapshot();

  const pdf = await extractPDF(filePath, { timeoutMs: options.timeoutMs, reader: options.reader });

  const report = runExtraction(
    pdf.pages.map((page) => page.lines),
    keywords,
    runConfig,
    { boilerplate: options.boilerplate }
  );

  return {
    ...report,
    source: {
      fileName: basename(filePath),
      pageCount: pdf.totalPages,
    },
  };
}
