import type { ExtractionDiagnostics, ExtractionResult } from '../types/output.js';
import { PARSER_VERSION } from '../utils/constants.js';

export interface JsonTransaction {
  date: string;
  description: string;
  keyword: string;
  valueCents: number;
  page: number;
  lineIndex: number;
  originalText: string;
}

export interface JsonOutput {
  parserVersion: string;
  transactions: JsonTransaction[];
  /** Array form keeps registry order for numeric keywords such as "99" */
  subtotals: Array<{ keyword: string; totalCents: number }>;
  grandTotalCents: number;
  diagnostics?: ExtractionDiagnostics;
}

export function toJsonOutput(result: ExtractionResult, diagnostics?: ExtractionDiagnostics): JsonOutput {
  const output: JsonOutput = {
    parserVersion: PARSER_VERSION,
    transactions: result.transactions.map((txn) => ({
      date: txn.date,
      description: txn.description,
      keyword: txn.matchedKeyword,
      valueCents: txn.value,
      page: txn.sourceLine.page,
      lineIndex: txn.sourceLine.lineIndex,
      originalText: txn.sourceLine.text,
    })),
    subtotals: [...result.subtotals].map(([keyword, totalCents]) => ({ keyword, totalCents })),
    grandTotalCents: result.grandTotal,
  };
  if (diagnostics !== undefined) {
    output.diagnostics = diagnostics;
  }
  return output;
}

export function exportJson(
  result: ExtractionResult,
  options: { diagnostics?: ExtractionDiagnostics; pretty?: boolean } = {}
): string {
  const output = toJsonOutput(result, options.diagnostics);
  return (options.pretty ?? true) ? JSON.stringify(output, null, 2) : JSON.stringify(output);
}
