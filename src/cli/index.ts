#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { OUTPUT_FORMATS, buildRunConfig, resolveLocale, type EnvConfig } from '../config/index.js';
import { isSortKey, sortResult, SORT_KEYS } from '../normalizers/index.js';
import { exportCsv, exportJson, exportXlsx } from '../output/index.js';
import { extractStatementFile, type StatementExtraction } from '../pipeline/index.js';
import { FileKeywordStore, KeywordRegistry } from '../registry/index.js';
import { formatCents } from '../utils/money.js';
import { PARSER_VERSION } from '../utils/constants.js';
import { DATE_FORMATS, loadEnvOrExit, parseDateFormat, parseFormat, parseTimeout, reportError } from './options.js';

interface RunOptions {
  keywords: string;
  out?: string;
  format: string;
  reference?: string;
  locale: string;
  timeout: string;
  sort?: string;
  dateFormat: string;
  verbose: boolean;
}

interface KeywordOptions {
  keywords: string;
}

const env: EnvConfig = loadEnvOrExit();

const program = new Command();

program
  .name('statement-tally')
  .description('Find keyword-matched transactions in credit-card statement PDFs and total them')
  .version(PARSER_VERSION);

function openRegistry(keywordsFile: string): KeywordRegistry {
  return new KeywordRegistry(new FileKeywordStore(keywordsFile));
}

async function handleErrors(task: () => Promise<void>, verbose: boolean): Promise<void> {
  try {
    await task();
  } catch (error) {
    reportError(error, verbose);
    process.exit(1);
  }
}

function printDiagnostics(extraction: StatementExtraction): void {
  const { diagnostics } = extraction;
  console.error('');
  console.error('=== Extraction Diagnostics ===');
  console.error(`Pages read:          ${diagnostics.pagesRead}`);
  console.error(`Lines read:          ${diagnostics.linesRead}`);
  console.error(`Boilerplate dropped: ${diagnostics.boilerplateDropped}`);
  console.error(`Candidate lines:     ${diagnostics.candidateLines}`);
  console.error(`No date:             ${diagnostics.discarded.DateParseError}`);
  console.error(`No value:            ${diagnostics.discarded.ValueParseError}`);
  console.error(`Empty description:   ${diagnostics.discarded.EmptyDescription}`);
  console.error(`Unmatched:           ${diagnostics.unmatched}`);
}

async function runStatement(pdfFile: string, options: RunOptions): Promise<void> {
  const format = parseFormat(options.format);
  const preset = resolveLocale(options.locale);
  const config = buildRunConfig({ reference: options.reference, locale: options.locale });
  const dateFormat = parseDateFormat(options.dateFormat);

  if (options.verbose) {
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Keywords file: ${resolve(options.keywords)}`);
    console.error(`[INFO] Reference period: ${config.referenceYear}-${String(config.referenceMonth).padStart(2, '0')}`);
    console.error(`[INFO] Locale: ${options.locale}`);
  }

  const registry = openRegistry(options.keywords);
  const extraction = await extractStatementFile(resolve(pdfFile), registry, config, {
    timeoutMs: parseTimeout(options.timeout),
  });

  let result = extraction.result;
  if (options.sort !== undefined) {
    if (!isSortKey(options.sort)) {
      throw new Error(`Unknown sort key "${options.sort}" (expected ${SORT_KEYS.join(', ')})`);
    }
    result = sortResult(result, options.sort);
  }

  const tableOptions = { locale: config.locale, dateFormat } as const;

  if (format === 'xlsx') {
    const outPath = resolve(options.out ?? 'statement-tally.xlsx');
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, exportXlsx(result, { ...tableOptions, numberFormat: preset.numberFormat }));
    console.error(`[INFO] Workbook written to ${outPath}`);
  } else {
    const content = format === 'csv'
      ? exportCsv(result, { ...tableOptions, delimiter: config.locale.decimalSeparator === ',' ? ';' : ',' })
      : exportJson(result, { diagnostics: extraction.diagnostics });

    if (options.out !== undefined) {
      const outPath = resolve(options.out);
      await mkdir(dirname(outPath), { recursive: true });
      await writeFile(outPath, `${content}\n`, 'utf-8');
      console.error(`[INFO] Output written to ${outPath}`);
    } else {
      console.log(content);
    }
  }

  const total = formatCents(result.grandTotal, config.locale, { grouping: true });
  console.error(
    `[INFO] Found ${result.transactions.length} transaction(s) in ${extraction.source.fileName}. ` +
      `Grand total: ${preset.currencySymbol} ${total}`
  );

  if (options.verbose) {
    printDiagnostics(extraction);
  }
}

program
  .command('run')
  .description('Read a statement PDF and export the matched transactions')
  .argument('<pdf-file>', 'Path to the statement PDF')
  .option('-k, --keywords <file>', 'Keyword registry file', env.keywordsFile)
  .option('-o, --out <file>', 'Output file (xlsx default: statement-tally.xlsx; csv/json default: stdout)', env.outputFile)
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, env.format)
  .option('-r, --reference <YYYY-MM>', 'Statement closing month (default: current month)', env.reference)
  .option('-l, --locale <locale>', 'Locale preset (pt-BR, en-US)', env.locale)
  .option('-t, --timeout <ms>', 'PDF text extraction timeout in milliseconds', String(env.timeoutMs))
  .option('--sort <key>', `Sort transactions (${SORT_KEYS.join(', ')}); default is statement order`)
  .option('--date-format <format>', `Date column format (${DATE_FORMATS.join(', ')})`, 'iso')
  .option('-v, --verbose', 'Enable verbose output', env.verbose)
  .action(async (pdfFile: string, options: RunOptions) => {
    await handleErrors(() => runStatement(pdfFile, options), options.verbose);
  });

program
  .command('list')
  .description('List registered keywords')
  .option('-k, --keywords <file>', 'Keyword registry file', env.keywordsFile)
  .action(async (options: KeywordOptions) => {
    await handleErrors(async () => {
      const keywords = await openRegistry(options.keywords).list();
      console.log('Registered keywords:');
      for (const keyword of keywords) {
        console.log(` - ${keyword}`);
      }
    }, env.verbose);
  });

program
  .command('add')
  .description('Register a keyword to search for')
  .argument('<term>', 'Keyword (e.g. "uber eats" or "99app")')
  .option('-k, --keywords <file>', 'Keyword registry file', env.keywordsFile)
  .action(async (term: string, options: KeywordOptions) => {
    await handleErrors(async () => {
      const keyword = await openRegistry(options.keywords).add(term);
      console.log(`Added: ${keyword}`);
    }, env.verbose);
  });

program
  .command('remove')
  .description('Remove a registered keyword')
  .argument('<term>', 'Keyword to remove')
  .option('-k, --keywords <file>', 'Keyword registry file', env.keywordsFile)
  .action(async (term: string, options: KeywordOptions) => {
    await handleErrors(async () => {
      await openRegistry(options.keywords).remove(term);
      console.log(`Removed: ${term}`);
    }, env.verbose);
  });

await program.parseAsync(process.argv);
