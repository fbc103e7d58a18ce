import { createRequire } from 'module';
import { readFile } from 'fs/promises';
import type PdfParse from 'pdf-parse';
import { EmptySourceDocumentError, ExtractionTimeoutError } from '../errors.js';
import { DEFAULT_EXTRACTION_TIMEOUT_MS } from '../utils/constants.js';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  lines: string[];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  fullText: string;
  totalPages: number;
  metadata: {
    title?: string | undefined;
    author?: string | undefined;
    creationDate?: string | undefined;
  };
}

export interface PdfTextContent {
  text: string;
  numpages: number;
  info?: unknown;
}

/**
 * Turns a PDF body into plain text. The default reader is pdf-parse.
 */
export type PdfTextReader = (data: Buffer) => Promise<PdfTextContent>;

export interface ExtractOptions {
  /** Upper bound for text extraction (default: 30s) */
  timeoutMs?: number;
  reader?: PdfTextReader;
}

const PAGE_MARKER = /(?=(?:Page|P[aá]gina)\s+\d+\s+(?:of|de)\s+\d+)/i;

// pdf-parse runs a self-test when it is not loaded through require.
const requireCjs = createRequire(import.meta.url);

const PAGE_BREAK = '\f';

interface PdfTextItem {
  str: string;
  transform: unknown[];
}

interface PdfPageProxy {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: unknown[] }>;
}

function isPageProxy(value: unknown): value is PdfPageProxy {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'getTextContent') === 'function';
}

function isTextItem(value: unknown): value is PdfTextItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'str') === 'string' &&
    Array.isArray(Reflect.get(value, 'transform'))
  );
}

/**
 * Page renderer for pdf-parse: one line per baseline, like its built-in renderer,
 * with a form feed closing every page so page boundaries survive the join.
 */
export async function renderPageText(pageData: unknown): Promise<string> {
  if (!isPageProxy(pageData)) {
    return PAGE_BREAK;
  }
  const content = await pageData.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });

  let text = '';
  let lastY: unknown;
  for (const item of content.items) {
    if (!isTextItem(item)) continue;
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return `${text}${PAGE_BREAK}`;
}

export const readWithPdfParse: PdfTextReader = async (data) => {
  const pdfParse: typeof PdfParse = requireCjs('pdf-parse');
  // pdf.js reads the whole underlying ArrayBuffer, so pooled Buffers are copied first.
  const copy = new Uint8Array(data.byteLength);
  copy.set(data);
  const body = Buffer.from(copy.buffer);
  const parsed = await pdfParse(body, { pagerender: renderPageText });
  return { text: parsed.text, numpages: parsed.numpages, info: parsed.info };
};

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExtractionTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (info === null || typeof info !== 'object' || !(key in info)) {
    return undefined;
  }
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' ? value : undefined;
}

export async function extractPDF(filePath: string, options: ExtractOptions = {}): Promise<ExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractPDFFromBuffer(dataBuffer, options);
}

export async function extractPDFFromBuffer(dataBuffer: Buffer, options: ExtractOptions = {}): Promise<ExtractedPDF> {
  const reader = options.reader ?? readWithPdfParse;
  const data = await withTimeout(reader(dataBuffer), options.timeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS);

  const pages = splitIntoPages(data.text, data.numpages);
  if (pages.every((page) => page.lines.length === 0)) {
    throw new EmptySourceDocumentError(
      data.numpages === 0 ? 'document has no pages' : 'no page contains text (scanned PDF?)'
    );
  }

  return {
    pages,
    fullText: data.text,
    totalPages: data.numpages,
    metadata: {
      title: readInfoString(data.info, 'Title'),
      author: readInfoString(data.info, 'Author'),
      creationDate: readInfoString(data.info, 'CreationDate'),
    },
  };
}

function toPage(text: string, pageNumber: number): ExtractedPage {
  return {
    pageNumber,
    text: text.trim(),
    lines: text.split('\n').map((line) => line.trim()).filter((line) => line.length > 0),
  };
}

export function splitIntoPages(fullText: string, numPages: number): ExtractedPage[] {
  // A trailing form feed closes the last page rather than opening an empty one.
  const body = fullText.endsWith(PAGE_BREAK) ? fullText.slice(0, -PAGE_BREAK.length) : fullText;
  const formFeedPages = body.split(PAGE_BREAK);
  if (formFeedPages.length > 1) {
    return formFeedPages.map((text, index) => toPage(text, index + 1));
  }

  const pageMarkers = body.split(PAGE_MARKER);
  if (pageMarkers.length > 1) {
    return pageMarkers.map((text, index) => toPage(text, index + 1));
  }

  if (numPages <= 1) {
    return [toPage(body, 1)];
  }

  const lines = body.split('\n');
  const linesPerPage = Math.ceil(lines.length / numPages);
  const pages: ExtractedPage[] = [];

  for (let i = 0; i < numPages; i++) {
    const startLine = i * linesPerPage;
    const endLine = Math.min(startLine + linesPerPage, lines.length);
    pages.push(toPage(lines.slice(startLine, endLine).join('\n'), i + 1));
  }

  return pages;
}
