export {
  extractPDF,
  extractPDFFromBuffer,
  splitIntoPages,
  readWithPdfParse,
  renderPageText,
} from './pdf-extractor.js';

export type {
  ExtractedPage,
  ExtractedPDF,
  ExtractOptions,
  PdfTextContent,
  PdfTextReader,
} from './pdf-extractor.js';
