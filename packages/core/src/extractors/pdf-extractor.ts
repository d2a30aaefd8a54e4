import * as fs from 'fs';
import pdf from 'pdf-parse';
import type { Excerpt, SourceFile, TextExtractor } from './types';
import {
  normalizeWhitespace,
  truncateToCharLimit,
  withParserWarningsSuppressed,
  withTimeout,
} from './extractor-utils';
import { EmptyContentError, UnreadablePdfError, getErrorMessage } from '../errors';
import {
  EXTRACTION_TIMEOUT_MS,
  EXTRACTION_WARNING_MS,
  MAX_EXCERPT_CHARS,
  MAX_EXCERPT_PAGES,
  MAX_PDF_SIZE_BYTES,
} from '../constants';

export type PDFExtractorOptions = {
  maxPages?: number;
  maxChars?: number;
  maxSizeBytes?: number;
  timeoutMs?: number;
};

/**
 * PDF Extractor - pulls a bounded text excerpt out of a PDF
 *
 * Throws UnreadablePdfError when the bytes cannot be parsed (corrupt, encrypted,
 * not a PDF, too large) and EmptyContentError when the PDF has no text layer.
 */
export class PDFExtractor implements TextExtractor {
  readonly id = 'pdf-extractor';

  private readonly maxPages: number;
  private readonly maxChars: number;
  private readonly maxSizeBytes: number;
  private readonly timeoutMs: number;

  constructor(options: PDFExtractorOptions = {}) {
    this.maxPages = options.maxPages ?? MAX_EXCERPT_PAGES;
    this.maxChars = options.maxChars ?? MAX_EXCERPT_CHARS;
    this.maxSizeBytes = options.maxSizeBytes ?? MAX_PDF_SIZE_BYTES;
    this.timeoutMs = options.timeoutMs ?? EXTRACTION_TIMEOUT_MS;
  }

  async extract(file: SourceFile): Promise<Excerpt> {
    if (file.size > this.maxSizeBytes) {
      throw new UnreadablePdfError(
        `PDF too large (${Math.round(file.size / 1024 / 1024)}MB), skipping`
      );
    }

    let dataBuffer: Buffer;
    try {
      dataBuffer = await fs.promises.readFile(file.path);
    } catch (error) {
      throw new UnreadablePdfError(`Cannot read file: ${getErrorMessage(error)}`, { cause: error });
    }

    let pdfData: pdf.Result;
    try {
      pdfData = await withParserWarningsSuppressed(() =>
        withTimeout(pdf(dataBuffer, { max: this.maxPages }), this.timeoutMs, EXTRACTION_WARNING_MS, file.path)
      );
    } catch (error) {
      throw new UnreadablePdfError(`Not a readable PDF: ${getErrorMessage(error)}`, { cause: error });
    }

    const rawText = normalizeWhitespace(pdfData.text ?? '');

    // No text layer at all: image-based (scanned) PDF
    if (rawText.length === 0) {
      throw new EmptyContentError(
        `No extractable text in ${pdfData.numpages} page(s); the PDF is probably a scan`
      );
    }

    const { text, truncated } = truncateToCharLimit(rawText, this.maxChars);
    const title = pdfData.info?.Title;

    return {
      text,
      pages: pdfData.numpages,
      truncated,
      title: typeof title === 'string' && title.trim().length > 0 ? title.trim() : null,
    };
  }
}
