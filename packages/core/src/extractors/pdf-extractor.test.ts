import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SourceFile } from './types';
import { EmptyContentError, UnreadablePdfError } from '../errors';

const { pdfParse } = vi.hoisted(() => ({ pdfParse: vi.fn() }));
vi.mock('pdf-parse', () => ({ default: pdfParse }));

import { PDFExtractor } from './pdf-extractor';

let dir: string;

function sourceFile(name: string, content = '%PDF-1.4 test'): SourceFile {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return { path: filePath, size: Buffer.byteLength(content), modifiedAt: new Date(2024, 0, 1) };
}

function parsed(text: string, info: Record<string, unknown> = {}) {
  return { numpages: 3, numrender: 3, info, metadata: null, version: '1.10.100', text };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-renamer-extractor-'));
  pdfParse.mockReset();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('PDFExtractor', () => {
  it('returns normalized text, page count and title', async () => {
    pdfParse.mockResolvedValue(parsed('\n\nQuarterly   Report\n\nRevenue grew  ', { Title: ' Q3 Report ' }));
    const file = sourceFile('report.pdf');

    const excerpt = await new PDFExtractor().extract(file);

    expect(excerpt).toEqual({
      text: 'Quarterly Report Revenue grew',
      pages: 3,
      truncated: false,
      title: 'Q3 Report',
    });
    expect(pdfParse).toHaveBeenCalledTimes(1);
    const [buffer, options] = pdfParse.mock.calls[0];
    expect(Buffer.isBuffer(buffer)).toBe(true);
    expect(options).toEqual({ max: 5 });
  });

  it('truncates long text on a word boundary', async () => {
    pdfParse.mockResolvedValue(parsed('alpha beta gamma delta'));

    const excerpt = await new PDFExtractor({ maxChars: 13 }).extract(sourceFile('long.pdf'));

    expect(excerpt.text).toBe('alpha beta');
    expect(excerpt.truncated).toBe(true);
    expect(excerpt.title).toBeNull();
  });

  it('raises EmptyContentError when there is no text layer', async () => {
    pdfParse.mockResolvedValue(parsed(' \n\n '));
    await expect(new PDFExtractor().extract(sourceFile('scan.pdf'))).rejects.toBeInstanceOf(EmptyContentError);
  });

  it('raises UnreadablePdfError when parsing fails', async () => {
    pdfParse.mockRejectedValue(new Error('Invalid PDF structure'));

    await expect(new PDFExtractor().extract(sourceFile('broken.pdf', 'not a pdf'))).rejects.toThrow(
      new UnreadablePdfError('Not a readable PDF: Invalid PDF structure')
    );
  });

  it('keeps pdf.js warnings out of the console and restores console.log', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    pdfParse.mockImplementation(async () => {
      console.log('Warning: Indexing all PDF objects');
      console.log('[Test] still printed');
      throw new Error('Invalid PDF structure');
    });

    await expect(new PDFExtractor().extract(sourceFile('broken.pdf', 'not a pdf'))).rejects.toBeInstanceOf(
      UnreadablePdfError
    );

    console.log('Warning: printed once parsing is over');

    expect(log.mock.calls).toEqual([['[Test] still printed'], ['Warning: printed once parsing is over']]);
    log.mockRestore();
  });

  it('raises UnreadablePdfError when the file cannot be read', async () => {
    const missing: SourceFile = { path: path.join(dir, 'missing.pdf'), size: 10, modifiedAt: new Date() };

    await expect(new PDFExtractor().extract(missing)).rejects.toBeInstanceOf(UnreadablePdfError);
    expect(pdfParse).not.toHaveBeenCalled();
  });

  it('skips files over the size limit without reading them', async () => {
    const file = sourceFile('huge.pdf');

    await expect(new PDFExtractor({ maxSizeBytes: 4 }).extract(file)).rejects.toBeInstanceOf(UnreadablePdfError);
    expect(pdfParse).not.toHaveBeenCalled();
  });
});
