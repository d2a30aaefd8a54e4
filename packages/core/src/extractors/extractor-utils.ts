/**
 * Utility functions for extractors
 */
import { MAX_EXCERPT_CHARS } from '../constants';

/**
 * Collapse every whitespace run (including page breaks) to a single space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Truncate text to a character budget, cutting on the last word boundary that fits.
 * A single word longer than the budget is cut mid-word.
 */
export function truncateToCharLimit(
  text: string,
  maxChars: number = MAX_EXCERPT_CHARS
): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  const slice = text.slice(0, maxChars);
  // Is the cut already on a boundary?
  if (text[maxChars] === ' ') {
    return { text: slice.trimEnd(), truncated: true };
  }

  const lastSpace = slice.lastIndexOf(' ');
  const cut = lastSpace > 0 ? slice.slice(0, lastSpace) : slice;
  return { text: cut.trimEnd(), truncated: true };
}

/**
 * pdf.js (inside pdf-parse) reports recoverable problems with console.log,
 * e.g. "Warning: Indexing all PDF objects" or font table warnings.
 */
export function isPdfParserNoise(message: string): boolean {
  const lowerMsg = message.toLowerCase();
  return (
    lowerMsg.startsWith('warning:') ||
    lowerMsg.includes('tt: undefined function') ||
    lowerMsg.includes('could not find a preferred cmap table') ||
    (lowerMsg.includes('glyf') && lowerMsg.includes('table'))
  );
}

/**
 * Run a parse with pdf.js warnings filtered out of console.log, so they do not
 * mix into the CLI's per-file output. Other log lines pass through.
 */
export async function withParserWarningsSuppressed<T>(run: () => Promise<T>): Promise<T> {
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    if (typeof args[0] === 'string' && isPdfParserNoise(args[0])) {
      return;
    }
    originalLog(...args);
  };

  try {
    return await run();
  } finally {
    console.log = originalLog;
  }
}

/**
 * Execute an extraction with timeout protection
 * Warns via console.warn if extraction takes longer than warningMs
 * Rejects if extraction takes longer than timeoutMs
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  warningMs: number,
  filePath: string
): Promise<T> {
  const startTime = Date.now();

  const warningTimer = setTimeout(() => {
    const elapsed = Date.now() - startTime;
    console.warn(
      `[Extractor] Extraction taking longer than expected: ${filePath} (${Math.round(elapsed / 1000)}s elapsed)`
    );
  }, warningMs);

  let timeoutTimer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      reject(new Error(`Extraction timeout after ${timeoutMs}ms: ${filePath}`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(warningTimer);
    clearTimeout(timeoutTimer);
  }
}
