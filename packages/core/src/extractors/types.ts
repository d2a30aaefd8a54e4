/**
 * Types for the text extraction step
 */

/**
 * A PDF discovered on disk. Created by the crawler, never mutated.
 */
export interface SourceFile {
  readonly path: string;
  readonly size: number; // bytes
  readonly modifiedAt: Date;
}

/**
 * Bounded plain-text sample of a document, used as model input.
 */
export interface Excerpt {
  text: string;
  pages: number;
  truncated: boolean;
  title: string | null; // from the PDF info dictionary, when present
}

export interface TextExtractor {
  readonly id: string;
  extract(file: SourceFile): Promise<Excerpt>;
}
