/**
 * Limits and defaults shared by the extractor, naming agent and renamer.
 * Adjust them here; every module reads from this file.
 */

// ============================================================================
// EXTRACTION
// ============================================================================

/**
 * Excerpt limits. Only the first pages are parsed and the text is cut on a
 * word boundary so the prompt stays well inside the model's context window.
 */
export const MAX_EXCERPT_PAGES = 5;
export const MAX_EXCERPT_CHARS = 4000;

export const MAX_PDF_SIZE_BYTES = 50 * 1024 * 1024; // 50MB
export const EXTRACTION_TIMEOUT_MS = 60000; // 60 seconds
export const EXTRACTION_WARNING_MS = 10000; // 10 seconds

// ============================================================================
// MODEL
// ============================================================================

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_TIMEOUT_MS = 60000;
export const NAMING_MAX_COMPLETION_TOKENS = 200;
export const NAMING_TEMPERATURE = 0.2;

// ============================================================================
// FILE NAMES
// ============================================================================

/** Longest base name (without extension) the renamer will produce. */
export const MAX_BASENAME_LENGTH = 120;

/**
 * Byte budget for the same base name in UTF-8. Filesystems cap a name at 255
 * bytes; this leaves room for a "-N" suffix and the extension.
 */
export const MAX_BASENAME_BYTES = 200;

/** Placeholder the model uses when the document carries no date. */
export const UNKNOWN_DATE_PLACEHOLDER = '0000-00-00';

export const PDF_EXTENSION = '.pdf';
