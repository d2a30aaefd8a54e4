/**
 * Error types raised by the rename pipeline.
 *
 * Fatal kinds (configuration, input path) stop the run before any file is touched.
 * Every other kind is scoped to a single file: the pipeline records it and moves on.
 */
export type ErrorKind =
  | 'ConfigurationError'
  | 'InputPathError'
  | 'UnreadablePdfError'
  | 'EmptyContentError'
  | 'ModelRequestError'
  | 'ModelParseError'
  | 'RenameError';

export const FATAL_ERROR_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'ConfigurationError',
  'InputPathError',
]);

/** Error kinds that affect a single file only. */
export type FileErrorKind = Exclude<ErrorKind, 'ConfigurationError' | 'InputPathError'>;

export function isFileErrorKind(kind: ErrorKind): kind is FileErrorKind {
  return !FATAL_ERROR_KINDS.has(kind);
}

export abstract class PdfRenamerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get fatal(): boolean {
    return FATAL_ERROR_KINDS.has(this.kind);
  }
}

export class ConfigurationError extends PdfRenamerError {
  readonly kind = 'ConfigurationError';
  readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = []) {
    super(message);
    this.missingKeys = missingKeys;
  }
}

export class InputPathError extends PdfRenamerError {
  readonly kind = 'InputPathError';
  readonly inputPath: string;

  constructor(inputPath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.inputPath = inputPath;
  }
}

export class UnreadablePdfError extends PdfRenamerError {
  readonly kind = 'UnreadablePdfError';
}

/** Parsed fine, but no text layer (typically a scan). */
export class EmptyContentError extends PdfRenamerError {
  readonly kind = 'EmptyContentError';
}

export class ModelRequestError extends PdfRenamerError {
  readonly kind = 'ModelRequestError';
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class ModelParseError extends PdfRenamerError {
  readonly kind = 'ModelParseError';
  readonly response: string;

  constructor(message: string, response: string) {
    super(message);
    this.response = response;
  }
}

export class RenameError extends PdfRenamerError {
  readonly kind = 'RenameError';
  readonly code: string | null;

  constructor(message: string, code: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

export function isPdfRenamerError(error: unknown): error is PdfRenamerError {
  return error instanceof PdfRenamerError;
}

/**
 * Read the `code` property Node attaches to system errors (ENOENT, EACCES, ...).
 */
export function getErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : null;
  }
  return null;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
