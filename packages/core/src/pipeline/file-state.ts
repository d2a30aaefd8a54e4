import type { SourceFile } from '../extractors/types';
import type { RenameSuggestion } from '../agents/naming-agent/types';
import type { FileErrorKind } from '../errors';

/**
 * Per-file lifecycle. Linear; a state is never revisited.
 *
 *   pending -> extracted -> named -> renamed
 *                                 -> unchanged   (name already right)
 *   any non-terminal state        -> failed
 *
 * In a dry run `named` is where a file stops.
 */
export type FileStatus = 'pending' | 'extracted' | 'named' | 'renamed' | 'unchanged' | 'failed';

const TRANSITIONS: Record<FileStatus, readonly FileStatus[]> = {
  pending: ['extracted', 'failed'],
  extracted: ['named', 'failed'],
  named: ['renamed', 'unchanged', 'failed'],
  renamed: [],
  unchanged: [],
  failed: [],
};

export type FailureKind = FileErrorKind | 'UnexpectedError';

export type FileFailure = {
  kind: FailureKind;
  message: string;
};

export interface FileResult {
  readonly file: SourceFile;
  status: FileStatus;
  suggestion?: RenameSuggestion;
  targetPath?: string;
  failure?: FileFailure;
}

export function canTransition(from: FileStatus, to: FileStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: FileStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function createFileResult(file: SourceFile): FileResult {
  return { file, status: 'pending' };
}

/**
 * Move a file to its next state. Throws on a transition the lifecycle does not allow.
 */
export function transition(result: FileResult, to: FileStatus): void {
  if (!canTransition(result.status, to)) {
    throw new Error(`Illegal state transition for ${result.file.path}: ${result.status} -> ${to}`);
  }
  result.status = to;
}

export function markFailed(result: FileResult, failure: FileFailure): void {
  transition(result, 'failed');
  result.failure = failure;
}
