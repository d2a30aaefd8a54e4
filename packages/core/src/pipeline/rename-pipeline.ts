import * as path from 'path';
import type { SourceFile, TextExtractor } from '../extractors/types';
import type { NameSuggester } from '../agents/naming-agent/types';
import { resolveDatePlaceholder } from '../agents/naming-agent/parsers';
import type { Renamer } from '../renamer/renamer';
import { createFileResult, markFailed, transition } from './file-state';
import type { FileFailure, FileResult } from './file-state';
import { getErrorMessage, isFileErrorKind, isPdfRenamerError } from '../errors';

export type PipelineServices = {
  extractor: TextExtractor;
  namer: NameSuggester;
  renamer: Renamer;
};

export type PipelineOptions = {
  /** Compute names and report them, touch nothing on disk */
  dryRun?: boolean;
  /** Called once per file when it reaches its final state */
  onResult?: (result: FileResult) => void;
};

export type RunSummary = {
  results: FileResult[];
  renamed: number;
  previewed: number;
  unchanged: number;
  failed: number;
};

/**
 * Run extract -> name -> rename over the files, one at a time.
 *
 * Each file has its own error boundary: a failure is recorded on that file's
 * result and the loop moves on. Only programming errors (illegal state
 * transitions) escape.
 */
export async function runPipeline(
  files: SourceFile[],
  services: PipelineServices,
  options: PipelineOptions = {}
): Promise<RunSummary> {
  const dryRun = options.dryRun ?? false;
  const results: FileResult[] = [];
  const seen = new Set<string>();

  console.log(`[Pipeline] Processing ${files.length} file(s)${dryRun ? ' (dry run)' : ''}`);

  for (const [index, file] of files.entries()) {
    const key = path.resolve(file.path);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    console.log(`[Pipeline] ${index + 1}/${files.length}: ${file.path}`);
    const result = createFileResult(file);

    try {
      await processFile(result, services, dryRun);
    } catch (error) {
      const failure = toFailure(error);
      markFailed(result, failure);
      console.warn(`[Pipeline] Failed ${file.path}: ${failure.kind}: ${failure.message}`);
    }

    results.push(result);
    options.onResult?.(result);
  }

  return summarize(results, dryRun);
}

async function processFile(result: FileResult, services: PipelineServices, dryRun: boolean): Promise<void> {
  const { file } = result;

  const excerpt = await services.extractor.extract(file);
  transition(result, 'extracted');

  const suggestion = await services.namer.suggestName(excerpt);
  result.suggestion = {
    ...suggestion,
    baseName: resolveDatePlaceholder(suggestion.baseName, file.modifiedAt),
  };
  transition(result, 'named');

  const plan = dryRun
    ? await services.renamer.plan(file.path, result.suggestion.baseName)
    : await services.renamer.rename(file.path, result.suggestion.baseName);
  result.targetPath = plan.targetPath;

  if (plan.unchanged) {
    transition(result, 'unchanged');
  } else if (!dryRun) {
    transition(result, 'renamed');
  }
}

function toFailure(error: unknown): FileFailure {
  if (isPdfRenamerError(error) && isFileErrorKind(error.kind)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'UnexpectedError', message: getErrorMessage(error) };
}

function summarize(results: FileResult[], dryRun: boolean): RunSummary {
  let renamed = 0;
  let previewed = 0;
  let unchanged = 0;
  let failed = 0;

  for (const result of results) {
    switch (result.status) {
      case 'renamed':
        renamed++;
        break;
      case 'named':
        if (dryRun) previewed++;
        break;
      case 'unchanged':
        unchanged++;
        break;
      case 'failed':
        failed++;
        break;
      default:
        break;
    }
  }

  return { results, renamed, previewed, unchanged, failed };
}
