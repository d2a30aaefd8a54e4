import * as fs from 'fs';
import * as path from 'path';
import type { SourceFile } from '../extractors/types';
import { InputPathError, getErrorCode, getErrorMessage } from '../errors';
import { PDF_EXTENSION } from '../constants';

// Folders never descended into
const EXCLUDED_FOLDERS = new Set([
  'node_modules',
  '__pycache__',
  'venv',
]);

export type DiscoverOptions = {
  recursive?: boolean;
};

/**
 * Checks if a file or folder should be skipped during discovery.
 */
function shouldExclude(name: string): boolean {
  // Hidden files/folders (starting with .)
  if (name.startsWith('.')) {
    return true;
  }
  return EXCLUDED_FOLDERS.has(name);
}

function isPdfName(name: string): boolean {
  return path.extname(name).toLowerCase() === PDF_EXTENSION;
}

function toSourceFile(filePath: string, stats: fs.Stats): SourceFile {
  return { path: filePath, size: stats.size, modifiedAt: stats.mtime };
}

/**
 * Resolve the input argument into the ordered list of PDFs to process.
 *
 * A file path yields that file, whatever its extension. A directory yields its
 * *.pdf files sorted by path; with `recursive` the walk is iterative (stack based)
 * and covers subdirectories too. Symbolic links are not followed.
 */
export async function discoverPdfs(inputPath: string, options: DiscoverOptions = {}): Promise<SourceFile[]> {
  const root = path.resolve(inputPath);

  let rootStats: fs.Stats;
  try {
    rootStats = await fs.promises.stat(root);
  } catch (error) {
    const reason = getErrorCode(error) === 'ENOENT' ? 'No such file or directory' : getErrorMessage(error);
    throw new InputPathError(inputPath, `${reason}: ${inputPath}`, { cause: error });
  }

  if (rootStats.isFile()) {
    return [toSourceFile(root, rootStats)];
  }
  if (!rootStats.isDirectory()) {
    throw new InputPathError(inputPath, `Not a file or directory: ${inputPath}`);
  }

  const files: SourceFile[] = [];
  const stack: string[] = [root];

  while (stack.length > 0) {
    const dirPath = stack.pop();
    if (dirPath === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (dirPath === root) {
        throw new InputPathError(inputPath, `Cannot read directory: ${getErrorMessage(error)}`, { cause: error });
      }
      console.warn(`[Crawler] Skipping unreadable folder ${dirPath}: ${getErrorMessage(error)}`);
      continue;
    }

    for (const entry of entries) {
      if (shouldExclude(entry.name)) {
        continue;
      }
      const entryPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (options.recursive) {
          stack.push(entryPath);
        }
      } else if (entry.isFile() && isPdfName(entry.name)) {
        const stats = await fs.promises.stat(entryPath);
        files.push(toSourceFile(entryPath, stats));
      }
    }
  }

  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
