import * as fs from 'fs';
import * as path from 'path';
import { sanitizeFileName } from './sanitize';
import { RenameError, getErrorCode, getErrorMessage } from '../errors';

export type RenamePlan = {
  sourcePath: string;
  targetPath: string;
  /** The sanitized name already is the file's name; nothing to do. */
  unchanged: boolean;
};

/**
 * Renamer - picks collision-free names in the file's own directory and moves files there
 *
 * Names handed out during the run are remembered, so two files suggested the
 * same name end up as "Name.pdf" and "Name-2.pdf" even in a dry run where
 * nothing reaches the disk. Comparisons are case-insensitive so the result is
 * the same on case-insensitive filesystems.
 */
export class Renamer {
  private readonly claimed = new Set<string>();

  /**
   * Compute the target path for a file and reserve it for this run.
   */
  async plan(sourcePath: string, candidateName: string): Promise<RenamePlan> {
    const baseName = sanitizeFileName(candidateName);
    if (!baseName) {
      throw new RenameError(`Candidate name "${candidateName}" is empty after sanitization`);
    }

    const directory = path.dirname(sourcePath);
    const extension = path.extname(sourcePath);

    for (let attempt = 1; ; attempt++) {
      const fileName = attempt === 1 ? `${baseName}${extension}` : `${baseName}-${attempt}${extension}`;
      const targetPath = path.join(directory, fileName);

      if (targetPath === sourcePath) {
        this.claim(targetPath);
        return { sourcePath, targetPath, unchanged: true };
      }

      if (this.isClaimed(targetPath) || (await this.existsOnDisk(targetPath, sourcePath))) {
        continue;
      }

      this.claim(targetPath);
      return { sourcePath, targetPath, unchanged: false };
    }
  }

  /**
   * Plan a target and move the file there. Never overwrites an existing file.
   */
  async rename(sourcePath: string, candidateName: string): Promise<RenamePlan> {
    const plan = await this.plan(sourcePath, candidateName);
    if (plan.unchanged) {
      return plan;
    }

    // Re-check right before the move: something may have appeared since planning.
    if (await this.existsOnDisk(plan.targetPath, sourcePath)) {
      throw new RenameError(`Target already exists: ${plan.targetPath}`, 'EEXIST');
    }

    try {
      await fs.promises.rename(sourcePath, plan.targetPath);
    } catch (error) {
      this.claimed.delete(claimKey(plan.targetPath));
      throw new RenameError(
        `Failed to rename ${sourcePath} to ${plan.targetPath}: ${getErrorMessage(error)}`,
        getErrorCode(error),
        { cause: error }
      );
    }

    console.log(`[Renamer] ${path.basename(sourcePath)} -> ${path.basename(plan.targetPath)}`);
    return plan;
  }

  /**
   * Reserve a name without renaming anything onto it.
   */
  claim(filePath: string): void {
    this.claimed.add(claimKey(filePath));
  }

  isClaimed(filePath: string): boolean {
    return this.claimed.has(claimKey(filePath));
  }

  private async existsOnDisk(targetPath: string, sourcePath: string): Promise<boolean> {
    try {
      const [target, source] = await Promise.all([
        fs.promises.lstat(targetPath),
        fs.promises.lstat(sourcePath).catch(() => null),
      ]);
      // Case-only rename on a case-insensitive filesystem: the "existing" target is the source itself.
      if (source && target.ino === source.ino && target.dev === source.dev) {
        return false;
      }
      return true;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return false;
      }
      throw new RenameError(
        `Cannot check ${targetPath}: ${getErrorMessage(error)}`,
        getErrorCode(error),
        { cause: error }
      );
    }
  }
}

function claimKey(filePath: string): string {
  return path.resolve(filePath).toLowerCase();
}
