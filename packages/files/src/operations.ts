import { constants, promises as fs, Stats } from 'fs';
import path from 'path';

import { ErrorFactory } from '@bucketferry/errors';

/**
 * Basic file system operations
 *
 * Provides the checks the transfer engine and orchestrator rely on:
 * - File existence and size lookups
 * - Directory creation, including renaming regular files that block it
 * - Writability checks for the download target
 */

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Check if file or directory exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get file stats, or null when the path does not exist
 */
export async function getFileStats(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Current byte length of a file, 0 when it does not exist
 */
export async function getFileSize(filePath: string): Promise<number> {
  const stats = await getFileStats(filePath);
  if (stats && !stats.isFile()) {
    throw ErrorFactory.filesystem(`Not a regular file: ${filePath}`, {
      code: 'NOT_A_FILE',
      data: { path: filePath },
    });
  }
  return stats?.size ?? 0;
}

/**
 * Ensure directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw ErrorFactory.filesystem(`Failed to create directory ${dirPath}`, {
      ...(error instanceof Error && { cause: error }),
      data: { path: dirPath },
    });
  }
}

export interface DirectoryConflict {
  path: string;
  renamedTo: string;
}

/**
 * Ensure `dirPath` exists below `root`. Any path component below `root` that
 * exists as something other than a directory is renamed to `<name>_file_conflict`
 * (or `<name>_file_conflict_<n>` when that name is taken) first.
 */
export async function ensureDirectoryResolvingConflicts(
  dirPath: string,
  root: string
): Promise<DirectoryConflict[]> {
  const relative = path.relative(root, dirPath);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw ErrorFactory.filesystem(`Directory ${dirPath} is outside ${root}`, {
      code: 'PATH_OUTSIDE_ROOT',
      data: { path: dirPath, root },
    });
  }

  const conflicts: DirectoryConflict[] = [];
  let current = root;

  for (const segment of relative.split(path.sep).filter(Boolean)) {
    current = path.join(current, segment);
    const stats = await fs.lstat(current).catch((error: unknown) => {
      if (isMissing(error)) return null;
      throw error;
    });

    if (stats === null) {
      break;
    }

    if (!stats.isDirectory()) {
      const renamedTo = await freeConflictName(current);
      await fs.rename(current, renamedTo);
      conflicts.push({ path: current, renamedTo });
      break;
    }
  }

  await ensureDirectory(dirPath);
  return conflicts;
}

async function freeConflictName(filePath: string): Promise<string> {
  let candidate = `${filePath}_file_conflict`;
  for (let n = 1; await fileExists(candidate); n++) {
    candidate = `${filePath}_file_conflict_${n}`;
  }
  return candidate;
}

/**
 * Fail unless `dirPath` exists (creating it if needed) and is writable
 */
export async function ensureWritableDirectory(dirPath: string): Promise<void> {
  await ensureDirectory(dirPath);
  try {
    await fs.access(dirPath, constants.R_OK | constants.W_OK);
  } catch (error) {
    throw ErrorFactory.filesystem(`Directory is not readable and writable: ${dirPath}`, {
      code: 'TARGET_NOT_WRITABLE',
      ...(error instanceof Error && { cause: error }),
      data: { path: dirPath },
    });
  }
}
