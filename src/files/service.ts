import { promises as fs } from 'fs';
import path from 'path';
import type { FileInfo, FolderStats } from '../types';
import { FileNotFoundError, ValidationError, errnoOf } from '../errors';
import { listSourceFiles } from '../batch';
import { createLogger } from '../utils/logger';

const logger = createLogger('files:service');

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (errnoOf(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function topLevelFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

/**
 * List regular files of a data folder, sorted by relative path
 *
 * A folder that does not exist yet lists as empty.
 */
export async function listFiles(dir: string, recursive: boolean = false): Promise<FileInfo[]> {
  if (!(await directoryExists(dir))) {
    return [];
  }

  const relativePaths = recursive ? await listSourceFiles(dir) : await topLevelFiles(dir);

  return Promise.all(
    relativePaths.map(async (relativePath): Promise<FileInfo> => {
      const stats = await fs.stat(path.join(dir, ...relativePath.split('/')));
      return {
        name: path.posix.basename(relativePath),
        relativePath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime.toISOString(),
      };
    })
  );
}

/**
 * Delete one file at the top of a data folder
 *
 * Only the base name of `fileName` is used, so a request cannot reach
 * outside the folder.
 *
 * @throws ValidationError for an empty or dot-only name
 * @throws FileNotFoundError when no such regular file exists
 */
export async function deleteFile(dir: string, fileName: string): Promise<string> {
  const name = path.basename(fileName.replace(/\\/g, '/'));
  if (!name || name === '.' || name === '..') {
    throw new ValidationError(`Invalid file name: ${fileName}`);
  }

  const target = path.join(dir, name);
  let isFile: boolean;
  try {
    isFile = (await fs.lstat(target)).isFile();
  } catch (error) {
    if (errnoOf(error) === 'ENOENT') {
      throw new FileNotFoundError(name, { path: target });
    }
    throw error;
  }
  if (!isFile) {
    throw new FileNotFoundError(name, { path: target });
  }

  await fs.unlink(target);
  logger.info({ path: target }, 'Deleted file');
  return name;
}

/**
 * File count and distinct extensions of a data folder, walked recursively
 */
export async function folderStats(dir: string): Promise<FolderStats> {
  if (!(await directoryExists(dir))) {
    return { path: dir, total: 0, extensions: [] };
  }

  const files = await listSourceFiles(dir);
  const extensions = new Set(
    files.map((file) => path.posix.extname(file).toLowerCase()).filter((extension) => extension !== '')
  );

  return { path: dir, total: files.length, extensions: [...extensions].sort() };
}
