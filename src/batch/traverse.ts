import { promises as fs, constants, Dirent } from 'fs';
import path from 'path';
import { SourceDirectoryError, errnoOf } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('batch:traverse');

/**
 * Fail fast unless the source root is a readable directory
 *
 * @throws SourceDirectoryError
 */
export async function assertReadableDirectory(sourceRoot: string, correlationId?: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(sourceRoot)).isDirectory();
  } catch (error) {
    const errno = errnoOf(error);
    throw new SourceDirectoryError(sourceRoot, errno === 'ENOENT' ? 'not found' : `cannot stat: ${errno ?? 'unknown'}`, {
      correlationId,
      errno,
    });
  }

  if (!isDirectory) {
    throw new SourceDirectoryError(sourceRoot, 'not a directory', { correlationId });
  }

  try {
    await fs.access(sourceRoot, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new SourceDirectoryError(sourceRoot, 'not readable', { correlationId, errno: errnoOf(error) });
  }
}

async function walk(root: string, dir: string, excludeDir: string | undefined, out: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (dir === root) {
      throw new SourceDirectoryError(root, 'not readable', { errno: errnoOf(error) });
    }
    logger.warn({ dir, errno: errnoOf(error) }, 'Skipping unreadable directory');
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    // Links are neither followed nor counted
    if (entry.isSymbolicLink()) {
      continue;
    }

    if (entry.isDirectory()) {
      if (fullPath === excludeDir) {
        continue;
      }
      await walk(root, fullPath, excludeDir, out);
    } else if (entry.isFile()) {
      out.push(path.relative(root, fullPath).split(path.sep).join('/'));
    }
  }
}

/**
 * List every regular file under root as a `/`-separated relative path,
 * sorted lexicographically
 *
 * @param excludeDir - Absolute directory to leave out (the destination, when it sits inside the source)
 */
export async function listSourceFiles(root: string, excludeDir?: string): Promise<string[]> {
  const files: string[] = [];
  await walk(path.resolve(root), path.resolve(root), excludeDir ? path.resolve(excludeDir) : undefined, files);
  return files.sort();
}
